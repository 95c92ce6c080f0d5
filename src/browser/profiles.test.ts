import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { makeTempDir } from "../../test/helpers/temp-home.js";
import {
  discoverBrowserProfiles,
  discoverProfiles,
  formatProfileLabel,
  resolveBrowserUserDataDir,
} from "./profiles.js";

function touch(file: string) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, "");
}

describe("resolveBrowserUserDataDir", () => {
  it("uses LOCALAPPDATA on windows", () => {
    expect(
      resolveBrowserUserDataDir("edge", {
        platform: "win32",
        env: { LOCALAPPDATA: "C:\\Users\\t\\AppData\\Local" },
        homedir: () => "C:\\Users\\t",
      }),
    ).toBe("C:\\Users\\t\\AppData\\Local\\Microsoft\\Edge\\User Data");
  });

  it("uses Application Support on macOS", () => {
    expect(
      resolveBrowserUserDataDir("brave", { platform: "darwin", env: {}, homedir: () => "/Users/t" }),
    ).toBe("/Users/t/Library/Application Support/BraveSoftware/Brave-Browser");
  });

  it("uses XDG config on linux and has no arc build", () => {
    const opts = { platform: "linux" as const, env: {}, homedir: () => "/home/t" };
    expect(resolveBrowserUserDataDir("chrome", opts)).toBe("/home/t/.config/google-chrome");
    expect(resolveBrowserUserDataDir("firefox", opts)).toBe("/home/t/.mozilla/firefox");
    expect(resolveBrowserUserDataDir("arc", opts)).toBeNull();
  });

  it("prefers configured roots", () => {
    expect(resolveBrowserUserDataDir("chrome", { roots: { chrome: "/opt/chrome" } })).toBe(
      "/opt/chrome",
    );
  });
});

describe("discoverBrowserProfiles", () => {
  it("lists chromium profiles with a cookie db, Default first", async () => {
    const root = await makeTempDir();
    touch(path.join(root, "Profile 10", "Network", "Cookies"));
    touch(path.join(root, "Profile 2", "Cookies"));
    touch(path.join(root, "Default", "Network", "Cookies"));
    fs.mkdirSync(path.join(root, "Profile 3"));
    fs.mkdirSync(path.join(root, "System Profile"));

    const profiles = discoverBrowserProfiles("chrome", { roots: { chrome: root } });
    expect(profiles.map((p) => p.name)).toEqual(["Default", "Profile 2", "Profile 10"]);
    expect(profiles[0]?.cookieDbPath).toBe(path.join(root, "Default", "Network", "Cookies"));
    expect(profiles[1]?.cookieDbPath).toBe(path.join(root, "Profile 2", "Cookies"));
    expect(profiles[0]?.localStatePath).toBe(path.join(root, "Local State"));
    expect(profiles[0] && formatProfileLabel(profiles[0])).toBe("Google Chrome (Default)");
  });

  it("lists firefox profiles, default-release first", async () => {
    const root = await makeTempDir();
    touch(path.join(root, "zz.work", "cookies.sqlite"));
    touch(path.join(root, "ab.default-release", "cookies.sqlite"));
    fs.mkdirSync(path.join(root, "Crash Reports"));

    const profiles = discoverBrowserProfiles("firefox", { roots: { firefox: root } });
    expect(profiles.map((p) => p.name)).toEqual(["ab.default-release", "zz.work"]);
    expect(profiles[0]?.family).toBe("firefox");
    expect(profiles[0]?.localStatePath).toBeUndefined();
  });

  it("returns nothing for browsers that are not installed", async () => {
    const root = await makeTempDir();
    expect(
      discoverProfiles(["chrome", "firefox"], {
        roots: { chrome: path.join(root, "missing"), firefox: path.join(root, "nope") },
      }),
    ).toEqual([]);
  });
});
