import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { BrowserId } from "../config/types.js";

export type BrowserFamily = "chromium" | "firefox";

export type BrowserProfile = {
  browser: BrowserId;
  family: BrowserFamily;
  /** Directory name inside the user-data root ("Default", "Profile 2", "abcd.default-release"). */
  name: string;
  isDefault: boolean;
  profileDir: string;
  userDataDir: string;
  cookieDbPath: string;
  /** Chromium only: holds the wrapped master key. */
  localStatePath?: string;
};

export type ProfileDiscoveryOptions = {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  /** Replaces the platform default user-data root per browser. */
  roots?: Partial<Record<BrowserId, string>>;
};

export const BROWSER_DISPLAY_NAMES: Record<BrowserId, string> = {
  chrome: "Google Chrome",
  edge: "Microsoft Edge",
  brave: "Brave",
  arc: "Arc",
  chromium: "Chromium",
  firefox: "Firefox",
};

export function browserFamily(browser: BrowserId): BrowserFamily {
  return browser === "firefox" ? "firefox" : "chromium";
}

export function resolveBrowserUserDataDir(
  browser: BrowserId,
  opts: ProfileDiscoveryOptions = {},
): string | null {
  const override = opts.roots?.[browser];
  if (override) return override;
  const platform = opts.platform ?? process.platform;
  const env = opts.env ?? process.env;
  const home = (opts.homedir ?? os.homedir)();

  if (platform === "win32") {
    const joinWin = path.win32.join;
    const localAppData = env.LOCALAPPDATA ?? joinWin(home, "AppData", "Local");
    const appData = env.APPDATA ?? joinWin(home, "AppData", "Roaming");
    switch (browser) {
      case "chrome":
        return joinWin(localAppData, "Google", "Chrome", "User Data");
      case "edge":
        return joinWin(localAppData, "Microsoft", "Edge", "User Data");
      case "brave":
        return joinWin(localAppData, "BraveSoftware", "Brave-Browser", "User Data");
      case "arc":
        return joinWin(localAppData, "Arc", "User Data");
      case "chromium":
        return joinWin(localAppData, "Chromium", "User Data");
      case "firefox":
        return joinWin(appData, "Mozilla", "Firefox", "Profiles");
    }
  }

  if (platform === "darwin") {
    const support = path.posix.join(home, "Library", "Application Support");
    switch (browser) {
      case "chrome":
        return path.posix.join(support, "Google", "Chrome");
      case "edge":
        return path.posix.join(support, "Microsoft Edge");
      case "brave":
        return path.posix.join(support, "BraveSoftware", "Brave-Browser");
      case "arc":
        return path.posix.join(support, "Arc", "User Data");
      case "chromium":
        return path.posix.join(support, "Chromium");
      case "firefox":
        return path.posix.join(support, "Firefox", "Profiles");
    }
  }

  const configHome = env.XDG_CONFIG_HOME ?? path.posix.join(home, ".config");
  switch (browser) {
    case "chrome":
      return path.posix.join(configHome, "google-chrome");
    case "edge":
      return path.posix.join(configHome, "microsoft-edge");
    case "brave":
      return path.posix.join(configHome, "BraveSoftware", "Brave-Browser");
    case "arc":
      // No Linux build.
      return null;
    case "chromium":
      return path.posix.join(configHome, "chromium");
    case "firefox":
      return path.posix.join(home, ".mozilla", "firefox");
  }
}

function listDirs(dir: string): string[] {
  try {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name);
  } catch {
    return [];
  }
}

function firstExisting(candidates: string[]): string | undefined {
  return candidates.find((candidate) => fs.existsSync(candidate));
}

function chromiumProfileOrder(name: string): number {
  if (name === "Default") return 0;
  const match = /^Profile (\d+)$/.exec(name);
  return match ? Number(match[1]) : Number.MAX_SAFE_INTEGER;
}

function discoverChromiumProfiles(browser: BrowserId, userDataDir: string): BrowserProfile[] {
  const names = listDirs(userDataDir)
    .filter((name) => name === "Default" || /^Profile \d+$/.test(name))
    .sort((a, b) => chromiumProfileOrder(a) - chromiumProfileOrder(b));
  const profiles: BrowserProfile[] = [];
  for (const name of names) {
    const profileDir = path.join(userDataDir, name);
    // Chromium 96+ moved the store under Network/.
    const cookieDbPath = firstExisting([
      path.join(profileDir, "Network", "Cookies"),
      path.join(profileDir, "Cookies"),
    ]);
    if (!cookieDbPath) continue;
    profiles.push({
      browser,
      family: "chromium",
      name,
      isDefault: name === "Default",
      profileDir,
      userDataDir,
      cookieDbPath,
      localStatePath: path.join(userDataDir, "Local State"),
    });
  }
  return profiles;
}

function discoverFirefoxProfiles(userDataDir: string): BrowserProfile[] {
  const names = listDirs(userDataDir)
    .filter((name) => name.includes("."))
    .sort((a, b) => {
      const rank = (name: string) =>
        name.endsWith(".default-release") ? 0 : name.includes("default") ? 1 : 2;
      return rank(a) - rank(b) || a.localeCompare(b);
    });
  const profiles: BrowserProfile[] = [];
  for (const name of names) {
    const profileDir = path.join(userDataDir, name);
    const cookieDbPath = path.join(profileDir, "cookies.sqlite");
    if (!fs.existsSync(cookieDbPath)) continue;
    profiles.push({
      browser: "firefox",
      family: "firefox",
      name,
      isDefault: name.includes("default"),
      profileDir,
      userDataDir,
      cookieDbPath,
    });
  }
  return profiles;
}

/** Profiles of one browser that have a cookie database on disk. Missing installs yield []. */
export function discoverBrowserProfiles(
  browser: BrowserId,
  opts: ProfileDiscoveryOptions = {},
): BrowserProfile[] {
  const userDataDir = resolveBrowserUserDataDir(browser, opts);
  if (!userDataDir || !fs.existsSync(userDataDir)) return [];
  return browserFamily(browser) === "firefox"
    ? discoverFirefoxProfiles(userDataDir)
    : discoverChromiumProfiles(browser, userDataDir);
}

export function discoverProfiles(
  browsers: readonly BrowserId[],
  opts: ProfileDiscoveryOptions = {},
): BrowserProfile[] {
  return browsers.flatMap((browser) => discoverBrowserProfiles(browser, opts));
}

export function formatProfileLabel(profile: BrowserProfile): string {
  return `${BROWSER_DISPLAY_NAMES[profile.browser]} (${profile.name})`;
}
