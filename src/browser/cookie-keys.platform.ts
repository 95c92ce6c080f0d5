import { createSubsystemLogger } from "../logging/subsystem.js";
import { DecryptionError, formatErrorMessage } from "../infra/errors.js";
import { type ExecRunner, runExec } from "../process/exec.js";
import { deriveChromiumPosixKey } from "./cookie-crypto.js";
import { type CookieKeyProvider, memoizeKeyProvider, readLocalStateEncryptedKey } from "./cookie-keys.js";
import type { BrowserProfile } from "./profiles.js";

const log = createSubsystemLogger("browser/keys");

const MAC_KEYCHAIN_SERVICES: Record<BrowserProfile["browser"], string | null> = {
  chrome: "Chrome Safe Storage",
  edge: "Microsoft Edge Safe Storage",
  brave: "Brave Safe Storage",
  arc: "Arc Safe Storage",
  chromium: "Chromium Safe Storage",
  firefox: null,
};

const LINUX_SECRET_APPLICATIONS: Record<BrowserProfile["browser"], string | null> = {
  chrome: "chrome",
  edge: "chromium",
  brave: "brave",
  arc: null,
  chromium: "chromium",
  firefox: null,
};

const MAC_PBKDF2_ITERATIONS = 1003;
const LINUX_PBKDF2_ITERATIONS = 1;
const LINUX_FALLBACK_PASSWORD = "peanuts";

async function dpapiUnprotect(exec: ExecRunner, blob: Buffer): Promise<Buffer> {
  // Base64 is a closed alphabet, so it is safe inside the single-quoted literal.
  const script = [
    "Add-Type -AssemblyName System.Security;",
    `$bytes = [Convert]::FromBase64String('${blob.toString("base64")}');`,
    "$plain = [Security.Cryptography.ProtectedData]::Unprotect($bytes, $null, 'CurrentUser');",
    "[Convert]::ToBase64String($plain)",
  ].join(" ");
  const { stdout } = await exec(
    "powershell.exe",
    ["-NoProfile", "-NonInteractive", "-Command", script],
    { timeoutMs: 15_000 },
  );
  const out = Buffer.from(stdout.trim(), "base64");
  if (out.length === 0) throw new Error("DPAPI returned no data");
  return out;
}

async function windowsMasterKey(exec: ExecRunner, profile: BrowserProfile): Promise<Buffer> {
  if (!profile.localStatePath) {
    throw new DecryptionError("key_unavailable", `${profile.browser} has no Local State`);
  }
  const wrapped = readLocalStateEncryptedKey(profile.localStatePath);
  const key = await dpapiUnprotect(exec, wrapped);
  if (key.length !== 32) {
    throw new DecryptionError("key_unavailable", `unexpected master key length ${key.length}`);
  }
  return key;
}

async function macMasterKey(exec: ExecRunner, profile: BrowserProfile): Promise<Buffer> {
  const service = MAC_KEYCHAIN_SERVICES[profile.browser];
  if (!service) throw new DecryptionError("key_unavailable", `${profile.browser} uses no keychain`);
  const { stdout } = await exec("security", ["find-generic-password", "-w", "-s", service], {
    timeoutMs: 30_000,
  });
  const password = stdout.trim();
  if (!password) throw new DecryptionError("key_unavailable", `empty keychain entry for ${service}`);
  return deriveChromiumPosixKey(password, MAC_PBKDF2_ITERATIONS);
}

async function linuxMasterKey(exec: ExecRunner, profile: BrowserProfile): Promise<Buffer> {
  const application = LINUX_SECRET_APPLICATIONS[profile.browser];
  let password = LINUX_FALLBACK_PASSWORD;
  if (application) {
    try {
      const { stdout } = await exec("secret-tool", ["lookup", "application", application], {
        timeoutMs: 10_000,
      });
      if (stdout.trim()) password = stdout.trim();
    } catch (err) {
      log.debug("secret-tool lookup failed; using the basic-store password", {
        browser: profile.browser,
        error: formatErrorMessage(err),
      });
    }
  }
  return deriveChromiumPosixKey(password, LINUX_PBKDF2_ITERATIONS);
}

export function createPlatformKeyProvider(
  opts: { platform?: NodeJS.Platform; exec?: ExecRunner } = {},
): CookieKeyProvider & { clear: () => void } {
  const platform = opts.platform ?? process.platform;
  const exec = opts.exec ?? runExec;
  const resolve = (profile: BrowserProfile): Promise<Buffer> => {
    if (profile.family === "firefox") {
      return Promise.reject(new DecryptionError("key_unavailable", "firefox stores plaintext"));
    }
    if (platform === "win32") return windowsMasterKey(exec, profile);
    if (platform === "darwin") return macMasterKey(exec, profile);
    return linuxMasterKey(exec, profile);
  };
  const unprotect =
    platform === "win32" ? (blob: Buffer) => dpapiUnprotect(exec, blob) : undefined;
  return memoizeKeyProvider(resolve, unprotect);
}
