import fs from "node:fs";

import type { BrowserId } from "../config/types.js";
import { DecryptionError, formatErrorMessage } from "../infra/errors.js";
import type { BrowserProfile } from "./profiles.js";

const DPAPI_PREFIX = "DPAPI";

/** Resolves the unwrapped master key a browser encrypts its cookie values with. */
export type CookieKeyProvider = {
  masterKey(profile: BrowserProfile): Promise<Buffer>;
  /** Windows only: unwraps pre-v80 cookie values stored as raw DPAPI blobs. */
  unprotect?: (blob: Buffer) => Promise<Buffer>;
};

/**
 * Reads `os_crypt.encrypted_key` from a Chromium `Local State` file and strips the
 * `DPAPI` marker, leaving the blob the platform keystore unwraps.
 */
export function readLocalStateEncryptedKey(localStatePath: string): Buffer {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(localStatePath, "utf8"));
  } catch (err) {
    throw new DecryptionError(
      "key_unavailable",
      `cannot read Local State: ${formatErrorMessage(err)}`,
      { cause: err },
    );
  }
  const osCrypt =
    parsed && typeof parsed === "object" && "os_crypt" in parsed ? parsed.os_crypt : undefined;
  const encoded =
    osCrypt && typeof osCrypt === "object" && "encrypted_key" in osCrypt
      ? osCrypt.encrypted_key
      : undefined;
  if (typeof encoded !== "string" || !encoded) {
    throw new DecryptionError("key_unavailable", "Local State has no os_crypt.encrypted_key");
  }
  const wrapped = Buffer.from(encoded, "base64");
  if (wrapped.length <= DPAPI_PREFIX.length || wrapped.subarray(0, 5).toString("latin1") !== DPAPI_PREFIX) {
    throw new DecryptionError("key_unavailable", "encrypted_key is missing its DPAPI marker");
  }
  return wrapped.subarray(DPAPI_PREFIX.length);
}

/**
 * Memoizes key lookups per user-data dir. Failed lookups are not cached, so a keychain
 * prompt the user dismissed is asked again on the next refresh.
 */
export function memoizeKeyProvider(
  resolve: (profile: BrowserProfile) => Promise<Buffer>,
  unprotect?: (blob: Buffer) => Promise<Buffer>,
): CookieKeyProvider & { clear: () => void } {
  const cache = new Map<string, Promise<Buffer>>();
  return {
    masterKey(profile) {
      const cacheKey = `${profile.browser}:${profile.userDataDir}`;
      const existing = cache.get(cacheKey);
      if (existing) return existing;
      const pending = resolve(profile).catch((err: unknown) => {
        cache.delete(cacheKey);
        if (err instanceof DecryptionError) throw err;
        throw new DecryptionError(
          "key_unavailable",
          `master key lookup failed for ${profile.browser}: ${formatErrorMessage(err)}`,
          { cause: err },
        );
      });
      cache.set(cacheKey, pending);
      return pending;
    },
    unprotect,
    clear: () => cache.clear(),
  };
}

/** Fixed keys per browser; used for tests and for keys supplied out of band. */
export function createStaticKeyProvider(
  keys: Buffer | Partial<Record<BrowserId, Buffer>>,
): CookieKeyProvider {
  return {
    async masterKey(profile) {
      const key = Buffer.isBuffer(keys) ? keys : keys[profile.browser];
      if (!key) {
        throw new DecryptionError("key_unavailable", `no key configured for ${profile.browser}`);
      }
      return key;
    },
  };
}
