import crypto from "node:crypto";

import { DecryptionError } from "../infra/errors.js";

const VERSION_PREFIX_LENGTH = 3;
const GCM_NONCE_LENGTH = 12;
const GCM_TAG_LENGTH = 16;
const MIN_GCM_BLOB_LENGTH = VERSION_PREFIX_LENGTH + GCM_NONCE_LENGTH + GCM_TAG_LENGTH;
const CBC_IV = Buffer.alloc(16, " ");
const DOMAIN_HASH_LENGTH = 32;
/** Chromium cookie DBs at or above this meta version prefix plaintext with SHA-256(host_key). */
export const DOMAIN_HASH_DB_VERSION = 24;

export type CookieBlobMeta = {
  /** Firefox stores values in the clear. */
  scheme: "chromium" | "plaintext";
  /** Unwrapped master key: 32 bytes selects AES-256-GCM, 16 bytes AES-128-CBC. */
  key?: Buffer | null;
  hostKey?: string;
  dbVersion?: number;
  /** Associated data the value was sealed with (binds it to a profile). */
  aad?: Buffer;
};

export function hasVersionPrefix(blob: Buffer): boolean {
  if (blob.length < VERSION_PREFIX_LENGTH) return false;
  const prefix = blob.subarray(0, VERSION_PREFIX_LENGTH).toString("latin1");
  return prefix === "v10" || prefix === "v11";
}

function hostHash(hostKey: string): Buffer {
  return crypto.createHash("sha256").update(hostKey, "utf8").digest();
}

function decodeUtf8(bytes: Buffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new DecryptionError("ciphertext_malformed", "decrypted cookie is not valid UTF-8", {
      cause: err,
    });
  }
}

function decryptGcm(blob: Buffer, key: Buffer, aad?: Buffer): Buffer {
  if (blob.length < MIN_GCM_BLOB_LENGTH) {
    throw new DecryptionError(
      "ciphertext_malformed",
      `cookie blob too short for AES-GCM (${blob.length} < ${MIN_GCM_BLOB_LENGTH} bytes)`,
    );
  }
  const nonce = blob.subarray(VERSION_PREFIX_LENGTH, VERSION_PREFIX_LENGTH + GCM_NONCE_LENGTH);
  const tag = blob.subarray(blob.length - GCM_TAG_LENGTH);
  const ciphertext = blob.subarray(VERSION_PREFIX_LENGTH + GCM_NONCE_LENGTH, blob.length - GCM_TAG_LENGTH);
  const decipher = crypto.createDecipheriv("aes-256-gcm", key, nonce);
  decipher.setAuthTag(tag);
  if (aad) decipher.setAAD(aad);
  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err) {
    throw new DecryptionError("authentication_tag_mismatch", "cookie failed AES-GCM authentication", {
      cause: err,
    });
  }
}

function decryptCbc(blob: Buffer, key: Buffer): Buffer {
  const ciphertext = blob.subarray(VERSION_PREFIX_LENGTH);
  if (ciphertext.length === 0 || ciphertext.length % 16 !== 0) {
    throw new DecryptionError(
      "ciphertext_malformed",
      `cookie ciphertext is not block aligned (${ciphertext.length} bytes)`,
    );
  }
  const decipher = crypto.createDecipheriv("aes-128-cbc", key, CBC_IV);
  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err) {
    throw new DecryptionError("ciphertext_malformed", "cookie padding check failed", { cause: err });
  }
}

function stripDomainHash(plaintext: Buffer, meta: CookieBlobMeta): Buffer {
  if ((meta.dbVersion ?? 0) < DOMAIN_HASH_DB_VERSION) return plaintext;
  if (plaintext.length < DOMAIN_HASH_LENGTH) {
    throw new DecryptionError("ciphertext_malformed", "cookie plaintext shorter than its domain hash");
  }
  if (meta.hostKey !== undefined) {
    const expected = hostHash(meta.hostKey);
    if (!crypto.timingSafeEqual(expected, plaintext.subarray(0, DOMAIN_HASH_LENGTH))) {
      throw new DecryptionError(
        "authentication_tag_mismatch",
        "cookie domain hash does not match its host",
      );
    }
  }
  return plaintext.subarray(DOMAIN_HASH_LENGTH);
}

/**
 * Decrypts one stored cookie value. Pure: no I/O, no logging.
 *
 * Unprefixed Chromium blobs (pre-v80 Windows DPAPI values) are reported as malformed here;
 * callers that can reach DPAPI unwrap those before calling.
 */
export function decryptCookieValue(blob: Buffer | string, meta: CookieBlobMeta): string {
  if (meta.scheme === "plaintext") {
    return typeof blob === "string" ? blob : decodeUtf8(blob);
  }
  const bytes = typeof blob === "string" ? Buffer.from(blob, "latin1") : blob;
  if (bytes.length === 0) return "";
  if (!hasVersionPrefix(bytes)) {
    throw new DecryptionError("ciphertext_malformed", "unrecognized cookie encryption prefix");
  }
  const key = meta.key;
  if (!key) {
    throw new DecryptionError("key_unavailable", "browser master key is unavailable");
  }
  let plaintext: Buffer;
  if (key.length === 32) {
    plaintext = decryptGcm(bytes, key, meta.aad);
  } else if (key.length === 16) {
    plaintext = decryptCbc(bytes, key);
  } else {
    throw new DecryptionError("key_unavailable", `unsupported master key length ${key.length}`);
  }
  return decodeUtf8(stripDomainHash(plaintext, meta));
}

export type SealOptions = {
  version?: "v10" | "v11";
  nonce?: Buffer;
  aad?: Buffer;
  /** Prepends SHA-256(hostKey) the way cookie DB version 24+ does. */
  hostKey?: string;
};

/** Encrypts a cookie value into the layout {@link decryptCookieValue} reads. */
export function sealCookieValue(plaintext: string, key: Buffer, opts: SealOptions = {}): Buffer {
  const prefix = Buffer.from(opts.version ?? "v10", "latin1");
  const body = Buffer.concat([
    opts.hostKey !== undefined ? hostHash(opts.hostKey) : Buffer.alloc(0),
    Buffer.from(plaintext, "utf8"),
  ]);
  if (key.length === 16) {
    const cipher = crypto.createCipheriv("aes-128-cbc", key, CBC_IV);
    return Buffer.concat([prefix, cipher.update(body), cipher.final()]);
  }
  if (key.length !== 32) {
    throw new DecryptionError("key_unavailable", `unsupported master key length ${key.length}`);
  }
  const nonce = opts.nonce ?? crypto.randomBytes(GCM_NONCE_LENGTH);
  if (nonce.length !== GCM_NONCE_LENGTH) {
    throw new DecryptionError("ciphertext_malformed", "AES-GCM nonce must be 12 bytes");
  }
  const cipher = crypto.createCipheriv("aes-256-gcm", key, nonce);
  if (opts.aad) cipher.setAAD(opts.aad);
  const ciphertext = Buffer.concat([cipher.update(body), cipher.final()]);
  return Buffer.concat([prefix, nonce, ciphertext, cipher.getAuthTag()]);
}

/** macOS and Linux Chromium derive a 16-byte AES-128 key from the keychain password. */
export function deriveChromiumPosixKey(password: string, iterations: number): Buffer {
  return crypto.pbkdf2Sync(password, "saltysalt", iterations, 16, "sha1");
}
