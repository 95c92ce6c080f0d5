import { createSubsystemLogger } from "../logging/subsystem.js";

/** Credential payload schema produced by the newest migration step. */
export const CREDENTIAL_SCHEMA_VERSION = 4;
/** Layout of credentials.json itself. */
export const CREDENTIAL_STORE_VERSION = 1;
export const CREDENTIAL_STORE_FILENAME = "credentials.json";

export const CREDENTIAL_STORE_LOCK_OPTIONS = {
  retries: {
    retries: 10,
    factor: 2,
    minTimeout: 100,
    maxTimeout: 10_000,
    randomize: true,
  },
  stale: 30_000,
} as const;

export const log = createSubsystemLogger("credentials");
