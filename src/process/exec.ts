import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const execFileAsync = promisify(execFile);
const log = createSubsystemLogger("process/exec");

export type ExecResult = { stdout: string; stderr: string };

export type ExecOptions = {
  timeoutMs: number;
  maxBuffer?: number;
  /** Merged over process.env. */
  env?: NodeJS.ProcessEnv;
};

/** Runs a key helper (`security`, `secret-tool`, `powershell.exe`) and returns its output. */
export type ExecRunner = (command: string, args: string[], opts: ExecOptions) => Promise<ExecResult>;

export const runExec: ExecRunner = async (command, args, opts) => {
  const startedAt = Date.now();
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: opts.timeoutMs,
      maxBuffer: opts.maxBuffer ?? 1024 * 1024,
      env: opts.env ? { ...process.env, ...opts.env } : undefined,
      encoding: "utf8",
      windowsHide: true,
    });
    // stdout may carry a keychain secret; only its size is logged.
    log.trace(`${command} exited`, { ms: Date.now() - startedAt, bytes: stdout.length });
    return { stdout, stderr };
  } catch (err) {
    log.debug(`${command} failed`, { ms: Date.now() - startedAt, error: formatErrorMessage(err) });
    throw err;
  }
};
