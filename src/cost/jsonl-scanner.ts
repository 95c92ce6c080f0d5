import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { DEFAULT_SCANNER_LOCK_TIMEOUT_MS } from "../config/defaults.js";
import { throwIfAborted } from "../infra/abort.js";
import { extractErrorCode, formatErrorMessage } from "../infra/errors.js";
import { isRecord, loadJsonFile, saveJsonFile } from "../infra/json-file.js";
import { KeyedMutex } from "../infra/keyed-lock.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { createLogFormatState, extractUsageEvent, type LogFormatState, type UsageEvent } from "./log-formats.js";
import { estimateCost, loadDefaultPricing, type PricingTable } from "./pricing.js";
import { listJsonlFiles } from "./session-roots.js";

const log = createSubsystemLogger("cost/scanner");

const CACHE_FILE_VERSION = 1;
const HEAD_HASH_BYTES = 4096;
const READ_CHUNK_BYTES = 64 * 1024;
const DAY_MS = 24 * 60 * 60 * 1000;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export type CostUsageTotals = {
  input: number;
  output: number;
  cacheRead: number;
  cacheWrite: number;
  totalTokens: number;
  totalCost: number;
  /** Events priced neither by the log nor by the pricing table. */
  missingCostEntries: number;
  entries: number;
};

export type ScanFingerprint = {
  size: number;
  mtimeMs: number;
  ino: number;
  /** SHA-1 of the first min(4096, offset) bytes. */
  headHash: string;
};

export type ParseError = {
  /** 1-based line number within the file. */
  line: number;
  /** Byte offset of the line start. */
  offset: number;
  message: string;
};

export type ScanCacheEntry = {
  path: string;
  offset: number;
  lines: number;
  fingerprint: ScanFingerprint;
  totals: CostUsageTotals;
  byEvent: Record<string, CostUsageTotals>;
  byDay: Record<string, CostUsageTotals>;
  byModel: Record<string, CostUsageTotals>;
  state: LogFormatState;
  updatedAt: number;
};

export type ScanResult = {
  path: string;
  /** What this call added. */
  delta: CostUsageTotals;
  totals: CostUsageTotals;
  byEvent: Record<string, CostUsageTotals>;
  byDay: Record<string, CostUsageTotals>;
  byModel: Record<string, CostUsageTotals>;
  parseErrors: ParseError[];
  /** True when the file was replaced or truncated and accumulation restarted. */
  reset: boolean;
  skipped?: "locked";
};

export type ScanOptions = {
  signal?: AbortSignal;
};

export type DirectoryScanOptions = ScanOptions & {
  /** Only files modified within the last `days` days. */
  days?: number;
};

export type DirectoryScanResult = {
  root: string;
  files: ScanResult[];
  delta: CostUsageTotals;
  totals: CostUsageTotals;
  byEvent: Record<string, CostUsageTotals>;
  byDay: Record<string, CostUsageTotals>;
  byModel: Record<string, CostUsageTotals>;
  parseErrors: number;
  skipped: number;
};

export type JsonlScannerOptions = {
  pricing?: PricingTable;
  lockTimeoutMs?: number;
  /** Persists the entry table here after each committed scan. */
  cachePath?: string;
  now?: () => number;
};

export function emptyTotals(): CostUsageTotals {
  return {
    input: 0,
    output: 0,
    cacheRead: 0,
    cacheWrite: 0,
    totalTokens: 0,
    totalCost: 0,
    missingCostEntries: 0,
    entries: 0,
  };
}

export function addTotals(target: CostUsageTotals, source: CostUsageTotals): CostUsageTotals {
  target.input += source.input;
  target.output += source.output;
  target.cacheRead += source.cacheRead;
  target.cacheWrite += source.cacheWrite;
  target.totalTokens += source.totalTokens;
  target.totalCost += source.totalCost;
  target.missingCostEntries += source.missingCostEntries;
  target.entries += source.entries;
  return target;
}

export function mergeTotalsMap(
  target: Record<string, CostUsageTotals>,
  source: Record<string, CostUsageTotals>,
): Record<string, CostUsageTotals> {
  for (const [key, totals] of Object.entries(source)) {
    target[key] = addTotals(target[key] ?? emptyTotals(), totals);
  }
  return target;
}

function applyEvent(totals: CostUsageTotals, event: UsageEvent, costUSD: number | undefined) {
  const { usage } = event;
  totals.input += usage.input;
  totals.output += usage.output;
  totals.cacheRead += usage.cacheRead;
  totals.cacheWrite += usage.cacheWrite;
  totals.totalTokens += usage.input + usage.output + usage.cacheRead + usage.cacheWrite;
  totals.entries += 1;
  if (costUSD === undefined) totals.missingCostEntries += 1;
  else totals.totalCost += costUSD;
}

function bucket(map: Record<string, CostUsageTotals>, key: string): CostUsageTotals {
  const existing = map[key];
  if (existing) return existing;
  const created = emptyTotals();
  map[key] = created;
  return created;
}

function cloneTotalsMap(map: Record<string, CostUsageTotals>): Record<string, CostUsageTotals> {
  const out: Record<string, CostUsageTotals> = {};
  for (const [key, totals] of Object.entries(map)) out[key] = { ...totals };
  return out;
}

function cloneState(state: LogFormatState): LogFormatState {
  return {
    ...state,
    codexTotals: state.codexTotals ? { ...state.codexTotals } : undefined,
    seenMessageKeys: new Set(state.seenMessageKeys),
  };
}

function dayKey(timestamp: string | undefined): string | undefined {
  return timestamp && /^\d{4}-\d{2}-\d{2}/.test(timestamp) ? timestamp.slice(0, 10) : undefined;
}

async function hashHead(handle: fs.promises.FileHandle, length: number): Promise<string> {
  const size = Math.min(HEAD_HASH_BYTES, Math.max(0, length));
  const buffer = Buffer.alloc(size);
  let read = 0;
  while (read < size) {
    const { bytesRead } = await handle.read(buffer, read, size - read, read);
    if (bytesRead === 0) break;
    read += bytesRead;
  }
  return crypto.createHash("sha1").update(buffer.subarray(0, read)).digest("hex");
}

type LineVisitor = (line: Buffer, offset: number) => void;

/**
 * Calls `visit` for each `\n`-terminated line in [start, end) and returns the offset after
 * the last complete line. A trailing partial line is left unread.
 */
async function readCompleteLines(
  handle: fs.promises.FileHandle,
  start: number,
  end: number,
  visit: LineVisitor,
  signal?: AbortSignal,
): Promise<number> {
  let position = start;
  let consumed = start;
  let carry = Buffer.alloc(0);
  const chunk = Buffer.alloc(READ_CHUNK_BYTES);
  while (position < end) {
    throwIfAborted(signal);
    const { bytesRead } = await handle.read(chunk, 0, Math.min(chunk.length, end - position), position);
    if (bytesRead === 0) break;
    position += bytesRead;
    const data = carry.length > 0 ? Buffer.concat([carry, chunk.subarray(0, bytesRead)]) : chunk.subarray(0, bytesRead);
    let lineStart = 0;
    let newline = data.indexOf(NEWLINE, lineStart);
    while (newline !== -1) {
      let lineEnd = newline;
      if (lineEnd > lineStart && data[lineEnd - 1] === CARRIAGE_RETURN) lineEnd -= 1;
      visit(data.subarray(lineStart, lineEnd), consumed);
      consumed += newline + 1 - lineStart;
      lineStart = newline + 1;
      newline = data.indexOf(NEWLINE, lineStart);
    }
    carry = Buffer.from(data.subarray(lineStart));
  }
  return consumed;
}

const TotalsSchema = z.object({
  input: z.number(),
  output: z.number(),
  cacheRead: z.number(),
  cacheWrite: z.number(),
  totalTokens: z.number(),
  totalCost: z.number(),
  missingCostEntries: z.number(),
  entries: z.number(),
});

const PersistedEntrySchema = z.object({
  path: z.string(),
  offset: z.number().int().nonnegative(),
  lines: z.number().int().nonnegative(),
  fingerprint: z.object({
    size: z.number(),
    mtimeMs: z.number(),
    ino: z.number(),
    headHash: z.string(),
  }),
  totals: TotalsSchema,
  byEvent: z.record(z.string(), TotalsSchema),
  byDay: z.record(z.string(), TotalsSchema),
  byModel: z.record(z.string(), TotalsSchema),
  state: z.object({
    lastModel: z.string().optional(),
    codexTotals: z.object({ input: z.number(), cached: z.number(), output: z.number() }).optional(),
    seenMessageKeys: z.array(z.string()),
  }),
  updatedAt: z.number(),
});

type PersistedEntry = z.infer<typeof PersistedEntrySchema>;

function toPersisted(entry: ScanCacheEntry): PersistedEntry {
  return { ...entry, state: { ...entry.state, seenMessageKeys: [...entry.state.seenMessageKeys] } };
}

function fromPersisted(entry: PersistedEntry): ScanCacheEntry {
  return { ...entry, state: { ...entry.state, seenMessageKeys: new Set(entry.state.seenMessageKeys) } };
}

function resultFromEntry(
  filePath: string,
  entry: ScanCacheEntry | undefined,
  extra: Pick<ScanResult, "delta" | "parseErrors" | "reset"> & { skipped?: "locked" },
): ScanResult {
  return {
    path: filePath,
    totals: entry ? { ...entry.totals } : emptyTotals(),
    byEvent: entry ? cloneTotalsMap(entry.byEvent) : {},
    byDay: entry ? cloneTotalsMap(entry.byDay) : {},
    byModel: entry ? cloneTotalsMap(entry.byModel) : {},
    ...extra,
  };
}

/**
 * Incremental cost scanner for append-only JSONL session logs. Each file keeps its byte
 * offset, a fingerprint and the running totals; a scan parses only what was appended.
 */
export class JsonlScanner {
  private readonly entries = new Map<string, ScanCacheEntry>();
  private readonly locks = new KeyedMutex();
  private readonly pricing: PricingTable;
  private readonly lockTimeoutMs: number;
  private readonly cachePath?: string;
  private readonly now: () => number;

  constructor(opts: JsonlScannerOptions = {}) {
    this.pricing = opts.pricing ?? loadDefaultPricing();
    this.lockTimeoutMs = opts.lockTimeoutMs ?? DEFAULT_SCANNER_LOCK_TIMEOUT_MS;
    this.cachePath = opts.cachePath;
    this.now = opts.now ?? Date.now;
    if (this.cachePath) this.load(this.cachePath);
  }

  peek(filePath: string): ScanCacheEntry | undefined {
    return this.entries.get(path.resolve(filePath));
  }

  get size(): number {
    return this.entries.size;
  }

  async scan(filePath: string, opts: ScanOptions = {}): Promise<ScanResult> {
    const key = path.resolve(filePath);
    throwIfAborted(opts.signal);
    const release = await this.locks.tryAcquire(key, this.lockTimeoutMs);
    if (!release) {
      log.debug(`scan of ${key} skipped: another scan holds the lock`);
      return resultFromEntry(key, this.entries.get(key), {
        delta: emptyTotals(),
        parseErrors: [],
        reset: false,
        skipped: "locked",
      });
    }
    try {
      return await this.scanLocked(key, opts.signal);
    } finally {
      release();
    }
  }

  /** Scans every `*.jsonl` under `root` in path order and sums the results. */
  async scanDirectory(root: string, opts: DirectoryScanOptions = {}): Promise<DirectoryScanResult> {
    const resolvedRoot = path.resolve(root);
    const sinceMs =
      opts.days !== undefined ? this.now() - Math.max(1, Math.floor(opts.days)) * DAY_MS : undefined;
    const files = await listJsonlFiles(resolvedRoot, { sinceMs });
    const summary: DirectoryScanResult = {
      root: resolvedRoot,
      files: [],
      delta: emptyTotals(),
      totals: emptyTotals(),
      byEvent: {},
      byDay: {},
      byModel: {},
      parseErrors: 0,
      skipped: 0,
    };
    for (const file of files) {
      const result = await this.scan(file, { signal: opts.signal });
      summary.files.push(result);
      addTotals(summary.delta, result.delta);
      addTotals(summary.totals, result.totals);
      mergeTotalsMap(summary.byEvent, result.byEvent);
      mergeTotalsMap(summary.byDay, result.byDay);
      mergeTotalsMap(summary.byModel, result.byModel);
      summary.parseErrors += result.parseErrors.length;
      if (result.skipped) summary.skipped += 1;
    }
    log.debug(`scanned ${files.length} log file(s) under ${resolvedRoot}`, {
      entries: summary.delta.entries,
    });
    return summary;
  }

  /** Forgets one file, or every file. */
  reset(filePath?: string): void {
    if (filePath === undefined) this.entries.clear();
    else this.entries.delete(path.resolve(filePath));
    this.persist();
  }

  private async scanLocked(key: string, signal?: AbortSignal): Promise<ScanResult> {
    const previous = this.entries.get(key);
    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(key, "r");
    } catch (err) {
      if (extractErrorCode(err) !== "ENOENT") throw err;
      if (previous) {
        this.entries.delete(key);
        this.persist();
      }
      return resultFromEntry(key, undefined, { delta: emptyTotals(), parseErrors: [], reset: Boolean(previous) });
    }

    try {
      const stat = await handle.stat();
      let reset = false;
      if (previous) {
        const replaced =
          stat.size < previous.offset ||
          stat.ino !== previous.fingerprint.ino ||
          (await hashHead(handle, previous.offset)) !== previous.fingerprint.headHash;
        if (replaced) {
          log.info(`log file was replaced or truncated; rescanning ${key}`);
          reset = true;
        }
      }
      const base = reset ? undefined : previous;
      if (base && stat.size === base.offset) {
        return resultFromEntry(key, base, { delta: emptyTotals(), parseErrors: [], reset });
      }

      const delta = emptyTotals();
      const totals = base ? { ...base.totals } : emptyTotals();
      const byEvent = base ? cloneTotalsMap(base.byEvent) : {};
      const byDay = base ? cloneTotalsMap(base.byDay) : {};
      const byModel = base ? cloneTotalsMap(base.byModel) : {};
      const state = base ? cloneState(base.state) : createLogFormatState();
      const parseErrors: ParseError[] = [];
      let lines = base?.lines ?? 0;

      const offset = await readCompleteLines(
        handle,
        base?.offset ?? 0,
        stat.size,
        (raw, lineOffset) => {
          lines += 1;
          const text = raw.toString("utf8").trim();
          if (!text) return;
          let parsed: unknown;
          try {
            parsed = JSON.parse(text);
          } catch (err) {
            parseErrors.push({ line: lines, offset: lineOffset, message: formatErrorMessage(err) });
            return;
          }
          const event = extractUsageEvent(parsed, state);
          if (!event) return;
          const costUSD = event.costUSD ?? estimateCost(this.pricing, event.model, event.usage);
          applyEvent(delta, event, costUSD);
          applyEvent(totals, event, costUSD);
          applyEvent(bucket(byEvent, event.eventType), event, costUSD);
          applyEvent(bucket(byModel, event.model ?? "unknown"), event, costUSD);
          const day = dayKey(event.timestamp);
          if (day) applyEvent(bucket(byDay, day), event, costUSD);
        },
        signal,
      );

      const headHash = await hashHead(handle, offset);
      throwIfAborted(signal);
      const entry: ScanCacheEntry = {
        path: key,
        offset,
        lines,
        fingerprint: { size: stat.size, mtimeMs: stat.mtimeMs, ino: stat.ino, headHash },
        totals,
        byEvent,
        byDay,
        byModel,
        state,
        updatedAt: this.now(),
      };
      this.entries.set(key, entry);
      this.persist();
      if (parseErrors.length > 0) {
        log.warn(`${parseErrors.length} malformed line(s) in ${key}`, { firstLine: parseErrors[0].line });
      }
      return resultFromEntry(key, entry, { delta, parseErrors, reset });
    } finally {
      await handle.close();
    }
  }

  private persist(): void {
    if (!this.cachePath) return;
    const entries: Record<string, PersistedEntry> = {};
    for (const [key, entry] of this.entries) entries[key] = toPersisted(entry);
    try {
      saveJsonFile(this.cachePath, { version: CACHE_FILE_VERSION, entries });
    } catch (err) {
      log.warn("failed to persist scan cache", { error: formatErrorMessage(err) });
    }
  }

  private load(cachePath: string): void {
    const raw = loadJsonFile(cachePath);
    if (!isRecord(raw) || raw.version !== CACHE_FILE_VERSION || !isRecord(raw.entries)) return;
    for (const [key, value] of Object.entries(raw.entries)) {
      const parsed = PersistedEntrySchema.safeParse(value);
      if (parsed.success) this.entries.set(key, fromPersisted(parsed.data));
    }
  }
}
