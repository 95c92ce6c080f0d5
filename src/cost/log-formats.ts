import { z } from "zod";

import type { TokenUsage } from "./pricing.js";

export type UsageEventType = "codex.token_count" | "claude.assistant" | "message";

export type UsageEvent = {
  eventType: UsageEventType;
  model?: string;
  usage: TokenUsage;
  /** Cost the writing tool recorded itself; wins over estimates. */
  costUSD?: number;
  /** ISO-8601 timestamp of the line, when it has one. */
  timestamp?: string;
};

export type CodexCounters = {
  input: number;
  cached: number;
  output: number;
};

/** Per-file parser state; it outlives one scan so deltas and dedupe span appends. */
export type LogFormatState = {
  lastModel?: string;
  codexTotals?: CodexCounters;
  seenMessageKeys: Set<string>;
};

/** Codex falls back to this when a session never names its model. */
export const DEFAULT_CODEX_MODEL = "gpt-5";

const count = z.number().optional();

const CodexTokenUsageSchema = z.object({
  input_tokens: count,
  cached_input_tokens: count,
  cache_read_input_tokens: count,
  output_tokens: count,
});

const CodexTokenCountSchema = z.object({
  type: z.literal("event_msg"),
  timestamp: z.string().optional(),
  model: z.string().optional(),
  payload: z.object({
    type: z.literal("token_count"),
    model: z.string().optional(),
    info: z
      .object({
        model: z.string().optional(),
        model_name: z.string().optional(),
        total_token_usage: CodexTokenUsageSchema.optional(),
        last_token_usage: CodexTokenUsageSchema.optional(),
      })
      .nullable()
      .optional(),
  }),
});

const CodexTurnContextSchema = z.object({
  type: z.literal("turn_context"),
  payload: z.object({
    model: z.string().optional(),
    info: z.object({ model: z.string().optional() }).optional(),
  }),
});

const ClaudeAssistantSchema = z.object({
  type: z.literal("assistant"),
  timestamp: z.string().optional(),
  requestId: z.string().optional(),
  costUSD: z.number().optional(),
  message: z.object({
    id: z.string().optional(),
    model: z.string().optional(),
    usage: z.object({
      input_tokens: count,
      output_tokens: count,
      cache_creation_input_tokens: count,
      cache_read_input_tokens: count,
    }),
  }),
});

const CostSchema = z.object({ total: z.number().optional() });

const UsageLikeSchema = z.object({
  input: count,
  output: count,
  cacheRead: count,
  cacheWrite: count,
  inputTokens: count,
  outputTokens: count,
  promptTokens: count,
  completionTokens: count,
  input_tokens: count,
  output_tokens: count,
  prompt_tokens: count,
  completion_tokens: count,
  cache_read: count,
  cache_write: count,
  cache_read_input_tokens: count,
  cache_creation_input_tokens: count,
  cost: CostSchema.optional(),
});

const GenericMessageSchema = z.object({
  timestamp: z.union([z.string(), z.number()]).optional(),
  model: z.string().optional(),
  cost: CostSchema.optional(),
  message: z.object({
    model: z.string().optional(),
    timestamp: z.number().optional(),
    usage: UsageLikeSchema,
  }),
});

function tokens(value: number | undefined): number {
  return typeof value === "number" && Number.isFinite(value) ? Math.max(0, Math.round(value)) : 0;
}

function cost(value: number | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function isEmpty(usage: TokenUsage): boolean {
  return usage.input === 0 && usage.output === 0 && usage.cacheRead === 0 && usage.cacheWrite === 0;
}

function toIsoTimestamp(value: string | number | undefined): string | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.valueOf()) ? undefined : date.toISOString();
}

export function createLogFormatState(): LogFormatState {
  return { seenMessageKeys: new Set() };
}

function codexCounters(usage: z.infer<typeof CodexTokenUsageSchema>): CodexCounters {
  return {
    input: tokens(usage.input_tokens),
    cached: tokens(usage.cached_input_tokens ?? usage.cache_read_input_tokens),
    output: tokens(usage.output_tokens),
  };
}

function parseCodexTokenCount(
  line: z.infer<typeof CodexTokenCountSchema>,
  state: LogFormatState,
): UsageEvent | null {
  const info = line.payload.info ?? undefined;
  let delta: CodexCounters;
  if (info?.total_token_usage) {
    // Totals are cumulative per session; only the growth since the last line counts.
    const current = codexCounters(info.total_token_usage);
    const previous = state.codexTotals ?? { input: 0, cached: 0, output: 0 };
    delta = {
      input: Math.max(0, current.input - previous.input),
      cached: Math.max(0, current.cached - previous.cached),
      output: Math.max(0, current.output - previous.output),
    };
    state.codexTotals = current;
  } else if (info?.last_token_usage) {
    delta = codexCounters(info.last_token_usage);
  } else {
    return null;
  }
  const cached = Math.min(delta.cached, delta.input);
  const usage: TokenUsage = { input: delta.input - cached, cacheRead: cached, cacheWrite: 0, output: delta.output };
  if (isEmpty(usage)) return null;
  return {
    eventType: "codex.token_count",
    model: info.model ?? info.model_name ?? line.payload.model ?? line.model ?? state.lastModel ?? DEFAULT_CODEX_MODEL,
    usage,
    timestamp: toIsoTimestamp(line.timestamp),
  };
}

function parseClaudeAssistant(
  line: z.infer<typeof ClaudeAssistantSchema>,
  state: LogFormatState,
): UsageEvent | null {
  const { id } = line.message;
  if (id && line.requestId) {
    // Claude rewrites streamed messages; one message:request pair is billed once.
    const key = `${id}:${line.requestId}`;
    if (state.seenMessageKeys.has(key)) return null;
    state.seenMessageKeys.add(key);
  }
  const raw = line.message.usage;
  const usage: TokenUsage = {
    input: tokens(raw.input_tokens),
    output: tokens(raw.output_tokens),
    cacheRead: tokens(raw.cache_read_input_tokens),
    cacheWrite: tokens(raw.cache_creation_input_tokens),
  };
  if (isEmpty(usage)) return null;
  return {
    eventType: "claude.assistant",
    model: line.message.model,
    usage,
    costUSD: cost(line.costUSD),
    timestamp: toIsoTimestamp(line.timestamp),
  };
}

function parseGenericMessage(line: z.infer<typeof GenericMessageSchema>): UsageEvent | null {
  const raw = line.message.usage;
  const usage: TokenUsage = {
    input: tokens(raw.input ?? raw.inputTokens ?? raw.input_tokens ?? raw.promptTokens ?? raw.prompt_tokens),
    output: tokens(
      raw.output ?? raw.outputTokens ?? raw.output_tokens ?? raw.completionTokens ?? raw.completion_tokens,
    ),
    cacheRead: tokens(raw.cacheRead ?? raw.cache_read ?? raw.cache_read_input_tokens),
    cacheWrite: tokens(raw.cacheWrite ?? raw.cache_write ?? raw.cache_creation_input_tokens),
  };
  if (isEmpty(usage)) return null;
  return {
    eventType: "message",
    model: line.message.model ?? line.model,
    usage,
    costUSD: cost(raw.cost?.total ?? line.cost?.total),
    timestamp: toIsoTimestamp(line.timestamp ?? line.message.timestamp),
  };
}

/**
 * Usage carried by one parsed JSONL line, or null when the line is not a usage record.
 * Updates `state` for Codex turn context and totals and for Claude message dedupe.
 */
export function extractUsageEvent(line: unknown, state: LogFormatState): UsageEvent | null {
  const tokenCount = CodexTokenCountSchema.safeParse(line);
  if (tokenCount.success) return parseCodexTokenCount(tokenCount.data, state);

  const turnContext = CodexTurnContextSchema.safeParse(line);
  if (turnContext.success) {
    const model = turnContext.data.payload.model ?? turnContext.data.payload.info?.model;
    if (model) state.lastModel = model;
    return null;
  }

  const assistant = ClaudeAssistantSchema.safeParse(line);
  if (assistant.success) return parseClaudeAssistant(assistant.data, state);

  const generic = GenericMessageSchema.safeParse(line);
  if (generic.success) return parseGenericMessage(generic.data);
  return null;
}
