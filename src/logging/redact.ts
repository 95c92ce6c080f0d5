import { resolveLoggingConfig } from "./logger.js";

export type RedactSensitiveMode = "off" | "logs";

export type RedactOptions = {
  mode?: RedactSensitiveMode;
  /** Regex sources; `/body/flags` keeps its flags, bare sources match case-insensitively. */
  patterns?: string[];
};

const MASK_MIN_LENGTH = 18;
const MASK_KEEP_START = 6;
const MASK_KEEP_END = 4;
const MAX_META_DEPTH = 4;

// Order matters: a cookie header is masked whole before its pairs are looked at.
const DEFAULT_REDACT_PATTERNS: readonly string[] = [
  String.raw`\bCookie\s*:\s*([^\r\n]+)`,
  // Case-sensitive so cookie names like sessionKey fall through to the pair rule.
  String.raw`/\b[A-Z0-9_]*(?:KEY|TOKEN|SECRET|PASSWORD)\b\s*[=:]\s*(["']?)([^\s"'\\]+)\1/g`,
  String.raw`"(?:apiKey|key|token|accessToken|refreshToken|idToken|header|cookieHeader|value)"\s*:\s*"([^"]+)"`,
  String.raw`\b(?:sessionKey|session[_-]?token|__Secure-[A-Za-z0-9_.-]+|WorkosCursorSessionToken|auth[_-]?token)=([^;\s"']+)`,
  String.raw`Authorization\s*[:=]\s*Bearer\s+([A-Za-z0-9._\-+=]+)`,
  String.raw`\bBearer\s+([A-Za-z0-9._\-+=]{18,})\b`,
  String.raw`\b(sk-[A-Za-z0-9_-]{8,})\b`,
  String.raw`\b(gh[ou]_[A-Za-z0-9]{20,})\b`,
  String.raw`\b(AIza[0-9A-Za-z\-_]{20,})\b`,
  String.raw`\b(eyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]+)\b`,
];

const compiled = new Map<string, RegExp | null>();

function compilePattern(source: string): RegExp | null {
  const cached = compiled.get(source);
  if (cached !== undefined) return cached;
  let re: RegExp | null = null;
  if (source.trim()) {
    const literal = /^\/(.+)\/([gimsuy]*)$/.exec(source);
    try {
      re = literal
        ? new RegExp(literal[1], literal[2].includes("g") ? literal[2] : `${literal[2]}g`)
        : new RegExp(source, "gi");
    } catch {
      re = null;
    }
  }
  compiled.set(source, re);
  return re;
}

export function maskToken(token: string): string {
  if (token.length < MASK_MIN_LENGTH) return "***";
  return `${token.slice(0, MASK_KEEP_START)}…${token.slice(-MASK_KEEP_END)}`;
}

/** Masks the last non-empty capture group, or the whole match when the pattern has none. */
function maskMatch(match: string, captures: unknown[]): string {
  let secret = match;
  for (const capture of captures) {
    if (typeof capture === "string" && capture.length > 0) secret = capture;
  }
  return secret === match ? maskToken(match) : match.replace(secret, maskToken(secret));
}

function resolveOptions(options?: RedactOptions): { enabled: boolean; patterns: RegExp[] } {
  let cfg = options;
  if (!cfg) {
    const logging = resolveLoggingConfig();
    cfg = { mode: logging?.redactSensitive, patterns: logging?.redactPatterns };
  }
  const sources = cfg.patterns?.length ? cfg.patterns : DEFAULT_REDACT_PATTERNS;
  const patterns: RegExp[] = [];
  for (const source of sources) {
    const re = compilePattern(source);
    if (re) patterns.push(re);
  }
  return { enabled: cfg.mode !== "off", patterns };
}

function applyPatterns(text: string, patterns: RegExp[]): string {
  let out = text;
  for (const pattern of patterns) {
    // Replacer args end with offset and input; the defaults use no named groups.
    out = out.replace(pattern, (match: string, ...rest: unknown[]) => maskMatch(match, rest.slice(0, -2)));
  }
  return out;
}

export function redactSensitiveText(text: string, options?: RedactOptions): string {
  if (!text) return text;
  const { enabled, patterns } = resolveOptions(options);
  return enabled && patterns.length > 0 ? applyPatterns(text, patterns) : text;
}

function redactValue(value: unknown, patterns: RegExp[], depth: number): unknown {
  if (typeof value === "string") return applyPatterns(value, patterns);
  if (depth >= MAX_META_DEPTH || value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((item) => redactValue(item, patterns, depth + 1));
  if (value instanceof Error || value instanceof Date) return value;
  const out: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) out[key] = redactValue(nested, patterns, depth + 1);
  return out;
}

/** Redacts string leaves of log meta, including nested objects and arrays. */
export function redactLogMeta(
  meta: Record<string, unknown>,
  options?: RedactOptions,
): Record<string, unknown> {
  const { enabled, patterns } = resolveOptions(options);
  if (!enabled || patterns.length === 0) return meta;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) out[key] = redactValue(value, patterns, 0);
  return out;
}

export function getDefaultRedactPatterns(): string[] {
  return [...DEFAULT_REDACT_PATTERNS];
}
