import type { ConfigValidationIssue, UsagebarConfig } from "./types.js";
import { UsagebarSchema } from "./zod-schema.js";

const KNOWN_BROWSER_ROOT_HINT = "cookies.browserRoots keys are browser ids (chrome, edge, ...)";

export function validateConfigObject(
  raw: unknown,
): { ok: true; config: UsagebarConfig } | { ok: false; issues: ConfigValidationIssue[] } {
  const validated = UsagebarSchema.safeParse(raw);
  if (!validated.success) {
    return {
      ok: false,
      issues: validated.error.issues.map((iss) => ({
        path: iss.path.join("."),
        message:
          iss.path[0] === "cookies" && iss.path[1] === "browserRoots"
            ? `${iss.message} (${KNOWN_BROWSER_ROOT_HINT})`
            : iss.message,
      })),
    };
  }
  const issues: ConfigValidationIssue[] = [];
  for (const [id, provider] of Object.entries(validated.data.providers ?? {})) {
    const seen = new Set<string>();
    for (const [index, strategy] of (provider.strategies ?? []).entries()) {
      const strategyId = strategy.id ?? `${id}.${strategy.kind}`;
      if (seen.has(strategyId)) {
        issues.push({
          path: `providers.${id}.strategies.${index}`,
          message: `duplicate strategy id "${strategyId}"`,
        });
      }
      seen.add(strategyId);
      const retry = strategy.retry;
      if (
        retry?.minDelayMs !== undefined &&
        retry.maxDelayMs !== undefined &&
        retry.maxDelayMs < retry.minDelayMs
      ) {
        issues.push({
          path: `providers.${id}.strategies.${index}.retry`,
          message: "maxDelayMs must be >= minDelayMs",
        });
      }
    }
  }
  if (issues.length > 0) return { ok: false, issues };
  return { ok: true, config: validated.data };
}
