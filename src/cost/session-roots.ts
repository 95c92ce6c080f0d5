import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { resolveUserPath } from "../config/paths.js";

export type CostLogSource = "codex" | "claude";

export type CostLogRoot = {
  source: CostLogSource;
  path: string;
};

/**
 * Session log directories of the local coding agents, existing ones only:
 * `$CODEX_HOME/sessions` (default `~/.codex/sessions`, laid out as YYYY/MM/DD) and
 * `$CLAUDE_CONFIG_DIR/projects`, `~/.claude/projects`, `~/.config/claude/projects`.
 */
export function resolveCostLogRoots(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): CostLogRoot[] {
  const candidates: CostLogRoot[] = [];
  const codexHome = env.CODEX_HOME?.trim();
  candidates.push({
    source: "codex",
    path: codexHome
      ? path.join(resolveUserPath(codexHome, homedir), "sessions")
      : path.join(homedir(), ".codex", "sessions"),
  });
  const claudeConfig = env.CLAUDE_CONFIG_DIR?.trim();
  if (claudeConfig) {
    candidates.push({ source: "claude", path: path.join(resolveUserPath(claudeConfig, homedir), "projects") });
  }
  candidates.push({ source: "claude", path: path.join(homedir(), ".claude", "projects") });
  candidates.push({ source: "claude", path: path.join(homedir(), ".config", "claude", "projects") });

  const seen = new Set<string>();
  return candidates.filter((root) => {
    if (seen.has(root.path)) return false;
    seen.add(root.path);
    return fs.existsSync(root.path);
  });
}

export type ListJsonlOptions = {
  /** Only files modified at or after this time. */
  sinceMs?: number;
};

/** Every `*.jsonl` file under `root`, sorted by path. Unreadable directories are skipped. */
export async function listJsonlFiles(root: string, opts: ListJsonlOptions = {}): Promise<string[]> {
  const files: string[] = [];
  const walk = async (dir: string) => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true }).catch(() => []);
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }
      if (!entry.isFile() || !entry.name.toLowerCase().endsWith(".jsonl")) continue;
      if (opts.sinceMs !== undefined) {
        const stat = await fs.promises.stat(fullPath).catch(() => null);
        if (!stat || stat.mtimeMs < opts.sinceMs) continue;
      }
      files.push(fullPath);
    }
  };
  await walk(root);
  return files.sort();
}
