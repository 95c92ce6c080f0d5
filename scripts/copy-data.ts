#!/usr/bin/env tsx
/**
 * Copy JSON data tables from src/ into dist/ next to the modules that read them.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
const srcRoot = path.join(projectRoot, "src");
const distRoot = path.join(projectRoot, "dist");

function copyJsonTree(dir: string): number {
  let copied = 0;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      copied += copyJsonTree(fullPath);
      continue;
    }
    if (!entry.isFile() || !entry.name.endsWith(".json")) continue;
    const target = path.join(distRoot, path.relative(srcRoot, fullPath));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.copyFileSync(fullPath, target);
    console.log(`[copy-data] ${path.relative(projectRoot, fullPath)}`);
    copied += 1;
  }
  return copied;
}

if (!fs.existsSync(distRoot)) {
  console.warn("[copy-data] dist/ not found; run tsc first");
  process.exit(1);
}
const count = copyJsonTree(srcRoot);
console.log(`[copy-data] Done (${count} files)`);
