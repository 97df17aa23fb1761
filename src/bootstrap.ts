// src/bootstrap.ts
/**
 * Purpose:
 * - Load optional env files before config validation.
 *
 * Order (first value wins, dotenv never overrides):
 *   real environment → .env.<NODE_ENV> → .env
 *
 * Notes:
 * - Missing files are fine; production usually injects env directly.
 * - Only env loading lives here. Validation is config.ts.
 */

import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { expand } from "dotenv-expand";

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = loadDotenv({ path: absPath });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return true;
}

export function envFileCandidates(cwd: string, mode: string): string[] {
  const m = mode.trim();
  const names = m ? [`.env.${m}`, ".env"] : [".env"];
  return names.map((n) => path.resolve(cwd, n));
}

/** Returns the files that were actually loaded, in load order. */
export function loadEnvFiles(
  cwd: string = process.cwd(),
  mode: string = process.env.NODE_ENV ?? "dev"
): string[] {
  return envFileCandidates(cwd, mode).filter((p) => loadIfExists(p));
}
