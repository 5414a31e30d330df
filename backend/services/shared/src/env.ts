// backend/services/shared/src/env.ts
/**
 * Why:
 * - Deterministic environment loading for every service with strict
 *   precedence: repo root → service root. Later wins.
 * - Values already present in process.env (injected by the platform or a
 *   test setup) are never overridden by files.
 *
 * Notes:
 * - Only env cascade + validators live here. Boot policy is in each
 *   service's bootstrap.ts.
 */

import fs from "node:fs";
import path from "node:path";
import * as dotenv from "dotenv";
import { expand } from "dotenv-expand";

/** Walk up to the nearest directory holding .git or package-lock.json. */
export function findRepoRoot(start: string): string {
  let dir = path.resolve(start);
  for (;;) {
    const hasGit = fs.existsSync(path.join(dir, ".git"));
    const hasLock = fs.existsSync(path.join(dir, "package-lock.json"));
    if (hasGit || hasLock) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(start, "..", "..", "..");
}

/** Env file names tried at each layer for the current NODE_ENV. */
export function envFileNames(nodeEnv = process.env.NODE_ENV): string[] {
  const mode = (nodeEnv ?? "development").trim();
  if (mode === "production") return [".env"];
  if (mode === "test") return [".env", ".env.test"];
  return [".env", ".env.dev"];
}

/** Merge a single env file into `merged` if it exists; return true if loaded. */
function loadIfExists(
  absPath: string,
  merged: Record<string, string>
): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.parse(fs.readFileSync(absPath));
  Object.assign(merged, parsed);
  return true;
}

/**
 * Load env files from the repo root, then the service directory.
 * Returns the absolute paths that were loaded, in order.
 */
export function loadEnvCascade(serviceDir: string): string[] {
  const root = findRepoRoot(serviceDir);
  const layers = root === path.resolve(serviceDir) ? [root] : [root, serviceDir];

  const merged: Record<string, string> = {};
  const loaded: string[] = [];
  for (const dir of layers) {
    for (const name of envFileNames()) {
      const abs = path.resolve(dir, name);
      if (loadIfExists(abs, merged)) loaded.push(abs);
    }
  }

  const expanded = expand({
    parsed: merged,
    processEnv: {},
  });
  const values = expanded.parsed ?? merged;
  for (const [k, v] of Object.entries(values)) {
    if (process.env[k] === undefined) process.env[k] = v;
  }
  return loaded;
}

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (v == null || v.trim() === "") {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

export function requireNumber(name: string): number {
  const raw = requireEnv(name);
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

/** Fail fast when any of `names` is missing; reports all of them at once. */
export function assertEnv(names: string[]): void {
  const missing = names.filter((n) => {
    const v = process.env[n];
    return v == null || v.trim() === "";
  });
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}
