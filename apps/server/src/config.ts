// Validation service configuration.
//
// Source of truth: config/runtime_state/default.json (strict schema).
// Env overrides are applied on top and the merged result is re-validated.

import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

export const CONFIG_RELATIVE_PATH = path.join("config", "runtime_state", "default.json");

const LogLevelZ = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const RuntimeStateServiceConfigV1Z = z
  .object({
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    server: z
      .object({
        host: z.string().min(1),
        port: z.number().int().min(0).max(65535),
        body_limit_bytes: z.number().int().positive()
      })
      .strict(),
    logging: z.object({ level: LogLevelZ }).strict(),
    stream: z.object({ max_records: z.number().int().positive() }).strict()
  })
  .strict();

export type RuntimeStateServiceConfigV1 = z.infer<typeof RuntimeStateServiceConfigV1Z>;

export type Env = Record<string, string | undefined>;

function loadDotEnvFile(fp: string, env: Env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (env[key] == null) env[key] = val;
  }
}

/**
 * Walks upward from `startDir` until `relativePath` exists.
 */
export function findRepoRoot(startDir: string, relativePath: string): string {
  let dir = path.resolve(startDir);
  for (;;) {
    if (fs.existsSync(path.join(dir, relativePath))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error(`CONFIG_NOT_FOUND: ${relativePath} (searched upward from ${startDir})`);
    dir = parent;
  }
}

export function resolveRepoRoot(env: Env, cwd: string): string {
  if (env.PMATRIX_REPO_ROOT) return path.resolve(env.PMATRIX_REPO_ROOT);
  return findRepoRoot(cwd, CONFIG_RELATIVE_PATH);
}

function intOverride(env: Env, key: string): number | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return undefined;
  if (!/^\d+$/.test(v.trim())) throw new Error(`CONFIG_INVALID: ${key} must be a non-negative integer, got ${v}`);
  return Number(v.trim());
}

/**
 * Applies PMATRIX_* overrides and validates the result.
 */
export function applyEnvOverrides(base: unknown, env: Env): RuntimeStateServiceConfigV1 {
  const cfg = parseConfig(base, "default.json");
  const port = intOverride(env, "PMATRIX_PORT");
  const maxRecords = intOverride(env, "PMATRIX_STREAM_MAX_RECORDS");

  return parseConfig(
    {
      ...cfg,
      server: { ...cfg.server, host: env.PMATRIX_HOST || cfg.server.host, port: port ?? cfg.server.port },
      logging: { level: env.PMATRIX_LOG_LEVEL || cfg.logging.level },
      stream: { max_records: maxRecords ?? cfg.stream.max_records }
    },
    "environment overrides"
  );
}

function parseConfig(value: unknown, source: string): RuntimeStateServiceConfigV1 {
  const result = RuntimeStateServiceConfigV1Z.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new Error(`CONFIG_INVALID (${source}): ${detail}`);
  }
  return result.data;
}

/**
 * Loads the service config: repo-root .env (never overriding real env vars),
 * then default.json, then PMATRIX_* overrides.
 */
export function loadServiceConfig(env: Env = process.env, cwd: string = process.cwd()): RuntimeStateServiceConfigV1 {
  const merged: Env = { ...env };
  const repoRoot = resolveRepoRoot(merged, cwd);
  loadDotEnvFile(path.join(repoRoot, ".env"), merged);

  const raw: unknown = JSON.parse(fs.readFileSync(path.join(repoRoot, CONFIG_RELATIVE_PATH), "utf8"));
  return applyEnvOverrides(raw, merged);
}
