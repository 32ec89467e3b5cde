/**
 * Server config: env-based getters with safe parsing and clamped defaults.
 * Paths default to locations under the working directory.
 */

import { join } from "path";

function parseIntEnv(key: string, defaultVal: number, min: number, max: number): number {
  const raw = process.env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

/** HTTP port. Default 8080. */
export function getPort(): number {
  return parseIntEnv("PORT", 8080, 1, 65_535);
}

/** Directory of the document store (prompts.json, history.json). */
export function getDataDir(): string {
  return process.env.DATA_DIR || join(process.cwd(), ".data");
}

/** Directory served as static frontend. */
export function getPublicDir(): string {
  return process.env.PUBLIC_DIR || join(process.cwd(), "public");
}

/** Static defaults document used for seeding and reset. */
export function getDefaultsPath(): string {
  return process.env.DEFAULTS_PATH || join(process.cwd(), "config", "defaults.json");
}

/** Canned analysis result served by /api/demo-result. */
export function getDemoResultPath(): string {
  return process.env.DEMO_RESULT_PATH || join(process.cwd(), "config", "demo-result.json");
}

export function getOpenRouterBaseUrl(): string {
  return process.env.OPENROUTER_BASE_URL || "https://openrouter.ai/api/v1";
}

/** Timeout of the outbound test call. Default 30s. */
export function getOpenRouterTimeoutMs(): number {
  return parseIntEnv("OPENROUTER_TIMEOUT_MS", 30_000, 1_000, 120_000);
}
