// backend/services/shared/src/env/envHelpers.ts
/**
 * Fail-fast env readers for service config modules.
 * - No hardcoded defaults for required vars; missing/blank throws.
 * - `source` defaults to process.env; tests pass a plain object.
 */

type EnvSource = Record<string, string | undefined>;

export function requireEnv(name: string, source: EnvSource = process.env): string {
  const v = source[name];
  if (v == null || String(v).trim() === "") {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

export function requireNumber(name: string, source: EnvSource = process.env): number {
  const raw = requireEnv(name, source);
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

export function optionalEnv(name: string, source: EnvSource = process.env): string | undefined {
  const v = source[name]?.trim();
  return v ? v : undefined;
}
