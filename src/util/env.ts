/**
 * @file src/util/env.ts
 * @description
 * Environment readers with defaults. Malformed values fail fast naming the variable.
 */

export function envInt(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 0 || String(n) !== raw) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return n;
}

export function envBool(name: string, fallback = false): boolean {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  return /^(true|1|yes)$/i.test(raw);
}

export function envString(name: string, fallback: string): string {
  return process.env[name]?.trim() || fallback;
}

/** Payment-proof size cap in bytes */
export function maxUploadBytes(): number {
  return envInt("MAX_UPLOAD_BYTES", 5 * 1024 * 1024);
}

/** Age after which an untouched rejected order counts as abandoned */
export function rejectedHoldMs(): number {
  return envInt("REJECTED_HOLD_MS", 7 * 24 * 60 * 60 * 1000);
}
