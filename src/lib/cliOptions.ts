/**
 * Validation of command-line option strings. Mirrors the API-route validators:
 * each returns { ok: true, ... } or { ok: false, error }.
 */

export function parseSeedOption(value: string | undefined): { ok: true; seed?: number } | { ok: false; error: string } {
  if (value === undefined) return { ok: true };
  const trimmed = value.trim();
  const n = Number(trimmed);
  if (trimmed === "" || !Number.isInteger(n)) return { ok: false, error: "--seed must be an integer" };
  return { ok: true, seed: n };
}

export function parseSampleSizeOption(
  value: string | undefined
): { ok: true; sampleSize?: number } | { ok: false; error: string } {
  if (value === undefined) return { ok: true };
  const n = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(n) || n < 1) {
    return { ok: false, error: "--samples must be a positive integer" };
  }
  return { ok: true, sampleSize: n };
}

/** Monetary option; range checks are left to TreatyTermsSchema. */
export function parseAmountOption(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  return value.trim() === "" ? Number.NaN : Number(value);
}
