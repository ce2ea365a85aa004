// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════

/** Parse listing price "1,250,000" → 1250000 (null when unparseable or negative) */
export function parsePrice(raw: string | null | undefined): number | null {
  if (raw == null) return null;
  const cleaned = raw.replace(/[,\s]/g, '');
  if (!cleaned) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) && n >= 0 ? n : null;
}

/** Parse a plain decimal field (null for blank, "NA" or non-numeric) */
export function parseNumber(raw: string | null | undefined): number | null {
  if (raw == null) return null;
  const s = raw.trim();
  if (!s || s.toUpperCase() === 'NA') return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Latitude / longitude within ±limit degrees */
export function parseCoordinate(raw: string | null | undefined, limit: 90 | 180): number | null {
  const n = parseNumber(raw);
  if (n === null || n < -limit || n > limit) return null;
  return n;
}

/** Room counts: non-negative integers only */
export function parseCount(raw: string | null | undefined): number | null {
  const n = parseNumber(raw);
  if (n === null || n < 0 || !Number.isInteger(n)) return null;
  return n;
}

/** Trimmed non-empty text, or null */
export function parseText(raw: string | null | undefined): string | null {
  const s = raw?.trim();
  return s ? s : null;
}

export const round2 = (n: number): number => +n.toFixed(2);

/** Arithmetic mean (0 for empty input) */
export function mean(values: readonly number[]): number {
  if (!values.length) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Distinct values sorted alphabetically */
export function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort((a, b) => a.localeCompare(b));
}

/** Same members regardless of order or duplicates */
export function sameMembers(a: readonly string[], b: readonly string[]): boolean {
  const sa = new Set(a);
  const sb = new Set(b);
  if (sa.size !== sb.size) return false;
  for (const v of sa) if (!sb.has(v)) return false;
  return true;
}

/**
 * Mulberry32 — small seeded PRNG returning floats in [0, 1).
 * Same seed, same sequence; used to synthesize household income reproducibly.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Whole-dollar draw from uniform [min, max] */
export function drawUniform(rng: () => number, min: number, max: number): number {
  return Math.round(min + rng() * (max - min));
}

const cadFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });

/** 1250000 → "1,250,000" */
export const formatThousands = (n: number): string => cadFormat.format(n);
