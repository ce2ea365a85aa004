// ═══════════════════════════════════════════════════════
// table-style.ts — Conditional cell colouring for the summary table
// Dark blue (low) → light blue (high), 100 steps per column.
// ═══════════════════════════════════════════════════════
import type { StyleToken, SummaryColumn, SummaryRow, StyledSummaryRow } from '../types.ts';

const RAMP_FROM = [0x08, 0x30, 0x6b] as const;   // #08306B
const RAMP_TO = [0xde, 0xeb, 0xf7] as const;     // #DEEBF7
const LEVELS = 100;
const DARK_LEVEL_MAX = 40;                       // white text at or below this level

export const SUMMARY_COLUMNS: readonly SummaryColumn[] = ['avgPrice', 'medianPrice', 'minPrice', 'maxPrice', 'listings'];

const hex = (n: number): string => n.toString(16).toUpperCase().padStart(2, '0');

/** Colour of ramp step `level` (1..100), linear in RGB. */
export function rampColor(level: number): string {
  const t = (level - 1) / (LEVELS - 1);
  const rgb = RAMP_FROM.map((from, i) => Math.round(from + (RAMP_TO[i] - from) * t));
  return `#${rgb.map(hex).join('')}`;
}

/** Style for one cell given its column's range. */
export function valueToStyle(value: number, columnMin: number, columnMax: number): StyleToken {
  const normalized = (value - columnMin) / (columnMax - columnMin + 1e-9);
  const level = Math.min(LEVELS, Math.max(1, Math.ceil(normalized * LEVELS)));
  return {
    background: rampColor(level),
    color: level <= DARK_LEVEL_MAX ? 'white' : 'black',
    level,
  };
}

export function styleSummary(rows: readonly SummaryRow[]): StyledSummaryRow[] {
  const ranges = new Map<SummaryColumn, { lo: number; hi: number }>();
  for (const col of SUMMARY_COLUMNS) {
    let lo = Infinity, hi = -Infinity;
    for (const r of rows) { lo = Math.min(lo, r[col]); hi = Math.max(hi, r[col]); }
    ranges.set(col, { lo, hi });
  }

  return rows.map(r => {
    const style = (col: SummaryColumn): StyleToken => {
      const range = ranges.get(col) ?? { lo: r[col], hi: r[col] };
      return valueToStyle(r[col], range.lo, range.hi);
    };
    return {
      ...r,
      styles: {
        avgPrice: style('avgPrice'),
        medianPrice: style('medianPrice'),
        minPrice: style('minPrice'),
        maxPrice: style('maxPrice'),
        listings: style('listings'),
      },
    };
  });
}
