/**
 * theme.ts — Single source of truth for design tokens and chart formatting
 *
 * All colors, number formats and table-cell styles are defined here.
 * No hardcoded hex values should appear in components.
 */
import type { HistogramBin, IncomePoint, StyleToken } from './types';

// ── Color Palette ──
export const colors = {
  // Brand
  accent: '#2563eb',
  accentLight: '#eff6ff',

  // Neutrals
  text: '#1b2d4b',
  textSub: '#475569',
  textMute: '#94a3b8',

  // Backgrounds
  bg: '#f8f9fb',
  card: '#ffffff',
  border: '#e5e5ee',

  // Semantic
  sky: '#0ea5e9',
  indigo: '#6366f1',
  violet: '#7c3aed',
  emerald: '#10b981',
  amber: '#d97706',
  red: '#dc2626',
  rose: '#e11d48',
  pink: '#ec4899',

  // Table ramp endpoints (dark → light blue)
  rampDark: '#08306B',
  rampLight: '#DEEBF7',

  // Functional
  warn: '#d97706',
  histogram: '#5b8db8',
} as const;

// ── Typography ──
export const fonts = {
  sans: '-apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif',
  mono: '"SF Mono", "Cascadia Code", "Fira Code", "JetBrains Mono", monospace',
} as const;

// ── Chart palette ──
export const chartColors = [
  colors.sky, colors.indigo, colors.violet, colors.rose,
  colors.emerald, colors.amber, colors.pink, '#14b8a6',
  colors.red, '#3b82f6',
] as const;

/** Stable per-province colour for the income line chart: index in the sorted province list. */
export function provinceColor(province: string, provinces: string[]): string {
  const i = provinces.indexOf(province);
  return i < 0 ? colors.textMute : chartColors[i % chartColors.length];
}

// ── Formatting ──
const cad = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** 749000 → "$749,000" */
export const formatCad = (v: number) => `$${cad.format(v)}`;

/** 1250000 → "$1.3M", 749000 → "$749K" */
export function formatCadShort(v: number): string {
  if (Math.abs(v) >= 1_000_000) return `$${(v / 1_000_000).toFixed(1)}M`;
  if (Math.abs(v) >= 1_000) return `$${Math.round(v / 1_000)}K`;
  return `$${v}`;
}

export const binLabel = (b: HistogramBin) => `${formatCadShort(b.start)}–${formatCadShort(b.end)}`;

/** Income line chart x-axis: cities by ascending average income, each name once. */
export const incomeAxisOrder = (points: IncomePoint[]) => [
  ...new Set([...points].sort((a, b) => a.avgIncome - b.avgIncome).map(p => p.city)),
];

/** Inline style for a summary-table cell from the server's style token. */
export const cellStyle = (t: StyleToken) => ({
  backgroundColor: t.background,
  color: t.color,
  fontFamily: fonts.mono,
});
