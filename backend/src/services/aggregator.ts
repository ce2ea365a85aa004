/**
 * aggregator.ts — Group-by statistics over a filtered listing set
 *
 * Every function here is pure over its input rows and returns plain arrays
 * ready for the chart/table collaborators. Grouping goes through explicit Maps
 * keyed by the grouping attribute(s).
 */
import { median, min, max, quantileSorted } from 'simple-statistics';
import { mean, round2, formatThousands } from './helpers.ts';
import { pipelineRuns, comparisonRejections } from '../shared/metrics.ts';
import type {
  Listing, WorkingDataset, SummaryRow, IncomeSeriesPoint, ComparisonOutcome,
  HistogramBin, BoxStats, MapPoint,
} from '../types.ts';

export const COMPARISON_WARNING = 'Please select exactly two cities for comparison.';

const byText = (a: string, b: string): number => a.localeCompare(b);

function groupBy<K>(rows: readonly Listing[], key: (l: Listing) => K): Map<K, Listing[]> {
  const groups = new Map<K, Listing[]>();
  for (const l of rows) {
    const k = key(l);
    const bucket = groups.get(k);
    if (bucket) bucket.push(l);
    else groups.set(k, [l]);
  }
  return groups;
}

/** Per-city price summary, one row per city present, ordered by city. */
export function summarize(rows: readonly Listing[]): SummaryRow[] {
  pipelineRuns.inc({ stage: 'aggregate' });
  const out: SummaryRow[] = [];
  for (const [city, group] of groupBy(rows, l => l.city)) {
    const prices = group.map(l => l.price);
    out.push({
      city,
      avgPrice: round2(mean(prices)),
      medianPrice: median(prices),
      minPrice: min(prices),
      maxPrice: max(prices),
      listings: group.length,
    });
  }
  return out.sort((a, b) => byText(a.city, b.city));
}

/**
 * Average household income per (city, province), ordered by province then city.
 * Non-finite incomes are ignored; a group with none left is omitted.
 */
export function incomeByCity(rows: readonly Listing[]): IncomeSeriesPoint[] {
  const groups = new Map<string, { city: string; province: string; incomes: number[] }>();
  for (const l of rows) {
    const key = `${l.province}\u0000${l.city}`;
    let g = groups.get(key);
    if (!g) { g = { city: l.city, province: l.province, incomes: [] }; groups.set(key, g); }
    if (Number.isFinite(l.income)) g.incomes.push(l.income);
  }

  const out: IncomeSeriesPoint[] = [];
  for (const g of groups.values()) {
    if (g.incomes.length) out.push({ city: g.city, province: g.province, avgIncome: mean(g.incomes) });
  }
  return out.sort((a, b) => byText(a.province, b.province) || byText(a.city, b.city));
}

/**
 * Price series for exactly two distinct cities over the whole dataset.
 * Any other selection size yields an invalid outcome and no series.
 */
export function compareCities(dataset: WorkingDataset, selection: readonly string[]): ComparisonOutcome {
  const cities = [...new Set(selection.map(c => c.trim()).filter(Boolean))];
  if (cities.length !== 2) {
    comparisonRejections.inc();
    return { ok: false, reason: COMPARISON_WARNING, selected: cities.length };
  }

  pipelineRuns.inc({ stage: 'compare' });
  const [a, b] = cities;
  const prices: Record<string, number[]> = { [a]: [], [b]: [] };
  for (const l of dataset.listings) {
    if (l.city === a || l.city === b) prices[l.city]?.push(l.price);
  }
  return { ok: true, comparison: { cities: [a, b], prices, title: `Price Comparison: ${a} vs ${b}` } };
}

/**
 * Fixed-width price histogram. Bins are [start, start + width) aligned to
 * multiples of the width, contiguous from the lowest to the highest price.
 */
export function priceHistogram(rows: readonly Listing[], binWidth: number): HistogramBin[] {
  if (!rows.length) return [];
  const counts = new Map<number, number>();
  let lo = Infinity, hi = -Infinity;
  for (const l of rows) {
    const idx = Math.floor(l.price / binWidth);
    counts.set(idx, (counts.get(idx) ?? 0) + 1);
    if (idx < lo) lo = idx;
    if (idx > hi) hi = idx;
  }
  const bins: HistogramBin[] = [];
  for (let i = lo; i <= hi; i++) {
    bins.push({ start: i * binWidth, end: (i + 1) * binWidth, count: counts.get(i) ?? 0 });
  }
  return bins;
}

/** Five-number summary per city for the box plot, ordered by city. */
export function boxStatsByCity(rows: readonly Listing[]): BoxStats[] {
  const out: BoxStats[] = [];
  for (const [city, group] of groupBy(rows, l => l.city)) {
    const sorted = group.map(l => l.price).sort((a, b) => a - b);
    out.push({
      city,
      min: sorted[0],
      q1: quantileSorted(sorted, 0.25),
      median: quantileSorted(sorted, 0.5),
      q3: quantileSorted(sorted, 0.75),
      max: sorted[sorted.length - 1],
      count: sorted.length,
    });
  }
  return out.sort((a, b) => byText(a.city, b.city));
}

export function popupText(l: Listing): string {
  return `Price: $${formatThousands(l.price)}<br>Bedrooms: ${l.beds}<br>Bathrooms: ${l.baths}<br>City: ${l.city}<br>Province: ${l.province}`;
}

export function mapPoints(rows: readonly Listing[]): MapPoint[] {
  return rows.map(l => ({ lat: l.latitude, lng: l.longitude, popup: popupText(l) }));
}
