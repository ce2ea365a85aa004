/**
 * filter.ts — Conjunctive listing filter
 *
 * A listing passes only when it satisfies every clause of the constraint set:
 * province, city, price range (inclusive), minimum beds, minimum baths.
 * No implicit "select all": an empty province or city selection matches nothing.
 */
import { sameMembers, uniqueSorted } from './helpers.ts';
import { pipelineRuns } from '../shared/metrics.ts';
import type { ConstraintSet, Listing, WorkingDataset } from '../types.ts';

export function matches(l: Listing, c: ConstraintSet, provinces: ReadonlySet<string>, cities: ReadonlySet<string>): boolean {
  return provinces.has(l.province)
    && cities.has(l.city)
    && l.price >= c.price.min && l.price <= c.price.max
    && l.beds >= c.minBeds
    && l.baths >= c.minBaths;
}

/** Stable filter: output keeps the input order. */
export function filterListings(rows: readonly Listing[], c: ConstraintSet): Listing[] {
  pipelineRuns.inc({ stage: 'filter' });
  if (c.provinces.length === 0 || c.cities.length === 0) return [];
  const provinces = new Set(c.provinces);
  const cities = new Set(c.cities);
  return rows.filter(l => matches(l, c, provinces, cities));
}

export function constraintsEqual(a: ConstraintSet, b: ConstraintSet): boolean {
  return a.price.min === b.price.min && a.price.max === b.price.max
    && a.minBeds === b.minBeds && a.minBaths === b.minBaths
    && sameMembers(a.provinces, b.provinces)
    && sameMembers(a.cities, b.cities);
}

/** Cities belonging to any of the selected provinces, sorted. */
export function availableCities(dataset: WorkingDataset, provinces: readonly string[]): string[] {
  const out: string[] = [];
  for (const p of provinces) out.push(...(dataset.citiesByProvince[p] ?? []));
  return uniqueSorted(out);
}

/**
 * Keep the previously selected cities that are still available; when none
 * survives, fall back to the first available city (or nothing).
 */
export function reconcileCities(available: readonly string[], previous: readonly string[]): string[] {
  const allowed = new Set(available);
  const kept = previous.filter(c => allowed.has(c));
  if (kept.length) return [...new Set(kept)];
  return available.slice(0, 1);
}

/**
 * Single-entry memo: returns the last result while the constraint set is
 * unchanged, so unrelated events don't re-run the filter.
 */
export class FilterMemo {
  private last: { constraints: ConstraintSet; rows: readonly Listing[] } | null = null;
  private readonly source: readonly Listing[];

  constructor(source: readonly Listing[]) {
    this.source = source;
  }

  run(c: ConstraintSet): readonly Listing[] {
    if (this.last && constraintsEqual(this.last.constraints, c)) return this.last.rows;
    const rows = filterListings(this.source, c);
    this.last = { constraints: c, rows };
    return rows;
  }
}
