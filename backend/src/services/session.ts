/**
 * session.ts — Reactive binding between the sidebar controls and the pipeline
 *
 * One DashboardSession per user. Each control change is a discrete event that
 * synchronously runs constraint update → filter → aggregate, then notifies
 * subscribers with the new results. Nothing is recomputed implicitly.
 */
import { FilterMemo, availableCities, reconcileCities } from './filter.ts';
import { compareCities } from './aggregator.ts';
import { viewFromRows, defaultConstraints, defaultComparison, DEFAULT_BIN_WIDTH } from './dashboard.ts';
import { childLogger } from '../shared/logger.ts';
import type {
  CityComparison, ComparisonOutcome, ConstraintSet, DashboardView, WorkingDataset,
} from '../types.ts';

const log = childLogger({ module: 'session' });

export type SessionEvent =
  | { type: 'cities'; available: string[]; selected: string[] }
  | { type: 'view'; view: DashboardView }
  | { type: 'comparison'; comparison: CityComparison }
  | { type: 'notification'; level: 'warning'; message: string };

export type SessionListener = (event: SessionEvent) => void;

export interface SessionOptions {
  binWidth?: number;
  constraints?: ConstraintSet;
  comparison?: string[];
}

export class DashboardSession {
  private readonly dataset: WorkingDataset;
  private readonly memo: FilterMemo;
  private readonly binWidth: number;
  private readonly listeners = new Set<SessionListener>();

  private constraints: ConstraintSet;
  private available: string[];
  private view: DashboardView;
  private comparisonSelection: string[];
  private comparison: ComparisonOutcome;

  constructor(dataset: WorkingDataset, opts: SessionOptions = {}) {
    this.dataset = dataset;
    this.memo = new FilterMemo(dataset.listings);
    this.binWidth = opts.binWidth ?? DEFAULT_BIN_WIDTH;

    const initial = opts.constraints ?? defaultConstraints(dataset);
    this.available = availableCities(dataset, initial.provinces);
    this.constraints = {
      ...initial,
      cities: reconcileCities(this.available, initial.cities),
    };
    this.view = this.compute();
    this.comparisonSelection = opts.comparison ?? defaultComparison(dataset);
    this.comparison = compareCities(dataset, this.comparisonSelection);
  }

  // ── Subscriptions ──

  /** Register a display collaborator. Returns the unsubscribe function. */
  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  // ── Current state ──

  getConstraints(): ConstraintSet { return this.constraints; }
  getAvailableCities(): readonly string[] { return this.available; }
  getView(): DashboardView { return this.view; }
  getComparison(): ComparisonOutcome { return this.comparison; }

  // ── Events ──

  selectProvinces(provinces: readonly string[]): void {
    const selected = [...new Set(provinces)];
    this.available = availableCities(this.dataset, selected);
    const cities = reconcileCities(this.available, this.constraints.cities);
    this.constraints = { ...this.constraints, provinces: selected, cities };
    this.emit({ type: 'cities', available: [...this.available], selected: [...cities] });
    this.recompute();
  }

  /** Cities outside the selected provinces are ignored. */
  selectCities(cities: readonly string[]): void {
    const allowed = new Set(this.available);
    this.constraints = { ...this.constraints, cities: [...new Set(cities)].filter(c => allowed.has(c)) };
    this.recompute();
  }

  setPriceRange(min: number, max: number): void {
    const price = min <= max ? { min, max } : { min: max, max: min };
    this.constraints = { ...this.constraints, price };
    this.recompute();
  }

  setMinBeds(minBeds: number): void {
    this.constraints = { ...this.constraints, minBeds };
    this.recompute();
  }

  setMinBaths(minBaths: number): void {
    this.constraints = { ...this.constraints, minBaths };
    this.recompute();
  }

  /**
   * Comparison runs against the full dataset, independent of the filters.
   * Anything other than two distinct cities raises a warning instead.
   */
  selectComparison(cities: readonly string[]): void {
    this.comparisonSelection = [...cities];
    this.comparison = compareCities(this.dataset, this.comparisonSelection);
    if (this.comparison.ok) {
      this.emit({ type: 'comparison', comparison: this.comparison.comparison });
    } else {
      log.debug({ selected: this.comparison.selected }, 'Comparison withheld');
      this.emit({ type: 'notification', level: 'warning', message: this.comparison.reason });
    }
  }

  // ── Pipeline ──

  private compute(): DashboardView {
    return viewFromRows(this.memo.run(this.constraints), this.constraints, this.binWidth);
  }

  private recompute(): void {
    this.view = this.compute();
    log.debug({ total: this.view.total, cities: this.constraints.cities.length }, 'View recomputed');
    this.emit({ type: 'view', view: this.view });
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}
