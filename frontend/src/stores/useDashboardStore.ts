/**
 * useDashboardStore.ts — Zustand store for the dashboard sidebar and outputs
 *
 * Every control change updates the constraint set and re-requests the view.
 * Responses are sequenced: a reply that arrives after a newer request was
 * issued is dropped, so the screen always shows the latest constraints.
 */
import { createStore } from 'zustand/vanilla';
import type { CityComparison, Constraints, DashboardData, DashboardState, FilterOptions } from '../types';
import * as api from '../services/api';

export const COMPARISON_WARNING = 'Please select exactly two cities for comparison.';

const EMPTY_CONSTRAINTS: Constraints = {
  provinces: [], cities: [], price: { min: 0, max: 0 }, minBeds: 0, minBaths: 0,
};

export interface DashboardApi {
  fetchFilterOptions: () => Promise<FilterOptions>;
  fetchDashboard: (constraints: Constraints) => Promise<DashboardData>;
  fetchComparison: (cities: string[]) => Promise<CityComparison>;
}

interface DashboardActions {
  bootstrap: () => Promise<void>;
  setProvinces: (provinces: string[]) => Promise<void>;
  setCities: (cities: string[]) => Promise<void>;
  setPriceRange: (min: number, max: number) => Promise<void>;
  setMinBeds: (n: number) => Promise<void>;
  setMinBaths: (n: number) => Promise<void>;
  setComparisonCities: (cities: string[]) => Promise<void>;
  dismissNotification: (id: number) => void;
  _recompute: () => Promise<void>;
  _viewSeq: number;
  _cmpSeq: number;
}

export type DashboardStore = DashboardState & DashboardActions;

// ── Pure helpers (mirrors the server's province → city rules) ──

export function availableCitiesFor(options: FilterOptions | null, provinces: string[]): string[] {
  if (!options) return [];
  const all = provinces.flatMap(p => options.citiesByProvince[p] ?? []);
  return [...new Set(all)].sort((a, b) => a.localeCompare(b));
}

export function reconcileCities(available: string[], previous: string[]): string[] {
  const kept = previous.filter(c => available.includes(c));
  return kept.length ? [...new Set(kept)] : available.slice(0, 1);
}

export function createDashboardStore(client: DashboardApi = api) {
  let nextNoticeId = 1;

  return createStore<DashboardStore>((set, get) => {
    const warn = (message: string) =>
      set(s => ({ notifications: [...s.notifications, { id: nextNoticeId++, level: 'warning', message }] }));

    const update = (patch: Partial<Constraints>) => {
      set(s => ({ constraints: { ...s.constraints, ...patch } }));
      return get()._recompute();
    };

    return {
      options: null,
      constraints: EMPTY_CONSTRAINTS,
      availableCities: [],
      comparisonCities: [],
      view: null,
      comparison: null,
      notifications: [],
      loading: true,
      filtering: false,
      error: null,
      _viewSeq: 0,
      _cmpSeq: 0,

      bootstrap: async () => {
        set({ loading: true, error: null });
        try {
          const options = await client.fetchFilterOptions();
          const { constraints, comparison } = options.defaults;
          const available = availableCitiesFor(options, constraints.provinces);
          set({
            options,
            availableCities: available,
            constraints: { ...constraints, cities: reconcileCities(available, constraints.cities) },
            loading: false,
          });
          await Promise.all([get()._recompute(), get().setComparisonCities(comparison)]);
        } catch (err) {
          set({ error: err instanceof Error ? err.message : String(err), loading: false });
        }
      },

      // ═══ ACTIONS: FILTERS ═══

      setProvinces: (provinces) => {
        const selected = [...new Set(provinces)];
        const available = availableCitiesFor(get().options, selected);
        const cities = reconcileCities(available, get().constraints.cities);
        set({ availableCities: available });
        return update({ provinces: selected, cities });
      },

      setCities: (cities) => {
        const { availableCities: available } = get();
        return update({ cities: [...new Set(cities)].filter(c => available.includes(c)) });
      },

      setPriceRange: (min, max) => update({ price: min <= max ? { min, max } : { min: max, max: min } }),

      setMinBeds: (minBeds) => update({ minBeds }),

      setMinBaths: (minBaths) => update({ minBaths }),

      // ═══ ACTIONS: COMPARISON ═══

      setComparisonCities: async (cities) => {
        const selected = [...new Set(cities.map(c => c.trim()).filter(Boolean))];
        const seq = get()._cmpSeq + 1;
        set({ comparisonCities: selected, _cmpSeq: seq });

        if (selected.length !== 2) {
          set({ comparison: null });
          warn(COMPARISON_WARNING);
          return;
        }
        try {
          const comparison = await client.fetchComparison(selected);
          if (get()._cmpSeq === seq) set({ comparison });
        } catch (err) {
          if (get()._cmpSeq === seq) set({ comparison: null, error: err instanceof Error ? err.message : String(err) });
        }
      },

      dismissNotification: (id) => set(s => ({ notifications: s.notifications.filter(n => n.id !== id) })),

      _recompute: async () => {
        const seq = get()._viewSeq + 1;
        set({ _viewSeq: seq, filtering: true });
        try {
          const view = await client.fetchDashboard(get().constraints);
          if (get()._viewSeq === seq) set({ view, filtering: false, error: null });
        } catch (err) {
          if (get()._viewSeq === seq) set({ filtering: false, error: err instanceof Error ? err.message : String(err) });
        }
      },
    };
  });
}

export const dashboardStore = createDashboardStore();

export default dashboardStore;
