import { describe, it, expect, vi } from 'vitest';
import {
  createDashboardStore, availableCitiesFor, reconcileCities, COMPARISON_WARNING, type DashboardApi,
} from '../stores/useDashboardStore';
import type { CityComparison, Constraints, DashboardData, FilterOptions } from '../types';

const options: FilterOptions = {
  provinces: ['Nova Scotia', 'Ontario'],
  citiesByProvince: { 'Nova Scotia': ['Halifax'], Ontario: ['Ottawa', 'Toronto'] },
  cities: ['Halifax', 'Ottawa', 'Toronto'],
  price: { min: 150000, max: 2500000 },
  beds: { min: 0, max: 5 },
  baths: { min: 0, max: 4 },
  defaults: {
    constraints: {
      provinces: ['Ontario'], cities: ['Toronto'], price: { min: 200000, max: 1000000 }, minBeds: 3, minBaths: 2,
    },
    comparison: ['Toronto', 'Halifax'],
  },
};

function view(constraints: Constraints, total: number): DashboardData {
  return { constraints, total, histogram: [], binWidth: 50000, boxplot: [], mapPoints: [], summary: [], income: [] };
}

const comparison: CityComparison = {
  cities: ['Toronto', 'Halifax'],
  prices: { Toronto: [500000, 1200000], Halifax: [300000] },
  title: 'Price Comparison: Toronto vs Halifax',
};

function fakeClient() {
  return {
    fetchFilterOptions: vi.fn(() => Promise.resolve(options)),
    fetchDashboard: vi.fn((c: Constraints) => Promise.resolve(view(c, 1))),
    fetchComparison: vi.fn((_cities: string[]) => Promise.resolve(comparison)),
  } satisfies DashboardApi;
}

function deferred<T>() {
  let resolve: (v: T) => void = () => {};
  const promise = new Promise<T>(r => { resolve = r; });
  return { promise, resolve };
}

describe('province → city helpers', () => {
  it('unions and sorts cities of the selected provinces', () => {
    expect(availableCitiesFor(options, ['Ontario', 'Nova Scotia'])).toEqual(['Halifax', 'Ottawa', 'Toronto']);
    expect(availableCitiesFor(options, [])).toEqual([]);
    expect(availableCitiesFor(null, ['Ontario'])).toEqual([]);
  });

  it('keeps still-valid cities, else picks the first available', () => {
    expect(reconcileCities(['Halifax', 'Ottawa', 'Toronto'], ['Toronto'])).toEqual(['Toronto']);
    expect(reconcileCities(['Halifax'], ['Toronto'])).toEqual(['Halifax']);
    expect(reconcileCities([], ['Toronto'])).toEqual([]);
  });
});

describe('dashboard store', () => {
  it('bootstraps defaults, view and comparison', async () => {
    const client = fakeClient();
    const store = createDashboardStore(client);
    await store.getState().bootstrap();

    const s = store.getState();
    expect(s.loading).toBe(false);
    expect(s.constraints.cities).toEqual(['Toronto']);
    expect(s.availableCities).toEqual(['Ottawa', 'Toronto']);
    expect(s.view?.constraints.provinces).toEqual(['Ontario']);
    expect(s.comparison?.prices.Halifax).toEqual([300000]);
    expect(client.fetchComparison).toHaveBeenCalledWith(['Toronto', 'Halifax']);
  });

  it('records a bootstrap failure', async () => {
    const client = fakeClient();
    client.fetchFilterOptions.mockImplementation(() => Promise.reject(new Error('API 503')));
    const store = createDashboardStore(client);
    await store.getState().bootstrap();
    expect(store.getState().error).toBe('API 503');
    expect(store.getState().loading).toBe(false);
  });

  it('switching Ontario → Nova Scotia selects Halifax', async () => {
    const store = createDashboardStore(fakeClient());
    await store.getState().bootstrap();
    await store.getState().setProvinces(['Nova Scotia']);

    const s = store.getState();
    expect(s.availableCities).toEqual(['Halifax']);
    expect(s.constraints.cities).toEqual(['Halifax']);
    expect(s.view?.constraints.cities).toEqual(['Halifax']);
  });

  it('adding a province keeps the current city', async () => {
    const store = createDashboardStore(fakeClient());
    await store.getState().bootstrap();
    await store.getState().setProvinces(['Ontario', 'Nova Scotia']);
    expect(store.getState().constraints.cities).toEqual(['Toronto']);
  });

  it('ignores cities outside the selected provinces', async () => {
    const store = createDashboardStore(fakeClient());
    await store.getState().bootstrap();
    await store.getState().setCities(['Halifax', 'Ottawa']);
    expect(store.getState().constraints.cities).toEqual(['Ottawa']);
  });

  it('orders an inverted price range', async () => {
    const store = createDashboardStore(fakeClient());
    await store.getState().bootstrap();
    await store.getState().setPriceRange(900000, 100000);
    expect(store.getState().constraints.price).toEqual({ min: 100000, max: 900000 });
  });

  it('keeps only the latest view when responses arrive out of order', async () => {
    const pending: Array<ReturnType<typeof deferred<DashboardData>>> = [];
    const client = fakeClient();
    const store = createDashboardStore(client);
    await store.getState().bootstrap();

    client.fetchDashboard.mockImplementation(() => {
      const d = deferred<DashboardData>();
      pending.push(d);
      return d.promise;
    });

    const first = store.getState().setMinBeds(1);
    const second = store.getState().setMinBeds(4);
    const latest = store.getState().constraints;

    pending[1].resolve(view(latest, 2));
    await second;
    pending[0].resolve(view({ ...latest, minBeds: 1 }, 9));
    await first;

    expect(store.getState().view?.total).toBe(2);
    expect(store.getState().view?.constraints.minBeds).toBe(4);
    expect(store.getState().filtering).toBe(false);
  });

  it('warns and withholds the comparison unless exactly two cities are chosen', async () => {
    const client = fakeClient();
    const store = createDashboardStore(client);
    await store.getState().bootstrap();
    client.fetchComparison.mockClear();

    await store.getState().setComparisonCities(['Toronto']);
    let s = store.getState();
    expect(s.comparison).toBeNull();
    expect(s.notifications).toEqual([{ id: 1, level: 'warning', message: COMPARISON_WARNING }]);

    await store.getState().setComparisonCities(['Toronto', 'Toronto', 'Halifax', 'Ottawa']);
    s = store.getState();
    expect(s.comparisonCities).toEqual(['Toronto', 'Halifax', 'Ottawa']);
    expect(s.notifications).toHaveLength(2);
    expect(client.fetchComparison).not.toHaveBeenCalled();

    store.getState().dismissNotification(1);
    expect(store.getState().notifications.map(n => n.id)).toEqual([2]);
  });

  it('a duplicated pair counts as one city', async () => {
    const store = createDashboardStore(fakeClient());
    await store.getState().bootstrap();
    await store.getState().setComparisonCities(['Toronto', 'Toronto']);
    expect(store.getState().comparison).toBeNull();
    expect(store.getState().notifications).toHaveLength(1);
  });
});
