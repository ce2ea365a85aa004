import { describe, it, expect } from 'vitest';
import {
  defaultConstraints, defaultComparison, buildFilterOptions, buildDashboardView, DATA_DICTIONARY,
} from '../services/dashboard.ts';
import { parseListings } from '../services/dataset.ts';
import { scenarioDataset } from './fixtures.ts';

const ds = scenarioDataset();

describe('defaults', () => {
  it('starts on Ontario with the price range clamped to the data', () => {
    expect(defaultConstraints(ds)).toEqual({
      provinces: ['Ontario'],
      cities: ['Toronto'],
      price: { min: 300000, max: 1000000 },
      minBeds: 3,
      minBaths: 2,
    });
  });

  it('falls back to the first province without Ontario', () => {
    const bc = parseListings(
      'City,Province,Price,Number_Beds,Number_Baths,Latitude,Longitude\nVictoria,British Columbia,985000,3,2,48.43,-123.37',
      'bc.csv',
    );
    expect(defaultConstraints(bc)).toMatchObject({
      provinces: ['British Columbia'],
      cities: ['Victoria'],
      price: { min: 985000, max: 985000 },
    });
  });

  it('only proposes comparison cities that exist', () => {
    expect(defaultComparison(ds)).toEqual(['Toronto']);
  });

  it('exposes slider ranges and defaults as filter options', () => {
    const opts = buildFilterOptions(ds);
    expect(opts.provinces).toEqual(['Nova Scotia', 'Ontario']);
    expect(opts.price).toEqual({ min: 300000, max: 1200000 });
    expect(opts.beds).toEqual({ min: 0, max: 5 });
    expect(opts.baths).toEqual({ min: 0, max: 4 });
    expect(opts.defaults.constraints.cities).toEqual(['Toronto']);
  });
});

describe('buildDashboardView', () => {
  it('derives every series from the same filtered rows', () => {
    const view = buildDashboardView(ds, defaultConstraints(ds), 50000);
    expect(view.total).toBe(1);
    expect(view.binWidth).toBe(50000);
    expect(view.histogram).toEqual([{ start: 500000, end: 550000, count: 1 }]);
    expect(view.boxplot).toEqual([{ city: 'Toronto', min: 500000, q1: 500000, median: 500000, q3: 500000, max: 500000, count: 1 }]);
    expect(view.mapPoints).toEqual([{
      lat: 43.65,
      lng: -79.38,
      popup: 'Price: $500,000<br>Bedrooms: 3<br>Bathrooms: 2<br>City: Toronto<br>Province: Ontario',
    }]);
    expect(view.summary).toHaveLength(1);
    expect(view.summary[0].styles.avgPrice).toEqual({ background: '#08306B', color: 'white', level: 1 });
    expect(view.income).toEqual([{ city: 'Toronto', province: 'Ontario', avgIncome: 90000 }]);
  });

  it('returns empty series when nothing matches', () => {
    const view = buildDashboardView(ds, { ...defaultConstraints(ds), provinces: [] });
    expect(view).toMatchObject({ total: 0, histogram: [], boxplot: [], mapPoints: [], summary: [], income: [] });
  });
});

describe('DATA_DICTIONARY', () => {
  it('describes every source column', () => {
    expect(DATA_DICTIONARY.map(d => d.variable)).toEqual([
      'City', 'Price', 'Address', 'Number_Beds', 'Number_Baths', 'Province',
      'Population', 'Longitude', 'Latitude', 'Household_Income',
    ]);
  });
});
