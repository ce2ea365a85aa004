/**
 * dashboard.ts — One constraint set in, every chart/table series out
 *
 * filter → summarize / income / histogram / box plot / map, in a fixed order.
 * Also derives the sidebar filter options and the initial control values.
 */
import { filterListings, availableCities } from './filter.ts';
import { summarize, incomeByCity, priceHistogram, boxStatsByCity, mapPoints } from './aggregator.ts';
import { styleSummary } from './table-style.ts';
import type {
  ConstraintSet, DashboardView, DictionaryEntry, FilterOptions, Listing, WorkingDataset,
} from '../types.ts';

export const DEFAULT_BIN_WIDTH = 50_000;

const DEFAULT_PROVINCE = 'Ontario';
const DEFAULT_PRICE = { min: 200_000, max: 1_000_000 };
const DEFAULT_MIN_BEDS = 3;
const DEFAULT_MIN_BATHS = 2;
const DEFAULT_COMPARISON = ['Toronto', 'Vancouver'];

export const BEDS_RANGE = { min: 0, max: 5 };
export const BATHS_RANGE = { min: 0, max: 4 };

/** Initial control values, clamped to what the dataset actually holds. */
export function defaultConstraints(dataset: WorkingDataset): ConstraintSet {
  const province = dataset.provinces.includes(DEFAULT_PROVINCE) ? DEFAULT_PROVINCE : dataset.provinces[0];
  const provinces = province ? [province] : [];
  const { min, max } = dataset.priceBounds;
  const lo = Math.max(DEFAULT_PRICE.min, min);
  const hi = Math.min(DEFAULT_PRICE.max, max);
  return {
    provinces,
    cities: availableCities(dataset, provinces).slice(0, 1),
    price: lo <= hi ? { min: lo, max: hi } : { min, max },
    minBeds: DEFAULT_MIN_BEDS,
    minBaths: DEFAULT_MIN_BATHS,
  };
}

export function defaultComparison(dataset: WorkingDataset): string[] {
  return DEFAULT_COMPARISON.filter(c => dataset.cities.includes(c));
}

export function buildFilterOptions(dataset: WorkingDataset): FilterOptions {
  return {
    provinces: dataset.provinces,
    citiesByProvince: dataset.citiesByProvince,
    cities: dataset.cities,
    price: { ...dataset.priceBounds },
    beds: BEDS_RANGE,
    baths: BATHS_RANGE,
    defaults: {
      constraints: defaultConstraints(dataset),
      comparison: defaultComparison(dataset),
    },
  };
}

/** Series for an already-filtered row set. */
export function viewFromRows(rows: readonly Listing[], constraints: ConstraintSet, binWidth = DEFAULT_BIN_WIDTH): DashboardView {
  return {
    constraints,
    total: rows.length,
    histogram: priceHistogram(rows, binWidth),
    binWidth,
    boxplot: boxStatsByCity(rows),
    mapPoints: mapPoints(rows),
    summary: styleSummary(summarize(rows)),
    income: incomeByCity(rows),
  };
}

export function buildDashboardView(dataset: WorkingDataset, constraints: ConstraintSet, binWidth = DEFAULT_BIN_WIDTH): DashboardView {
  return viewFromRows(filterListings(dataset.listings, constraints), constraints, binWidth);
}

export const DATA_DICTIONARY: readonly DictionaryEntry[] = [
  { variable: 'City', description: 'City or metro area (e.g., Toronto includes suburbs like Markham, Oakville).' },
  { variable: 'Price', description: 'Listed price in Canadian dollars.' },
  { variable: 'Address', description: 'Street address and unit number, if applicable.' },
  { variable: 'Number_Beds', description: 'Number of bedrooms listed.' },
  { variable: 'Number_Baths', description: 'Number of bathrooms listed.' },
  { variable: 'Province', description: 'Province in Canada.' },
  { variable: 'Population', description: 'Population of the city (if available).' },
  { variable: 'Longitude', description: 'Geographical longitude.' },
  { variable: 'Latitude', description: 'Geographical latitude.' },
  { variable: 'Household_Income', description: 'Average household income for the city (synthesized when the source omits it).' },
];
