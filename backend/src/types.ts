// ═══════════════════════════════════════════════════════
// Housing Insights — Core Type Definitions
// Every data shape flowing through the filter/aggregate pipeline.
// ═══════════════════════════════════════════════════════

// ── Source file shape ──

/** One CSV record as read from the listings file, before cleaning. */
export type RawListingRow = Record<string, string | undefined>;

export const REQUIRED_COLUMNS = [
  'City', 'Province', 'Price', 'Number_Beds', 'Number_Baths', 'Latitude', 'Longitude',
] as const;

export const INCOME_COLUMN = 'Household_Income';

// ── Cleaned records ──

export interface Listing {
  readonly city: string;
  readonly province: string;
  readonly price: number;         // CAD
  readonly beds: number;
  readonly baths: number;
  readonly latitude: number;
  readonly longitude: number;
  readonly income: number;        // household income, CAD
  readonly address?: string;
  readonly population?: number;
}

export interface PriceBounds {
  min: number;
  max: number;
}

export interface WorkingDataset {
  readonly listings: readonly Listing[];
  readonly provinces: readonly string[];
  readonly citiesByProvince: Readonly<Record<string, readonly string[]>>;
  readonly cities: readonly string[];
  readonly priceBounds: Readonly<PriceBounds>;
  readonly incomeSynthesized: boolean;
  readonly rejected: number;      // raw rows dropped during cleaning
}

// ── Filter state ──

export interface ConstraintSet {
  provinces: readonly string[];
  cities: readonly string[];
  price: Readonly<PriceBounds>;
  minBeds: number;
  minBaths: number;
}

// ── Aggregates ──

export interface SummaryRow {
  city: string;
  avgPrice: number;               // rounded to 2 dp
  medianPrice: number;
  minPrice: number;
  maxPrice: number;
  listings: number;
}

export interface IncomeSeriesPoint {
  city: string;
  province: string;
  avgIncome: number;
}

export interface CityComparison {
  cities: [string, string];
  prices: Record<string, number[]>;
  title: string;
}

export type ComparisonOutcome =
  | { ok: true; comparison: CityComparison }
  | { ok: false; reason: string; selected: number };

// ── Chart-ready series ──

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface BoxStats {
  city: string;
  min: number;
  q1: number;
  median: number;
  q3: number;
  max: number;
  count: number;
}

export interface MapPoint {
  lat: number;
  lng: number;
  popup: string;
}

export interface StyleToken {
  background: string;
  color: string;
  level: number;                  // 1..100 position on the colour ramp
}

export type SummaryColumn = 'avgPrice' | 'medianPrice' | 'minPrice' | 'maxPrice' | 'listings';

export interface StyledSummaryRow extends SummaryRow {
  styles: Record<SummaryColumn, StyleToken>;
}

/** Everything the display collaborators need for one constraint set. */
export interface DashboardView {
  constraints: ConstraintSet;
  total: number;
  histogram: HistogramBin[];
  binWidth: number;
  boxplot: BoxStats[];
  mapPoints: MapPoint[];
  summary: StyledSummaryRow[];
  income: IncomeSeriesPoint[];
}

// ── Filter options (sidebar controls) ──

export interface RangeControl {
  min: number;
  max: number;
}

export interface FilterOptions {
  provinces: readonly string[];
  citiesByProvince: Readonly<Record<string, readonly string[]>>;
  cities: readonly string[];
  price: RangeControl;
  beds: RangeControl;
  baths: RangeControl;
  defaults: {
    constraints: ConstraintSet;
    comparison: string[];
  };
}

export interface DictionaryEntry {
  variable: string;
  description: string;
}

// ── Paginated listings ──

export interface SearchResult<T> {
  total: number;
  page: number;
  pages: number;
  limit: number;
  results: T[];
}
