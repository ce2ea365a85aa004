/**
 * types.ts — Shared TypeScript interfaces for the housing dashboard client
 *
 * All data shapes flowing between API, stores, and chart components are defined here.
 */

// ── API Response wrapper ──
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  details?: unknown;
}

// ── Filter state ──
export interface PriceRange {
  min: number;
  max: number;
}

export interface Constraints {
  provinces: string[];
  cities: string[];
  price: PriceRange;
  minBeds: number;
  minBaths: number;
}

export interface FilterOptions {
  provinces: string[];
  citiesByProvince: Record<string, string[]>;
  cities: string[];
  price: PriceRange;
  beds: PriceRange;
  baths: PriceRange;
  defaults: {
    constraints: Constraints;
    comparison: string[];
  };
}

// ── Dashboard series ──
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
  level: number;
}

export type SummaryColumn = 'avgPrice' | 'medianPrice' | 'minPrice' | 'maxPrice' | 'listings';

export interface SummaryRow {
  city: string;
  avgPrice: number;
  medianPrice: number;
  minPrice: number;
  maxPrice: number;
  listings: number;
  styles: Record<SummaryColumn, StyleToken>;
}

export interface IncomePoint {
  city: string;
  province: string;
  avgIncome: number;
}

export interface DashboardData {
  constraints: Constraints;
  total: number;
  histogram: HistogramBin[];
  binWidth: number;
  boxplot: BoxStats[];
  mapPoints: MapPoint[];
  summary: SummaryRow[];
  income: IncomePoint[];
}

export interface CityComparison {
  cities: [string, string];
  prices: Record<string, number[]>;
  title: string;
}

export interface DictionaryEntry {
  variable: string;
  description: string;
}

// ── UI ──
export interface Notification {
  id: number;
  level: 'warning' | 'error';
  message: string;
}

export interface DashboardState {
  options: FilterOptions | null;
  constraints: Constraints;
  availableCities: string[];
  comparisonCities: string[];
  view: DashboardData | null;
  comparison: CityComparison | null;
  notifications: Notification[];
  loading: boolean;
  filtering: boolean;
  error: string | null;
}
