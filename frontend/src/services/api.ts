import type {
  ApiResponse, CityComparison, Constraints, DashboardData, DictionaryEntry, FilterOptions,
} from '../types';

let API = '/api';

/** Point the client at another backend (tests, embedded dashboards). */
export function setApiBase(base: string): void {
  API = base.replace(/\/$/, '');
}

export class ApiError extends Error {
  constructor(message: string, public readonly status: number, public readonly code?: string) {
    super(message);
    this.name = 'ApiError';
  }
}

async function get<T>(path: string): Promise<T> {
  const res = await fetch(`${API}${path}`);
  const json = await res.json().catch(() => null) as ApiResponse<T> | null;
  if (!res.ok || !json?.success) {
    throw new ApiError(json?.error || `API ${res.status}`, res.status, json?.code);
  }
  return json.data as T;
}

function appendAll(sp: URLSearchParams, key: string, values: string[]): void {
  values.forEach(v => sp.append(key, v));
}

export function constraintsToQuery(c: Constraints): string {
  const sp = new URLSearchParams();
  appendAll(sp, 'province', c.provinces);
  appendAll(sp, 'city', c.cities);
  sp.set('minPrice', String(c.price.min));
  sp.set('maxPrice', String(c.price.max));
  sp.set('minBeds', String(c.minBeds));
  sp.set('minBaths', String(c.minBaths));
  return sp.toString();
}

export function fetchFilterOptions(): Promise<FilterOptions> {
  return get<FilterOptions>('/filters');
}

/** `current` is the existing city selection; the server keeps whatever is still available. */
export function fetchCities(provinces: string[], current: string[] = []): Promise<{ available: string[]; selected: string[] }> {
  const sp = new URLSearchParams();
  appendAll(sp, 'province', provinces);
  appendAll(sp, 'city', current);
  return get(`/cities?${sp}`);
}

export function fetchDashboard(constraints: Constraints): Promise<DashboardData> {
  return get<DashboardData>(`/dashboard?${constraintsToQuery(constraints)}`);
}

export function fetchComparison(cities: string[]): Promise<CityComparison> {
  const sp = new URLSearchParams();
  appendAll(sp, 'cities', cities);
  return get<CityComparison>(`/compare?${sp}`);
}

export function fetchDictionary(): Promise<DictionaryEntry[]> {
  return get<DictionaryEntry[]>('/dictionary');
}
