import express, { type Request, type Response, type NextFunction } from 'express';
import type { z } from 'zod';
import { getDataset } from '../services/state.ts';
import { filterListings, availableCities, reconcileCities } from '../services/filter.ts';
import { compareCities } from '../services/aggregator.ts';
import {
  buildDashboardView, buildFilterOptions, defaultConstraints, DATA_DICTIONARY,
} from '../services/dashboard.ts';
import { getCache, hashConstraints } from '../services/cache-service.ts';
import { env } from '../config/env.ts';
import { ValidationError, InvalidComparisonError } from '../shared/errors.ts';
import {
  DashboardQuerySchema, ListingsQuerySchema, CitiesQuerySchema, CompareQuerySchema,
  type DashboardQuery,
} from '../schemas.ts';
import type { ConstraintSet, DashboardView, Listing, SearchResult, WorkingDataset } from '../types.ts';

const router = express.Router();

// ── Zod validation ──

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return result.data;
}

/**
 * Query params → constraint set; omitted numeric params take the sidebar defaults.
 * The merged price range must still be ordered.
 */
export function toConstraints(q: DashboardQuery, dataset: WorkingDataset): ConstraintSet {
  const defaults = defaultConstraints(dataset);
  const price = { min: q.minPrice ?? defaults.price.min, max: q.maxPrice ?? defaults.price.max };
  if (price.min > price.max) {
    throw new ValidationError(['minPrice: minPrice must not exceed maxPrice']);
  }
  return {
    provinces: q.province,
    cities: q.city,
    price,
    minBeds: q.minBeds ?? defaults.minBeds,
    minBaths: q.minBaths ?? defaults.minBaths,
  };
}

/**
 * GET /api/filters — Sidebar options: provinces, cities per province, slider ranges, defaults
 */
router.get('/filters', (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json({ success: true, data: buildFilterOptions(getDataset()) });
  } catch (err) { next(err); }
});

/**
 * GET /api/cities — Cities available for the selected provinces
 * `city` carries the current selection: cities still available are kept,
 * otherwise the first available city is selected.
 */
router.get('/cities', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { province, city } = validate(CitiesQuerySchema, req.query);
    const available = availableCities(getDataset(), province);
    res.json({ success: true, data: { available, selected: reconcileCities(available, city) } });
  } catch (err) { next(err); }
});

/**
 * GET /api/dashboard — Every chart/table series for one constraint set
 * Zod-validated: province, city, minPrice, maxPrice, minBeds, minBaths
 */
router.get('/dashboard', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const dataset = getDataset();
    const constraints = toConstraints(validate(DashboardQuerySchema, req.query), dataset);
    const cache = getCache();
    const key = `view:${hashConstraints(constraints, env.HISTOGRAM_BIN_WIDTH)}`;

    const cached = await cache.get<DashboardView>(key);
    if (cached) {
      res.setHeader('X-Cache', 'HIT');
      return res.json({ success: true, data: cached });
    }

    const view = buildDashboardView(dataset, constraints, env.HISTOGRAM_BIN_WIDTH);
    await cache.set(key, view, env.CACHE_VIEW_TTL);
    res.setHeader('X-Cache', 'MISS');
    res.json({ success: true, data: view });
  } catch (err) { next(err); }
});

/**
 * GET /api/listings — Paginated filtered listings (map/table drill-down)
 */
router.get('/listings', (req: Request, res: Response, next: NextFunction) => {
  try {
    const dataset = getDataset();
    const q = validate(ListingsQuerySchema, req.query);
    let rows: Listing[] = filterListings(dataset.listings, toConstraints(q, dataset));

    if (q.sort === 'price_asc') rows = [...rows].sort((a, b) => a.price - b.price);
    else if (q.sort === 'price_desc') rows = [...rows].sort((a, b) => b.price - a.price);
    else if (q.sort === 'city') rows = [...rows].sort((a, b) => a.city.localeCompare(b.city));

    const total = rows.length;
    const start = (q.page - 1) * q.limit;
    const data: SearchResult<Listing> = {
      total,
      page: q.page,
      pages: Math.ceil(total / q.limit),
      limit: q.limit,
      results: rows.slice(start, start + q.limit),
    };
    res.json({ success: true, data });
  } catch (err) { next(err); }
});

/**
 * GET /api/compare — Price series for exactly two cities (full dataset)
 */
router.get('/compare', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { cities } = validate(CompareQuerySchema, req.query);
    const outcome = compareCities(getDataset(), cities);
    if (!outcome.ok) throw new InvalidComparisonError(outcome.reason, outcome.selected);
    res.json({ success: true, data: outcome.comparison });
  } catch (err) { next(err); }
});

/**
 * GET /api/dictionary — Column descriptions
 */
router.get('/dictionary', (_req: Request, res: Response) => {
  res.json({ success: true, data: DATA_DICTIONARY });
});

export default router;
