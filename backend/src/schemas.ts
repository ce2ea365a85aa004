// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for every API endpoint
// ═══════════════════════════════════════════════════════
import { z } from 'zod';

// ── Shared pieces ──

/**
 * `?province=Ontario,Quebec` or `?province=Ontario&province=Quebec` → string[]
 * Repeated params are taken whole, so names may contain commas.
 */
const NameList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform(v => {
    const raw: string[] = v === undefined ? [] : Array.isArray(v) ? v : v.split(',');
    return raw.map(s => s.trim()).filter(Boolean);
  })
  .pipe(z.array(z.string().max(100)).max(500));

const Money = z.coerce.number().min(0).max(1e10);
const Rooms = z.coerce.number().int().min(0).max(20);

// ── GET /api/dashboard, GET /api/listings ──

const ConstraintQueryShape = {
  province: NameList,
  city: NameList,
  minPrice: Money.optional(),
  maxPrice: Money.optional(),
  minBeds: Rooms.optional(),
  minBaths: Rooms.optional(),
};

const priceOrdered = (q: { minPrice?: number; maxPrice?: number }): boolean =>
  q.minPrice === undefined || q.maxPrice === undefined || q.minPrice <= q.maxPrice;

const priceMessage = { message: 'minPrice must not exceed maxPrice', path: ['minPrice'] };

export const DashboardQuerySchema = z.object(ConstraintQueryShape).refine(priceOrdered, priceMessage);

export type DashboardQuery = z.infer<typeof DashboardQuerySchema>;

export const ListingsQuerySchema = z.object({
  ...ConstraintQueryShape,
  page: z.coerce.number().int().min(1).max(10_000).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  sort: z.enum(['price_asc', 'price_desc', 'city']).optional(),
}).refine(priceOrdered, priceMessage);

export type ListingsQuery = z.infer<typeof ListingsQuerySchema>;

// ── GET /api/cities ──

export const CitiesQuerySchema = z.object({
  province: NameList,
  city: NameList,
});

// ── GET /api/compare ──

export const CompareQuerySchema = z.object({
  cities: NameList,
});
