/**
 * services/cache-service.ts — Dashboard view cache
 *
 * Redis-backed when ENABLE_REDIS_CACHE=true, in-memory Map fallback otherwise.
 * Provides: get/set with TTL support. The dataset never changes after
 * startup, so entries only leave by expiry or eviction.
 *
 * Key naming convention:
 *   view:{constraintHash}   — DashboardView for one constraint set
 */
import { createHash } from 'crypto';
import type Redis from 'ioredis';
import { env } from '../config/env.ts';
import { getRedis } from '../config/redis.ts';
import { childLogger } from '../shared/logger.ts';
import { cacheOperations } from '../shared/metrics.ts';
import type { ConstraintSet } from '../types.ts';

const log = childLogger({ module: 'cache' });
const MEM_CACHE_MAX = 200;

// ── In-memory fallback ──
const memCache = new Map<string, { data: string; expiresAt: number }>();

function memGet(key: string): string | null {
  const entry = memCache.get(key);
  if (!entry) return null;
  if (Date.now() > entry.expiresAt) {
    memCache.delete(key);
    return null;
  }
  return entry.data;
}

function memSet(key: string, data: string, ttlSec: number): void {
  // Evict oldest on overflow
  if (memCache.size >= MEM_CACHE_MAX) {
    const first = memCache.keys().next().value;
    if (first !== undefined) memCache.delete(first);
  }
  memCache.set(key, { data, expiresAt: Date.now() + ttlSec * 1000 });
}

// ── Public API ──

export class CacheService {
  private readonly redis: Redis | null;

  constructor(redis: Redis | null = env.ENABLE_REDIS_CACHE ? getRedis() : null) {
    this.redis = redis;
  }

  /**
   * Get cached value by key. Returns parsed JSON or null.
   * Cache failures degrade to a miss.
   */
  async get<T>(key: string): Promise<T | null> {
    try {
      const raw = this.redis ? await this.redis.get(key) : memGet(key);
      cacheOperations.inc({ operation: raw ? 'hit' : 'miss' });
      if (!raw) return null;
      return JSON.parse(raw) as T;
    } catch (err) {
      log.warn({ err, key }, 'Cache GET failed');
      return null;
    }
  }

  /**
   * Set value with TTL (in seconds).
   */
  async set(key: string, data: unknown, ttlSec: number): Promise<void> {
    try {
      const json = JSON.stringify(data);
      if (this.redis) await this.redis.setex(key, ttlSec, json);
      else memSet(key, json, ttlSec);
      cacheOperations.inc({ operation: 'set' });
    } catch (err) {
      log.warn({ err, key }, 'Cache SET failed');
    }
  }

  /**
   * Get cache stats (for health endpoint).
   */
  async getStats(): Promise<{ type: string; keys: number }> {
    if (this.redis) {
      const info = await this.redis.info('keyspace');
      const dbLine = info.match(/db0:keys=(\d+)/);
      return { type: 'redis', keys: dbLine?.[1] ? parseInt(dbLine[1]) : 0 };
    }
    return { type: 'memory', keys: memCache.size };
  }
}

// ── Singleton ──
let _cache: CacheService | null = null;
export function getCache(): CacheService {
  if (!_cache) _cache = new CacheService();
  return _cache;
}

// ── Helpers ──

/**
 * Stable hash of a constraint set: selection order and duplicates don't
 * change the key.
 */
export function hashConstraints(c: ConstraintSet, binWidth: number): string {
  const normalized = {
    provinces: [...new Set(c.provinces)].sort(),
    cities: [...new Set(c.cities)].sort(),
    price: [c.price.min, c.price.max],
    minBeds: c.minBeds,
    minBaths: c.minBaths,
    binWidth,
  };
  return createHash('md5').update(JSON.stringify(normalized)).digest('hex').slice(0, 12);
}
