/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness: dataset loaded, cache reachable
 */
import { Router, type Request, type Response } from 'express';
import { env } from '../config/env.ts';
import { datasetInfo } from '../services/state.ts';
import { getCache } from '../services/cache-service.ts';
import { pingRedis } from '../config/redis.ts';

const router = Router();

interface Check {
  status: 'ok' | 'error' | 'loading' | 'disabled';
  error?: string;
  details?: unknown;
}

router.get('/', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    uptime: Math.round(process.uptime()),
    version: process.env.npm_package_version || '1.0.0',
  });
});

router.get('/ready', async (_req: Request, res: Response) => {
  const checks: Record<string, Check> = {};

  const info = datasetInfo();
  checks.dataset = { status: info.loaded ? 'ok' : 'loading', details: info };

  if (env.ENABLE_REDIS_CACHE) {
    try {
      checks.redis = { status: 'ok', details: { latencyMs: await pingRedis() } };
    } catch (err) {
      checks.redis = { status: 'error', error: err instanceof Error ? err.message : String(err) };
    }
  } else {
    checks.redis = { status: 'disabled' };
  }

  try {
    checks.cache = { status: 'ok', details: await getCache().getStats() };
  } catch (err) {
    checks.cache = { status: 'error', error: err instanceof Error ? err.message : String(err) };
  }

  const mem = process.memoryUsage();
  checks.memory = {
    status: 'ok',
    details: {
      heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
      rssMB: Math.round(mem.rss / 1024 / 1024),
    },
  };

  const ready = Object.values(checks).every(c => c.status === 'ok' || c.status === 'disabled');
  res.status(ready ? 200 : 503).json({
    status: ready ? 'ok' : info.loaded ? 'degraded' : 'loading',
    timestamp: new Date().toISOString(),
    uptime: Math.round(process.uptime()),
    checks,
    config: { nodeEnv: env.NODE_ENV, enableRedis: env.ENABLE_REDIS_CACHE },
  });
});

export default router;
