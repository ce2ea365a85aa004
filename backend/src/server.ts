/**
 * server.ts — Process entry point
 *
 * Startup order: env → Sentry → listings dataset → Redis (optional) → listen.
 * The dataset load is a one-time blocking step: if it fails the process exits.
 *
 *   ENABLE_REDIS_CACHE=true → dashboard views cached in Redis
 */
import 'dotenv/config';
import { resolve } from 'path';
import type { Server } from 'http';
import { env } from './config/env.ts';
import { createApp } from './app.ts';
import { logger } from './shared/logger.ts';
import { initSentry, flushSentry, captureException } from './config/sentry.ts';
import { loadDataset } from './services/dataset.ts';
import { setDataset } from './services/state.ts';

const BOOT_TIME = Date.now();

let server: Server | null = null;

async function initInfrastructure(): Promise<void> {
  await initSentry();

  if (env.ENABLE_REDIS_CACHE) {
    try {
      const { getRedis } = await import('./config/redis.ts');
      await getRedis().connect();
      logger.info('Redis connected');
    } catch (err) {
      logger.warn({ err }, 'Redis failed — cache requests will miss');
    }
  } else {
    logger.info('Redis disabled (ENABLE_REDIS_CACHE=false)');
  }
}

// ─── Graceful shutdown ───

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down...');
  server?.close(() => logger.info('HTTP server closed'));

  try {
    await flushSentry(2000);
    if (env.ENABLE_REDIS_CACHE) { const { closeRedis } = await import('./config/redis.ts'); await closeRedis(); }
  } catch (err) { logger.warn({ err }, 'Cleanup error'); }

  process.exit(0);
}

process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
  captureException(reason);
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  captureException(err);
  setTimeout(() => process.exit(1), 1000).unref();
});

// ─── Start ───

async function main(): Promise<void> {
  await initInfrastructure();

  const dataFile = resolve(process.cwd(), env.DATA_FILE);
  const t0 = Date.now();
  const dataset = await loadDataset(dataFile, {
    encoding: env.DATA_ENCODING,
    incomeSeed: env.INCOME_SEED,
    incomeMin: env.INCOME_MIN,
    incomeMax: env.INCOME_MAX,
  });
  setDataset(dataset);
  logger.info({
    listings: dataset.listings.length,
    rejected: dataset.rejected,
    provinces: dataset.provinces.length,
    loadMs: Date.now() - t0,
  }, 'Data ready');

  const app = createApp();
  server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  });
}

main().catch(async (err: unknown) => {
  logger.fatal({ err }, 'Startup failed — no dataset, cannot serve the dashboard');
  captureException(err, { context: 'startup' });
  await flushSentry(2000);
  process.exit(1);
});
