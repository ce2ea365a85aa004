/**
 * app.ts — Express application (no listening, no data loading)
 *
 * server.ts loads the dataset and listens; tests mount this app directly.
 */
import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import compression from 'compression';
import { randomUUID } from 'crypto';
import { env } from './config/env.ts';
import dashboardRoutes from './routes/dashboard.ts';
import healthRoutes from './routes/health.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsMiddleware, metricsEndpoint } from './shared/metrics.ts';
import { isAppError } from './shared/errors.ts';
import { captureException } from './config/sentry.ts';

export function createApp(): express.Express {
  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  const allowedOrigins = env.ALLOWED_ORIGINS.split(',').map(s => s.trim());
  app.use(cors({
    origin: allowedOrigins.includes('*') ? true : allowedOrigins,
  }));
  app.use(compression({ threshold: 1024 }));

  app.use(metricsMiddleware());
  app.use(requestLogger());

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    next();
  });

  // ─── Rate limiting (in-memory, per IP) ───

  const ipHits = new Map<string, number>();
  const resetTimer = setInterval(() => ipHits.clear(), env.RATE_LIMIT_WINDOW_MS);
  resetTimer.unref();

  app.use(env.API_BASE, (req, res, next) => {
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const hits = (ipHits.get(ip) || 0) + 1;
    ipHits.set(ip, hits);
    res.setHeader('X-RateLimit-Limit', String(env.RATE_LIMIT_MAX));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, env.RATE_LIMIT_MAX - hits)));
    if (hits > env.RATE_LIMIT_MAX) {
      res.status(429).json({ success: false, error: 'Rate limited', code: 'RATE_LIMITED' });
      return;
    }
    next();
  });

  // ─── API Routes ───

  app.get(`${env.API_BASE}/metrics`, metricsEndpoint);
  app.use(`${env.API_BASE}/health`, healthRoutes);
  app.use(env.API_BASE, dashboardRoutes);

  app.use(env.API_BASE, (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });

  // ─── Error handling: known errors keep their status, the rest become 500 ───

  const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
    const errId = req.id || randomUUID().slice(0, 8);
    if (isAppError(err) && err.status < 500) {
      (req.log ?? logger).warn({ code: err.code, details: err.details }, err.message);
      res.status(err.status).json({ success: false, error: err.message, code: err.code, details: err.details, requestId: errId });
      return;
    }

    logger.error({ err, reqId: errId, method: req.method, url: req.url }, `Unhandled error [${errId}]`);
    captureException(err, { requestId: errId, url: req.url });
    const status = isAppError(err) ? err.status : 500;
    const detail = err instanceof Error ? err.message : String(err);
    const message = isAppError(err) || env.NODE_ENV !== 'production' ? detail : 'Internal server error';
    res.status(status).json({
      success: false,
      error: message,
      code: isAppError(err) ? err.code : 'INTERNAL',
      requestId: errId,
    });
  };
  app.use(errorHandler);

  return app;
}
