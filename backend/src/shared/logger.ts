/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 *
 * Features:
 *   - Child loggers with request ID correlation
 *   - Express middleware for automatic request logging
 */
import pino, { type Logger } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { env } from '../config/env.ts';

declare module 'express-serve-static-core' {
  interface Request {
    id?: string;
    log?: Logger;
  }
}

export const logger = pino({
  level: env.LOG_LEVEL,
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
  base: {
    service: 'housing-api',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

/**
 * Express middleware: logs every API request with duration and status.
 * Attaches a child logger to req.log for per-request context.
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    const header = req.headers['x-request-id'];
    const reqId = typeof header === 'string' && header ? header : randomUUID().slice(0, 8);

    req.id = reqId;
    req.log = logger.child({ reqId });
    res.setHeader('X-Request-Id', reqId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      (req.log ?? logger)[level]({
        req: { method: req.method, url: req.originalUrl, ip: req.ip },
        res: { statusCode: res.statusCode },
        duration,
      }, `${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`);
    });

    next();
  };
}

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'dataset' });
 */
export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
