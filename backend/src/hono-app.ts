import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { compress } from 'hono/compress';
import { HTTPException } from 'hono/http-exception';

import type { ErrorBody } from '@medrun/shared';
import type { Backend } from './services/backend';
import { OperationHTTPException } from './lib/http';
import logger from './lib/logger';
import { createHealthRoute } from './routes/health';
import { createModelsRoute } from './routes/models';
import { createGpusRoute } from './routes/gpus';
import { createJobsRoute } from './routes/jobs';
import { createSettingsRoute } from './routes/settings';

/** Local development UI */
export const DEFAULT_CORS_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173'];

export interface AppOptions {
  corsOrigin?: string | string[];
  /** Accept engine executable paths in run requests and settings */
  allowExecutableOverrides?: boolean;
}

/**
 * Build the HTTP app over a backend instance
 */
export function createApp(backend: Backend, options: AppOptions = {}) {
  const app = new Hono();

  // ============================================================================
  // Middleware
  // ============================================================================

  app.use('*', compress());
  app.use(
    '*',
    cors({
      origin: options.corsOrigin ?? DEFAULT_CORS_ORIGINS,
    })
  );

  // Request logging
  app.use('*', async (c, next) => {
    logger.info({ method: c.req.method, url: c.req.url }, `${c.req.method} ${c.req.path}`);
    await next();
  });

  // ============================================================================
  // Routes
  // ============================================================================

  const routes = app
    .route('/api/health', createHealthRoute(backend))
    .route('/api/models', createModelsRoute(backend))
    .route('/api/gpus', createGpusRoute(backend))
    .route('/api/jobs', createJobsRoute(backend, { allowExecutableOverrides: options.allowExecutableOverrides }))
    .route('/api/settings', createSettingsRoute(backend, { allowExecutableOverrides: options.allowExecutableOverrides }));

  app.notFound((c) => {
    logger.warn(
      { method: c.req.method, url: c.req.url, statusCode: 404 },
      `No route matched: ${c.req.method} ${c.req.url}`
    );
    const body: ErrorBody = {
      error: { message: `Route not found: ${c.req.method} ${c.req.path}`, statusCode: 404, kind: 'NotFound' },
    };
    return c.json(body, 404);
  });

  app.onError((err, c) => {
    if (err instanceof OperationHTTPException) {
      const level = err.status >= 500 ? 'error' : 'warn';
      logger[level]({ kind: err.kind, statusCode: err.status, path: c.req.path }, err.message);
      const body: ErrorBody = { error: { message: err.message, statusCode: err.status, kind: err.kind } };
      return c.json(body, err.status);
    }

    if (err instanceof HTTPException) {
      logger.warn({ statusCode: err.status, path: c.req.path }, err.message);
      const body: ErrorBody = { error: { message: err.message, statusCode: err.status } };
      return c.json(body, err.status);
    }

    logger.error({ error: err, stack: err.stack }, `Error: ${err.message}`);
    const body: ErrorBody = {
      error: { message: err.message || 'Internal Server Error', statusCode: 500, kind: 'Internal' },
    };
    return c.json(body, 500);
  });

  return routes;
}

export type AppType = ReturnType<typeof createApp>;
