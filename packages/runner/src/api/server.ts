import { pathToFileURL } from 'node:url';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { getEnv } from '../config/env.js';
import { errorMessage } from '../errors/classify.js';
import { getLogger, requestLoggingMiddleware } from '../monitoring/logger.js';
import type { SessionState } from '../sessions/types.js';
import type { WorkItemStore } from '../store/types.js';
import type { AdHocRunner } from '../workers/AdHocRunner.js';
import { createPersistence, createPortalStack } from '../workers/runtime.js';
import { errorHandler, SERVICE_KEY_HEADER, serviceKeyAuth } from './middleware/index.js';
import { createHealthRoutes } from './routes/health.js';
import { createRunRoutes, createWorkItemRoutes } from './routes/workItems.js';

export interface AppDeps {
  store: WorkItemStore;
  adHoc: AdHocRunner;
  sessions?: { readonly state: SessionState };
  serviceSecret?: string;
  corsOrigin?: string;
}

/**
 * Create and configure the Hono API application.
 * Dependencies are passed in so tests can use in-memory stand-ins.
 */
export function createApp(deps: AppDeps) {
  const app = new Hono();

  // ─── Global Middleware ─────────────────────────────────────────

  app.use('*', requestLoggingMiddleware());
  app.use(
    '*',
    cors({
      origin: deps.corsOrigin ?? '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', SERVICE_KEY_HEADER],
      maxAge: 86400,
    }),
  );

  // ─── Error Handler ─────────────────────────────────────────────

  app.onError(errorHandler);

  // ─── Health Check (no auth required) ───────────────────────────

  app.route('/health', createHealthRoutes({ store: deps.store, sessions: deps.sessions }));

  // ─── Authenticated API Routes ──────────────────────────────────

  const api = new Hono();
  api.use('*', serviceKeyAuth(deps.serviceSecret));
  api.route('/work-items', createWorkItemRoutes(deps.store));
  api.route('/run', createRunRoutes(deps.adHoc));

  app.route('/api/v1', api);

  // ─── 404 Fallback ─────────────────────────────────────────────

  app.notFound((c) => {
    return c.json({ error: 'not_found', message: 'Route not found' }, 404);
  });

  return app;
}

/** Build the production stack and listen on API_PORT. */
export async function startServer(): Promise<void> {
  const env = getEnv();
  const logger = getLogger({ service: 'api' });
  const { db, store } = createPersistence(env);
  const portal = createPortalStack(env);

  const app = createApp({
    store,
    adHoc: portal.adHoc,
    sessions: portal.sessions,
    serviceSecret: env.SERVICE_SECRET,
    corsOrigin: env.CORS_ORIGIN,
  });

  const server = serve({ fetch: app.fetch, port: env.API_PORT });
  portal.keepAlive.start();
  logger.info('API listening', { port: env.API_PORT });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Received signal, shutting down API', { signal });
    portal.keepAlive.stop();
    server.close();
    await portal.sessions.close();
    await db.close();
    process.exit(0);
  };
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error('API shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      });
    });
  }
}

// Auto-start when run directly
const isMainModule = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMainModule) {
  startServer().catch((err) => {
    getLogger({ service: 'api' }).error('API failed to start', { error: errorMessage(err) });
    process.exit(1);
  });
}
