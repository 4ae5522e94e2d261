import { Hono } from 'hono';
import { errorMessage } from '../../errors/classify.js';
import { getLogger } from '../../monitoring/logger.js';
import type { SessionState } from '../../sessions/types.js';
import type { StatusCounts, WorkItemStore } from '../../store/types.js';

const startedAt = Date.now();

export interface HealthDeps {
  store: WorkItemStore;
  sessions?: { readonly state: SessionState };
}

export function createHealthRoutes(deps: HealthDeps) {
  const health = new Hono();

  health.get('/', async (c) => {
    let queue: StatusCounts | null = null;
    try {
      queue = await deps.store.counts();
    } catch (err) {
      getLogger().warn('Health check could not read queue counts', { error: errorMessage(err) });
    }

    return c.json(
      {
        status: queue ? 'ok' : 'degraded',
        service: 'portalrunner',
        environment: process.env.NODE_ENV || 'development',
        uptime_seconds: Math.round((Date.now() - startedAt) / 1000),
        queue,
        session: deps.sessions?.state ?? null,
        timestamp: new Date().toISOString(),
      },
      queue ? 200 : 503,
    );
  });

  return health;
}
