import { getEnv } from '../config/env.js';
import { errorMessage } from '../errors/classify.js';
import { getLogger } from '../monitoring/logger.js';
import { runMigrations } from '../store/migrate.js';
import { QueueDispatcher } from './QueueDispatcher.js';
import { createPersistence, createPortalStack, defaultWorkerId } from './runtime.js';

/**
 * Worker Entry Point
 *
 * Long-running process that:
 * 1. Connects to PostgreSQL and applies pending migrations
 * 2. Builds the shared portal session, workflows and executor
 * 3. Reclaims stale claims, then polls for PENDING work items (FOR UPDATE SKIP LOCKED)
 * 4. Keeps the portal session alive between items
 * 5. Drains and releases its claims on SIGTERM/SIGINT
 */

function parseWorkerId(fallback: string): string {
  const arg = process.argv.find((a) => a.startsWith('--worker-id='));
  if (arg) {
    const id = arg.split('=')[1];
    if (!id) {
      throw new Error('--worker-id requires a value (e.g. --worker-id=worker-1)');
    }
    return id;
  }
  return fallback;
}

async function main(): Promise<void> {
  const env = getEnv();
  const workerId = parseWorkerId(defaultWorkerId(env));
  const logger = getLogger({ service: 'worker', workerId });
  logger.info('Worker starting', { workerId, maxConcurrent: env.WORKER_MAX_CONCURRENT });

  const { db, store } = createPersistence(env);
  const applied = await runMigrations(db);
  if (applied.length > 0) {
    logger.info('Applied migrations', { applied });
  }

  const portal = createPortalStack(env);
  const dispatcher = new QueueDispatcher({
    store,
    executor: portal.executor,
    workerId,
    retryPolicy: portal.retryPolicy,
    maxConcurrent: env.WORKER_MAX_CONCURRENT,
    pollIntervalMs: env.POLL_INTERVAL_MS,
    staleClaimMs: env.STALE_CLAIM_SECONDS * 1000,
    watchdogIntervalMs: env.WATCHDOG_INTERVAL_MS,
    drainTimeoutMs: env.DRAIN_TIMEOUT_MS,
  });

  // Two-phase shutdown handler:
  // - First signal: graceful shutdown (drain in-flight items, release claims)
  // - Second signal: release claims and exit immediately
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn('Received second signal, forcing shutdown', { signal });
      await dispatcher.releaseClaims();
      await db.close().catch((err: unknown) => {
        logger.warn('Closing database pool failed', { error: errorMessage(err) });
      });
      logger.info('Worker force-killed', { workerId });
      process.exit(1);
    }

    shuttingDown = true;
    logger.info('Received signal, starting graceful shutdown', { signal });
    logger.info('Press Ctrl-C again to force-kill immediately');

    portal.keepAlive.stop();
    await dispatcher.stop();
    await portal.sessions.close();
    await db.close();

    logger.info('Worker shut down', { workerId });
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error('Shutdown failed', { signal, error: errorMessage(err) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Handle uncaught errors to prevent silent crashes
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message });
    // Give time for logs to flush, then exit
    setTimeout(() => process.exit(1), 1000);
  });

  await dispatcher.start();
  portal.keepAlive.start();
  logger.info('Worker ready', { workerId });
}

main().catch((err) => {
  getLogger({ service: 'worker' }).error('Worker failed to start', { error: errorMessage(err) });
  process.exit(1);
});
