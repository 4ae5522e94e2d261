export * from './errors/index.js';
export * from './queue/index.js';
export * from './store/index.js';
export * from './sessions/index.js';
export * from './portal/index.js';
export { FileArtifactSink, type ArtifactSink, type StoredArtifact } from './artifacts/ArtifactSink.js';
export { TaskExecutor, type TaskExecutorOptions } from './workers/TaskExecutor.js';
export {
  QueueDispatcher,
  type DispatchReport,
  type DispatcherEvents,
  type QueueDispatcherOptions,
} from './workers/QueueDispatcher.js';
export { AdHocRunner, type AdHocResult, type AdHocRunnerOptions } from './workers/AdHocRunner.js';
export type { WorkItemExecutor } from './workers/types.js';
export { createApp, type AppDeps } from './api/server.js';
export { getEnv, resetEnv, loadPortalForms, type Env, type PortalFormsConfig } from './config/index.js';
export { getLogger, Logger, type LogLevel } from './monitoring/logger.js';
