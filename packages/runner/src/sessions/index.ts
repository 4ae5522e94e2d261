export { AsyncMutex } from './asyncMutex.js';
export { SessionManager, type SessionManagerConfig } from './SessionManager.js';
export { KeepAliveService, type KeepAliveOptions } from './KeepAliveService.js';
export { PlaywrightSessionFactory, type PlaywrightSessionFactoryConfig, type PortalSession } from './PlaywrightSessionFactory.js';
export type { SessionFactory, SessionState } from './types.js';
