export { createApp, startServer, type AppDeps } from './server.js';
export * from './schemas/index.js';
