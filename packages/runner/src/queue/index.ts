export * from './types.js';
export * from './stateMachine.js';
export * from './retryPolicy.js';
export * from './view.js';
