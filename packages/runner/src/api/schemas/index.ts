export * from './workItem.js';
