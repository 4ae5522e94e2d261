export * from './taxonomy.js';
export { classifyError, errorMessage } from './classify.js';
