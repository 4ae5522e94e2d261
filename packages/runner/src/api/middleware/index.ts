export { serviceKeyAuth, SERVICE_KEY_HEADER } from './auth.js';
export { parseBody, parseQuery, formatZodError, type Parsed } from './validation.js';
export { errorHandler } from './error-handler.js';
