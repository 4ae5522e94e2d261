import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ValidationError } from '../../errors/taxonomy.js';
import { getLogger } from '../../monitoring/logger.js';
import { DuplicateError, NotFoundError } from '../../store/errors.js';

/**
 * Global error handler for the Hono app. Maps known errors to their status
 * and returns a consistent JSON body for everything else.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }
  if (err instanceof NotFoundError) {
    return c.json({ error: 'not_found', message: err.message }, 404);
  }
  if (err instanceof DuplicateError) {
    return c.json({ error: 'duplicate_idempotency_key', existing_id: err.existingId }, 409);
  }
  if (err instanceof ValidationError) {
    return c.json({ error: 'validation_error', message: err.message, details: err.issues }, 422);
  }

  getLogger().error('API error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  return c.json({ error: 'internal_error', message: 'An unexpected error occurred' }, 500);
};
