import type { MiddlewareHandler } from 'hono';

export const SERVICE_KEY_HEADER = 'X-Service-Key';

/**
 * Service-to-service authentication: the X-Service-Key header must match the
 * configured service secret.
 */
export function serviceKeyAuth(expectedSecret: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (!expectedSecret) {
      return c.json({ error: 'server_config_error', message: 'Service secret not configured' }, 500);
    }

    const serviceKey = c.req.header(SERVICE_KEY_HEADER);
    if (!serviceKey) {
      return c.json({ error: 'unauthorized', message: 'Missing authentication credentials' }, 401);
    }
    if (serviceKey !== expectedSecret) {
      return c.json({ error: 'unauthorized', message: 'Invalid service key' }, 401);
    }

    await next();
  };
}
