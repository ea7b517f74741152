import { createMiddleware } from 'hono/factory';
import { createHash, timingSafeEqual } from 'crypto';
import { createChildLogger } from '../config/logger.js';

const log = createChildLogger('auth');

/**
 * API key authentication middleware.
 *
 * The key is passed via the Authorization header:
 *   Authorization: Bearer <API_KEY>
 *
 * Keys are compared as SHA-256 digests in constant time. With no key
 * configured every request is refused.
 */
export function createAuthMiddleware(apiKey: string | undefined) {
  const expected = apiKey ? hashApiKey(apiKey) : null;

  return createMiddleware(async (c, next) => {
    if (!expected) {
      log.warn({ path: c.req.path }, 'Task request refused: API_KEY is not set');
      return c.json({ error: 'API key authentication is not configured' }, 503);
    }

    const authHeader = c.req.header('Authorization');
    if (!authHeader?.startsWith('Bearer ')) {
      return c.json({ error: 'Missing or invalid Authorization header' }, 401);
    }

    if (!timingSafeEqual(hashApiKey(authHeader.slice(7)), expected)) {
      log.warn({ path: c.req.path }, 'Invalid API key');
      return c.json({ error: 'Invalid API key' }, 401);
    }

    await next();
  });
}

export function hashApiKey(key: string): Buffer {
  return createHash('sha256').update(key).digest();
}
