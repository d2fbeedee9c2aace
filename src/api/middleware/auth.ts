import { timingSafeEqual } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('auth');

export const API_KEY_HEADER = 'X-API-KEY';
export const DOCS_PATH = '/docs';

export function isDocsPath(path: string): boolean {
  return path === DOCS_PATH || path.startsWith(`${DOCS_PATH}/`);
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Hono middleware that requires the shared secret in X-API-KEY on every
 * route except the documentation route.
 */
export function apiKeyAuth(apiKey: string): MiddlewareHandler {
  return async (c, next) => {
    if (isDocsPath(c.req.path)) {
      await next();
      return;
    }

    const provided = c.req.header(API_KEY_HEADER);

    if (provided === undefined) {
      logger.warn('No X-API-KEY header', { path: c.req.path, method: c.req.method });
      return c.json({ error: 'No X-API-KEY' }, 401);
    }

    // An unset server key rejects everything rather than matching an empty header
    if (!apiKey || !keysMatch(provided, apiKey)) {
      logger.warn('Invalid X-API-KEY', { path: c.req.path, method: c.req.method });
      return c.json({ error: 'Invalid X-API-KEY' }, 401);
    }

    await next();
  };
}
