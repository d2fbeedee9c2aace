import type { MiddlewareHandler } from 'hono';
import { createLogger } from '../../utils/logger.js';
import { isDocsPath } from './auth.js';

const logger = createLogger('http');

const REDACTED_HEADERS = new Set(['x-api-key', 'authorization', 'cookie', 'set-cookie']);

export function redactHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key] = REDACTED_HEADERS.has(key.toLowerCase()) ? '[REDACTED]' : value;
  });
  return out;
}

/**
 * Logs every non-documentation request with credential headers redacted.
 * Bodies are only logged at debug level.
 */
export function requestLog(): MiddlewareHandler {
  return async (c, next) => {
    if (isDocsPath(c.req.path)) {
      await next();
      return;
    }

    const start = performance.now();

    logger.info('Request received', {
      method: c.req.method,
      path: c.req.path,
      headers: redactHeaders(c.req.raw.headers),
    });

    if (c.req.method !== 'GET' && c.req.method !== 'HEAD') {
      logger.debug('Request body', { body: await c.req.text() });
    }

    await next();

    logger.info('Request completed', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
    });
  };
}
