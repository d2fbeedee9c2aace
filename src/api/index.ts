import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import type { ProfileDatabase } from '../db/index.js';
import type { TextGenerator } from '../services/ai/types.js';
import type { ContentClient } from '../services/content/client.js';
import { AppError, ValidationError } from '../utils/errors.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { apiKeyAuth } from './middleware/auth.js';
import { requestLog } from './middleware/request-log.js';
import { createUserRoutes } from './users.js';
import { createAIRoutes } from './ais.js';
import { createDocsRoutes } from './docs.js';

const logger = createLogger('api');

export interface ApiDeps {
  db: ProfileDatabase;
  contentClient: ContentClient;
  textGenerator: TextGenerator;
  apiKey: string;
}

export function createApi(deps: ApiDeps) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', bodyLimit({ maxSize: 1024 * 1024 }));
  app.use('*', requestLog());
  app.use('*', apiKeyAuth(deps.apiKey));

  app.route('/docs', createDocsRoutes());
  app.route('/api/users', createUserRoutes(deps.db));
  app.route('/api/ais', createAIRoutes(deps));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  // Callers only ever see the public message; details stay in the logs
  app.onError((error, c) => {
    if (error instanceof ValidationError) {
      return c.json({ error: error.publicMessage, ...(error.details ? { details: error.details } : {}) }, error.status);
    }

    if (error instanceof AppError) {
      if (error.status >= 500) {
        logger.error(error.publicMessage, {
          code: error.code,
          cause: error.cause === undefined ? undefined : errorMessage(error.cause),
          path: c.req.path,
          method: c.req.method,
        });
      }
      return c.json({ error: error.publicMessage }, error.status);
    }

    logger.error('Unhandled error', {
      error: errorMessage(error),
      stack: error.stack,
      path: c.req.path,
      method: c.req.method,
    });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
