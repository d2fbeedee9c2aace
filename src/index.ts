import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApi } from './api/index.js';
import { createDatabase } from './db/index.js';
import { loadConfig, validateConfig } from './config.js';
import { createContentClient } from './services/content/client.js';
import { createTextGenerator } from './services/ai/clients.js';
import { createLogger, errorMessage } from './utils/logger.js';

const logger = createLogger('server');

function main(): void {
  logger.info('Starting Persona Profiles service');

  const config = loadConfig();
  validateConfig(config);

  const database = createDatabase(config.database.url);

  const app = createApi({
    db: database.db,
    apiKey: config.auth.apiKey,
    contentClient: createContentClient({
      baseUrl: config.content.baseUrl,
      apiKey: config.auth.apiKey,
    }),
    textGenerator: createTextGenerator(config.ai),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  });

  logger.info(`Server running on http://${config.server.host}:${config.server.port}`, {
    aiProvider: config.ai.provider,
    aiModel: config.ai.model,
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      database.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
}
