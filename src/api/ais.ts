// POST /api/ais and GET /api/ais/content/:content_id

import { Hono } from 'hono';
import { getAIProfileByContent, toAIProfileRecord, upsertAIProfile, type AIProfileDeps } from '../services/profiles/ais.js';
import { AIUpsertRequestSchema, validateBody } from './validation.js';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

export function createAIRoutes(deps: AIProfileDeps) {
  const app = new Hono();

  app.post('/', async (c) => {
    const body = await validateBody(c, AIUpsertRequestSchema);
    const correlationId = c.req.header(CORRELATION_ID_HEADER) || undefined;

    const { action, ai } = await upsertAIProfile(deps, body, correlationId);

    return c.json({
      message: `AI profile ${action} successfully`,
      ai_id: ai.aiId,
      content_id: ai.contentId,
      action,
    }, action === 'created' ? 201 : 200);
  });

  app.get('/content/:content_id{[0-9]+}', (c) => {
    const ai = getAIProfileByContent(deps.db, Number(c.req.param('content_id')));
    if (!ai) return c.json({ error: 'AI profile not found' }, 404);
    return c.json(toAIProfileRecord(ai));
  });

  return app;
}
