import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ais } from '../../../src/db/schema.js';
import { llmCallContext } from '../../../src/services/ai/call-context.js';
import {
  CONTENT,
  CONTENT_BASE_URL,
  GENERATED_PROFILE,
  TEST_API_KEY,
  authHeaders,
  completion,
  createContentFetch,
  createTestApp,
  fenced,
  jsonResponse,
  postJson,
} from '../../helpers/app.js';

describe('AI profiles API', () => {
  let ctx: ReturnType<typeof createTestApp>;

  beforeEach(() => {
    ctx = createTestApp();
  });

  afterEach(() => {
    ctx.handle.close();
  });

  describe('POST /api/ais', () => {
    it('generates and stores a new AI profile with 201', async () => {
      const res = await ctx.app.request('/api/ais', postJson({
        content_id: 42,
        profile_pic_url: 'https://example.com/scribbler.png',
      }));

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        message: 'AI profile created successfully',
        ai_id: 1,
        content_id: 42,
        action: 'created',
      });

      const getRes = await ctx.app.request('/api/ais/content/42', { headers: authHeaders() });
      expect(getRes.status).toBe(200);
      expect(await getRes.json()).toEqual({
        ai_id: 1,
        content_id: 42,
        ...GENERATED_PROFILE,
        profile_pic_url: 'https://example.com/scribbler.png',
        created_at: expect.any(String),
      });
    });

    it('fetches the content with the shared key before generating', async () => {
      await ctx.app.request('/api/ais', postJson({ content_id: 42 }));

      expect(ctx.contentFetch).toHaveBeenCalledOnce();
      expect(ctx.contentFetch).toHaveBeenCalledWith(`${CONTENT_BASE_URL}/api/content/42`, {
        headers: { 'Accept': 'application/json', 'X-API-KEY': TEST_API_KEY },
      });
      expect(ctx.generate).toHaveBeenCalledOnce();
      expect(ctx.generate.mock.calls[0][0]).toContain(`Title: ${CONTENT.title}`);
    });

    it('reports a second call for the same content as an update of the same record', async () => {
      const first = await ctx.app.request('/api/ais', postJson({
        content_id: 42,
        profile_pic_url: 'https://example.com/first.png',
      }));
      const second = await ctx.app.request('/api/ais', postJson({ content_id: 42 }));

      expect(first.status).toBe(201);
      expect(second.status).toBe(200);
      expect(await second.json()).toEqual({
        message: 'AI profile updated successfully',
        ai_id: 1,
        content_id: 42,
        action: 'updated',
      });

      const rows = ctx.db.select().from(ais).all();
      expect(rows).toHaveLength(1);
      expect(rows[0].profilePicUrl).toBe('https://example.com/first.png');
    });

    it('returns 404 and writes nothing when the content service has no such content', async () => {
      const contentFetch = vi.fn<typeof fetch>(async () => jsonResponse({ error: 'missing' }, 404));
      const app404 = createTestApp({ fetch: contentFetch });

      const res = await app404.app.request('/api/ais', postJson({ content_id: 404 }));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Content not found' });
      expect(app404.generate).not.toHaveBeenCalled();
      expect(app404.db.select().from(ais).all()).toHaveLength(0);
      app404.handle.close();
    });

    it('returns 500 and writes nothing when the model call fails', async () => {
      ctx.generate.mockRejectedValueOnce(new Error('upstream overloaded'));

      const res = await ctx.app.request('/api/ais', postJson({ content_id: 42 }));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Failed to generate AI profile' });
      expect(ctx.db.select().from(ais).all()).toHaveLength(0);
    });

    it('returns 500 and writes nothing when the model answers with prose', async () => {
      ctx.generate.mockResolvedValueOnce(completion('I would be delighted to help with that!'));

      const res = await ctx.app.request('/api/ais', postJson({ content_id: 42 }));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Failed to generate AI profile' });
      expect(ctx.db.select().from(ais).all()).toHaveLength(0);
    });

    it('rejects generated JSON that is missing a field', async () => {
      const { systems_instructions: _dropped, ...partial } = GENERATED_PROFILE;
      ctx.generate.mockResolvedValueOnce(completion(fenced(partial)));

      const res = await ctx.app.request('/api/ais', postJson({ content_id: 42 }));

      expect(res.status).toBe(500);
      expect(ctx.db.select().from(ais).all()).toHaveLength(0);
    });

    it('keeps the stored profile when a later generation fails', async () => {
      await ctx.app.request('/api/ais', postJson({ content_id: 42 }));
      ctx.generate.mockRejectedValueOnce(new Error('timeout'));

      const res = await ctx.app.request('/api/ais', postJson({ content_id: 42, profile_pic_url: 'https://example.com/new.png' }));

      expect(res.status).toBe(500);
      const rows = ctx.db.select().from(ais).all();
      expect(rows).toHaveLength(1);
      expect(rows[0].bio).toBe(GENERATED_PROFILE.bio);
      expect(rows[0].profilePicUrl).toBeNull();
    });

    it('returns 500 when the content service is unreachable', async () => {
      const unreachable = createTestApp({
        fetch: vi.fn<typeof fetch>(async () => {
          throw new TypeError('fetch failed');
        }),
      });

      const res = await unreachable.app.request('/api/ais', postJson({ content_id: 42 }));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Internal server error' });
      unreachable.handle.close();
    });

    it('rejects a payload without content_id before calling anything', async () => {
      const res = await ctx.app.request('/api/ais', postJson({ profile_pic_url: 'https://example.com/x.png' }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Content ID is required' });
      expect(ctx.contentFetch).not.toHaveBeenCalled();
      expect(ctx.generate).not.toHaveBeenCalled();
    });

    it('rejects a content_id beyond the safe integer range before calling anything', async () => {
      const res = await ctx.app.request('/api/ais', postJson({ content_id: 1e20 }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: 'Validation failed',
        details: [{ path: 'content_id' }],
      });
      expect(ctx.contentFetch).not.toHaveBeenCalled();
    });

    it('treats a 204 from the content service as not found', async () => {
      const noContent = createTestApp({
        fetch: vi.fn<typeof fetch>(async () => new Response(null, { status: 204 })),
      });

      const res = await noContent.app.request('/api/ais', postJson({ content_id: 42 }));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Content not found' });
      expect(noContent.generate).not.toHaveBeenCalled();
      noContent.handle.close();
    });

    it('generates from metadata that is not plain text', async () => {
      const mixed = createTestApp({
        fetch: createContentFetch({ title: 'T', genre: ['a', 'b'], topic: 7 }),
      });

      const res = await mixed.app.request('/api/ais', postJson({ content_id: 42 }));

      expect(res.status).toBe(201);
      const prompt = mixed.generate.mock.calls[0][0];
      expect(prompt).toContain('Topic: 7\n');
      expect(prompt).toContain('Genre: a, b\n');
      expect(mixed.db.select().from(ais).all()).toHaveLength(1);
      mixed.handle.close();
    });

    it('forwards X-Correlation-ID to the content service and the model call', async () => {
      let seenCorrelationId: string | undefined;
      ctx.generate.mockImplementationOnce(async () => {
        seenCorrelationId = llmCallContext.getStore()?.correlationId;
        return completion(fenced(GENERATED_PROFILE));
      });

      await ctx.app.request('/api/ais', postJson(
        { content_id: 42 },
        authHeaders({ 'X-Correlation-ID': 'corr-123' }),
      ));

      expect(ctx.contentFetch).toHaveBeenCalledWith(`${CONTENT_BASE_URL}/api/content/42`, {
        headers: {
          'Accept': 'application/json',
          'X-API-KEY': TEST_API_KEY,
          'X-Correlation-ID': 'corr-123',
        },
      });
      expect(seenCorrelationId).toBe('corr-123');
    });
  });

  describe('GET /api/ais/content/:content_id', () => {
    it('returns 404 when no profile exists for the content', async () => {
      const res = await ctx.app.request('/api/ais/content/5', { headers: authHeaders() });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'AI profile not found' });
    });
  });
});
