import { z } from 'zod';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('content-client');

// Non-string metadata is flattened to prompt text
function toPromptText(value: unknown): unknown {
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) {
    return value.map((item) => (typeof item === 'string' ? item : JSON.stringify(item))).join(', ');
  }
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return value;
}

const optionalText = z.preprocess(toPromptText, z.string().nullish());

export const ContentMetadataSchema = z.object({
  title: optionalText,
  author: optionalText,
  topic: optionalText,
  genre: optionalText,
  custom_prompt: optionalText,
});

export type ContentMetadata = z.infer<typeof ContentMetadataSchema>;

export interface ContentClientOptions {
  baseUrl: string;
  apiKey: string;
  fetch?: typeof fetch;
}

export interface ContentClient {
  /**
   * Look up content metadata. Resolves null unless the content service answers
   * 200; network and body errors reject.
   */
  getContent(contentId: number, correlationId?: string): Promise<ContentMetadata | null>;
}

export function createContentClient(options: ContentClientOptions): ContentClient {
  const fetchImpl = options.fetch ?? fetch;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  return {
    async getContent(contentId, correlationId) {
      const url = `${baseUrl}/api/content/${contentId}`;
      const headers: Record<string, string> = {
        'Accept': 'application/json',
        'X-API-KEY': options.apiKey,
      };
      if (correlationId) {
        headers['X-Correlation-ID'] = correlationId;
      }

      logger.debug('Fetching content', { contentId, correlationId });

      const response = await fetchImpl(url, { headers });

      if (response.status !== 200) {
        logger.warn('Content service did not return 200', {
          contentId,
          status: response.status,
          correlationId,
        });
        return null;
      }

      const body: unknown = await response.json();
      const result = ContentMetadataSchema.safeParse(body);
      if (!result.success) {
        throw new Error(`Malformed content metadata for content ${contentId}`);
      }

      return result.data;
    },
  };
}
