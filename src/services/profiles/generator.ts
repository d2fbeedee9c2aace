import { z } from 'zod';
import { createLogger, errorMessage } from '../../utils/logger.js';
import type { TextGenerator } from '../ai/types.js';
import type { ContentMetadata } from '../content/client.js';
import { PROFILE_SYSTEM_PROMPT, buildProfilePrompt } from './prompts.js';

const logger = createLogger('profiles:generator');

export const GeneratedProfileSchema = z.object({
  display_name: z.string(),
  name: z.string(),
  bio: z.string(),
  location: z.string(),
  systems_instructions: z.string(),
}).strict();

export type GeneratedProfile = z.infer<typeof GeneratedProfileSchema>;

/**
 * Remove a markdown code fence wrapped around the model output.
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

/**
 * Parse raw model output into a profile. Throws on empty output, malformed
 * JSON, or any deviation from the five-field schema.
 */
export function parseGeneratedProfile(raw: string): GeneratedProfile {
  const cleaned = stripCodeFences(raw);
  if (!cleaned) {
    throw new Error('Empty response from model');
  }

  const parsed: unknown = JSON.parse(cleaned);
  const result = GeneratedProfileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new Error(`Generated profile failed validation: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Generate an AI persona for a content item with a single LLM call.
 * Returns null on any failure; callers treat that as a hard stop.
 */
export async function generateAIProfile(
  generator: TextGenerator,
  content: ContentMetadata,
): Promise<GeneratedProfile | null> {
  logger.info('Generating AI profile', { title: content.title ?? 'Unknown' });

  try {
    const response = await generator.generate(buildProfilePrompt(content), {
      systemPrompt: PROFILE_SYSTEM_PROMPT,
    });

    logger.debug('Model output', { text: response.text.substring(0, 500) });

    return parseGeneratedProfile(response.text);
  } catch (error) {
    logger.error('Error generating AI profile', { error: errorMessage(error) });
    return null;
  }
}
