import { eq } from 'drizzle-orm';
import type { ProfileDatabase } from '../../db/index.js';
import { ais, type AIProfile, type NewAIProfile } from '../../db/schema.js';
import { AppError, GenerationError, NotFoundError, PersistenceError } from '../../utils/errors.js';
import { createLogger, errorMessage } from '../../utils/logger.js';
import { withLLMContext } from '../ai/call-context.js';
import type { TextGenerator } from '../ai/types.js';
import type { ContentClient } from '../content/client.js';
import { generateAIProfile, type GeneratedProfile } from './generator.js';
import type { UpsertAction } from './types.js';

const logger = createLogger('profiles:ais');

export interface AIProfileDeps {
  db: ProfileDatabase;
  contentClient: ContentClient;
  textGenerator: TextGenerator;
}

export interface AIUpsertInput {
  content_id: number;
  profile_pic_url?: string | null;
}

export interface AIProfileRecord {
  ai_id: number;
  content_id: number;
  display_name: string | null;
  name: string | null;
  bio: string | null;
  location: string | null;
  profile_pic_url: string | null;
  systems_instructions: string | null;
  created_at: string;
}

export interface AIUpsertResult {
  action: UpsertAction;
  ai: AIProfile;
}

type AIChanges = Partial<Pick<NewAIProfile,
  'displayName' | 'name' | 'bio' | 'location' | 'systemsInstructions' | 'profilePicUrl'>>;

// Generated text comes from the model; the picture only ever comes from the caller
function aiChanges(generated: GeneratedProfile, input: AIUpsertInput): AIChanges {
  const changes: AIChanges = {
    displayName: generated.display_name,
    name: generated.name,
    bio: generated.bio,
    location: generated.location,
    systemsInstructions: generated.systems_instructions,
  };
  if (input.profile_pic_url !== undefined) changes.profilePicUrl = input.profile_pic_url;
  return changes;
}

export function toAIProfileRecord(ai: AIProfile): AIProfileRecord {
  return {
    ai_id: ai.aiId,
    content_id: ai.contentId,
    display_name: ai.displayName,
    name: ai.name,
    bio: ai.bio,
    location: ai.location,
    profile_pic_url: ai.profilePicUrl,
    systems_instructions: ai.systemsInstructions,
    created_at: ai.createdAt,
  };
}

function saveAIProfile(db: ProfileDatabase, contentId: number, changes: AIChanges): AIUpsertResult {
  try {
    return db.transaction((tx): AIUpsertResult => {
      const now = new Date().toISOString();
      const existing = tx.select({ aiId: ais.aiId }).from(ais).where(eq(ais.contentId, contentId)).get();

      if (existing) {
        const ai = tx.update(ais)
          .set({ ...changes, updatedAt: now })
          .where(eq(ais.aiId, existing.aiId))
          .returning()
          .get();
        return { action: 'updated', ai };
      }

      const ai = tx.insert(ais)
        .values({ ...changes, contentId, createdAt: now, updatedAt: now })
        .returning()
        .get();
      return { action: 'created', ai };
    }, { behavior: 'immediate' });
  } catch (error) {
    logger.error('Error creating/updating AI profile', { contentId, error: errorMessage(error) });
    throw new PersistenceError(error);
  }
}

/**
 * Fetch the content, generate a persona for it and store the result.
 * Nothing is written unless both the content lookup and generation succeed.
 */
export async function upsertAIProfile(
  deps: AIProfileDeps,
  input: AIUpsertInput,
  correlationId?: string,
): Promise<AIUpsertResult> {
  const contentId = input.content_id;
  const log = logger.withData({ contentId, ...(correlationId ? { correlationId } : {}) });

  try {
    const content = await deps.contentClient.getContent(contentId, correlationId);
    if (!content) {
      throw new NotFoundError('Content not found');
    }

    const generated = await withLLMContext(
      { purpose: 'ai-profile', contentId, correlationId },
      () => generateAIProfile(deps.textGenerator, content),
    );
    if (!generated) {
      throw new GenerationError();
    }

    const result = saveAIProfile(deps.db, contentId, aiChanges(generated, input));
    log.info(`AI profile ${result.action}`, { aiId: result.ai.aiId });
    return result;
  } catch (error) {
    if (!(error instanceof AppError)) {
      log.error('AI profile upsert failed', { error: errorMessage(error) });
    }
    throw error;
  }
}

export function getAIProfileByContent(db: ProfileDatabase, contentId: number): AIProfile | null {
  return db.select().from(ais).where(eq(ais.contentId, contentId)).get() ?? null;
}
