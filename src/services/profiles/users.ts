import { eq } from 'drizzle-orm';
import type { ProfileDatabase } from '../../db/index.js';
import { users, type NewUser, type User } from '../../db/schema.js';
import { AppError, PersistenceError, ValidationError } from '../../utils/errors.js';
import { createLogger, errorMessage } from '../../utils/logger.js';
import type { UpsertAction } from './types.js';

const logger = createLogger('profiles:users');

export interface UserUpsertInput {
  user_id: number;
  display_name?: string | null;
  name?: string;
  bio?: string | null;
  location?: string | null;
  profile_pic_url?: string | null;
}

export interface UserRecord {
  user_id: number;
  display_name: string | null;
  name: string;
  bio: string | null;
  location: string | null;
  profile_pic_url: string | null;
  created_at: string;
}

export interface UserUpsertResult {
  action: UpsertAction;
  user: User;
}

type UserChanges = Partial<Pick<NewUser, 'displayName' | 'name' | 'bio' | 'location' | 'profilePicUrl'>>;

// Only keys present in the payload take part in the merge
function userChanges(input: UserUpsertInput): UserChanges {
  const changes: UserChanges = {};
  if (input.display_name !== undefined) changes.displayName = input.display_name;
  if (input.name !== undefined) changes.name = input.name;
  if (input.bio !== undefined) changes.bio = input.bio;
  if (input.location !== undefined) changes.location = input.location;
  if (input.profile_pic_url !== undefined) changes.profilePicUrl = input.profile_pic_url;
  return changes;
}

export function toUserRecord(user: User): UserRecord {
  return {
    user_id: user.userId,
    display_name: user.displayName,
    name: user.name,
    bio: user.bio,
    location: user.location,
    profile_pic_url: user.profilePicUrl,
    created_at: user.createdAt,
  };
}

/**
 * Create the user if `user_id` is new, otherwise merge the supplied fields
 * into the stored row. Lookup and write share one immediate transaction.
 */
export function upsertUser(db: ProfileDatabase, input: UserUpsertInput): UserUpsertResult {
  const changes = userChanges(input);

  try {
    const result = db.transaction((tx): UserUpsertResult => {
      const now = new Date().toISOString();
      const existing = tx.select().from(users).where(eq(users.userId, input.user_id)).get();

      if (existing) {
        const user = tx.update(users)
          .set({ ...changes, updatedAt: now })
          .where(eq(users.userId, input.user_id))
          .returning()
          .get();
        return { action: 'updated', user };
      }

      if (changes.name === undefined) {
        throw new ValidationError('Name is required to create a user');
      }

      const user = tx.insert(users)
        .values({ ...changes, name: changes.name, userId: input.user_id, createdAt: now, updatedAt: now })
        .returning()
        .get();
      return { action: 'created', user };
    }, { behavior: 'immediate' });

    logger.info(`User profile ${result.action}`, { userId: input.user_id });
    return result;
  } catch (error) {
    if (error instanceof AppError) throw error;
    logger.error('Error creating/updating user profile', {
      userId: input.user_id,
      error: errorMessage(error),
    });
    throw new PersistenceError(error);
  }
}

export function getUser(db: ProfileDatabase, userId: number): User | null {
  return db.select().from(users).where(eq(users.userId, userId)).get() ?? null;
}
