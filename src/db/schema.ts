import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

// ============================================================================
// users: human profiles, keyed by the caller-assigned user_id
// ============================================================================
export const users = sqliteTable('users', {
  userId: integer('user_id').primaryKey(),
  displayName: text('display_name'),
  name: text('name').notNull(),
  bio: text('bio'),
  location: text('location'),
  profilePicUrl: text('profile_pic_url'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

// ============================================================================
// ais: generated personas, one per source content item
// ============================================================================
export const ais = sqliteTable('ais', {
  aiId: integer('ai_id').primaryKey({ autoIncrement: true }),
  contentId: integer('content_id').notNull().unique(),
  displayName: text('display_name'),
  name: text('name'),
  bio: text('bio'),
  location: text('location'),
  systemsInstructions: text('systems_instructions'),
  profilePicUrl: text('profile_pic_url'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type AIProfile = typeof ais.$inferSelect;
export type NewAIProfile = typeof ais.$inferInsert;
