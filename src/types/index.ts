// Centralized type definitions for the profiles service
// Re-exports Drizzle inferred types and the wire shapes of each route

export type { User, NewUser, AIProfile, NewAIProfile } from '../db/schema.js';
export type { UpsertAction } from '../services/profiles/types.js';
export type { UserRecord, UserUpsertInput, UserUpsertResult } from '../services/profiles/users.js';
export type { AIProfileRecord, AIUpsertInput, AIUpsertResult } from '../services/profiles/ais.js';
export type { ContentMetadata } from '../services/content/client.js';
export type { GeneratedProfile } from '../services/profiles/generator.js';
export type { AIResponse, TextGenerator, TokenUsage } from '../services/ai/types.js';
export type { AppConfig, AIConfig, AIProvider } from '../config.js';
