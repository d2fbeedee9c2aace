import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('database');

export type ProfileDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: ProfileDatabase;
  close(): void;
}

// Mirrors schema.ts; the UNIQUE on ais.content_id backs the one-persona-per-content rule
const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  user_id INTEGER PRIMARY KEY,
  display_name TEXT,
  name TEXT NOT NULL,
  bio TEXT,
  location TEXT,
  profile_pic_url TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS ais (
  ai_id INTEGER PRIMARY KEY AUTOINCREMENT,
  content_id INTEGER NOT NULL UNIQUE,
  display_name TEXT,
  name TEXT,
  bio TEXT,
  location TEXT,
  systems_instructions TEXT,
  profile_pic_url TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

export function createDatabase(url: string): DatabaseHandle {
  logger.info('Initializing database', { url });

  if (url !== ':memory:') {
    mkdirSync(dirname(url), { recursive: true });
  }

  const sqlite = new Database(url);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(SCHEMA_SQL);

  const db = drizzle(sqlite, { schema });

  logger.info('Database initialized');

  return {
    db,
    close() {
      logger.info('Closing database connection');
      sqlite.close();
    },
  };
}

export { schema };
export * from './schema.js';
