import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function getDatabase(path?: string): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = path || process.env.DATABASE_PATH || join(__dirname, '../../data', 'intents.db');
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== ':memory:') {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');

  runMigrations(db);

  return db;
}

export function runMigrations(database: Database.Database): void {
  logger.debug('Running database migrations');

  // Single-row table holding the version of the stored configuration
  database.exec(`
    CREATE TABLE IF NOT EXISTS registry_state (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version INTEGER NOT NULL,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

  // One row per intent of the stored version; list columns hold JSON arrays
  database.exec(`
    CREATE TABLE IF NOT EXISTS intents (
      intent_id TEXT PRIMARY KEY,
      position INTEGER NOT NULL,
      intent_name TEXT NOT NULL,
      category TEXT NOT NULL,
      agent_routing TEXT NOT NULL,
      priority INTEGER NOT NULL DEFAULT 3,
      description_short TEXT NOT NULL,
      disambiguation_prompt TEXT,
      training_utterances TEXT NOT NULL,
      keywords TEXT NOT NULL DEFAULT '[]',
      confidence_threshold REAL
    );

    CREATE INDEX IF NOT EXISTS idx_intents_category ON intents(category);
  `);

  logger.debug('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
