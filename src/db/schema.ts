import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { logger, describeError } from '../core/logger.js';
import { PersistenceError } from '../core/errors.js';

export type Db = Database.Database;

export const schema = `
-- Scraped posts, one row per post identity
CREATE TABLE IF NOT EXISTS linkedin_posts (
  post_id TEXT PRIMARY KEY,
  text TEXT NOT NULL,
  post_date TEXT,
  post_author TEXT,
  profile_headline TEXT,
  post_url TEXT,
  hashtags TEXT,
  search_query TEXT,
  severity TEXT,
  reasons TEXT,
  scraped_at TEXT DEFAULT CURRENT_TIMESTAMP
);

-- One row per query run
CREATE TABLE IF NOT EXISTS scrape_logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  query TEXT,
  status TEXT NOT NULL,
  items_found INTEGER DEFAULT 0,
  items_new INTEGER DEFAULT 0,
  error TEXT,
  started_at TEXT NOT NULL,
  completed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_scrape_logs_started ON scrape_logs(started_at);
`;

// Columns absent from databases written by the older, scoring-less layout
const LATE_COLUMNS: Array<{ name: string; type: string }> = [
  { name: 'search_query', type: 'TEXT' },
  { name: 'severity', type: 'TEXT' },
  { name: 'reasons', type: 'TEXT' },
];

function addMissingColumns(db: Db): void {
  const columns = db.prepare('PRAGMA table_info(linkedin_posts)').all() as Array<{ name: string }>;
  const present = new Set(columns.map(column => column.name));

  for (const column of LATE_COLUMNS) {
    if (!present.has(column.name)) {
      db.exec(`ALTER TABLE linkedin_posts ADD COLUMN ${column.name} ${column.type}`);
      logger.info(`Added missing column linkedin_posts.${column.name}`);
    }
  }
}

export function initializeDatabase(db: Db): void {
  db.exec(schema);
  addMissingColumns(db);
}

/** Opens (creating if needed) the post store. Pass ':memory:' for a throwaway database. */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  let db: Db;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new PersistenceError(`Could not open database at ${dbPath}: ${describeError(error)}`, 'open_failed');
  }

  // WAL lets the analysis process read while ingestion writes
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  initializeDatabase(db);
  logger.debug(`Database ready at: ${dbPath}`);
  return db;
}
