import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';

export const DEFAULT_DB_PATH = 'memory/week-letters.db';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS posted_letters (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    recipient_id TEXT NOT NULL,
    week_number INTEGER NOT NULL,
    year INTEGER NOT NULL,
    content_hash TEXT NOT NULL,
    raw_content TEXT NOT NULL,
    channels_json TEXT NOT NULL DEFAULT '{}',
    posted_at TEXT NOT NULL,
    UNIQUE(recipient_id, week_number, year)
  );

  CREATE TABLE IF NOT EXISTS retry_attempts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    recipient_id TEXT NOT NULL,
    week_number INTEGER NOT NULL,
    year INTEGER NOT NULL,
    attempt_count INTEGER NOT NULL,
    first_attempt_at TEXT NOT NULL,
    last_attempt_at TEXT NOT NULL,
    next_attempt_at TEXT,
    max_attempts INTEGER NOT NULL,
    succeeded INTEGER NOT NULL DEFAULT 0,
    last_error TEXT,
    UNIQUE(recipient_id, week_number, year)
  );

  CREATE INDEX IF NOT EXISTS idx_retry_attempts_due
    ON retry_attempts(succeeded, next_attempt_at);
`;

/**
 * Open (creating if needed) the delivery database and apply the schema.
 * Pass `':memory:'` for an in-process database.
 */
export function openDatabase(filePath: string = DEFAULT_DB_PATH): SqliteDatabase {
    if (filePath !== ':memory:') {
        const dir = path.dirname(path.resolve(filePath));
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    const db = new Database(filePath);
    if (filePath !== ':memory:') {
        db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA);
    return db;
}
