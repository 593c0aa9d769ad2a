import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';

export const MEMORY_DB = ':memory:';

/**
 * Opens a SQLite connection tuned for crash safety: WAL journal and a full
 * fsync on every commit, so a returned write survives a crash.
 */
export function openDatabase(dbPath: string): Database.Database {
    if (dbPath !== MEMORY_DB) {
        mkdirSync(dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = FULL');
    return db;
}
