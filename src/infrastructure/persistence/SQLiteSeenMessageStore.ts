import Database from 'better-sqlite3';
import { openDatabase } from './Database.js';
import type { ISeenMessageStore } from '../../Platform/Ports.js';

interface SeenRow {
    fingerprint: string;
}

/**
 * Append-only: rows are inserted one per record and never updated or deleted.
 */
export class SQLiteSeenMessageStore implements ISeenMessageStore {
    private db: Database.Database;

    constructor(dbPath: string = 'decoder.db') {
        this.db = openDatabase(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS seen_messages (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                fingerprint TEXT UNIQUE NOT NULL,
                recorded_at TEXT NOT NULL
            )
        `);
    }

    loadAll(): string[] {
        const stmt = this.db.prepare<[], SeenRow>('SELECT fingerprint FROM seen_messages ORDER BY sequence ASC');
        return stmt.all().map(row => row.fingerprint);
    }

    append(fingerprint: string): boolean {
        const stmt = this.db.prepare<[string, string]>(
            'INSERT OR IGNORE INTO seen_messages (fingerprint, recorded_at) VALUES (?, ?)'
        );
        return stmt.run(fingerprint, new Date().toISOString()).changes === 1;
    }

    public close() {
        if (this.db.open) this.db.close();
    }
}
