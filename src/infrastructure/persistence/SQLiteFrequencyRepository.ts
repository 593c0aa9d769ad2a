import Database from 'better-sqlite3';
import { openDatabase } from './Database.js';
import { FrequencyNamespace } from '../../Platform/Ports.js';
import type { FrequencyEntry, FrequencyIncrement, IFrequencyRepository } from '../../Platform/Ports.js';

interface FrequencyRow {
    namespace: string;
    word: string;
    count: number;
}

const NAMESPACES: ReadonlyMap<string, FrequencyNamespace> = new Map(
    Object.values(FrequencyNamespace).map(namespace => [namespace, namespace] as const)
);

export class SQLiteFrequencyRepository implements IFrequencyRepository {
    private db: Database.Database;

    constructor(dbPath: string = 'decoder.db') {
        this.db = openDatabase(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS word_frequency (
                namespace TEXT NOT NULL,
                word TEXT NOT NULL,
                count INTEGER NOT NULL CHECK (count > 0),
                PRIMARY KEY (namespace, word)
            )
        `);
    }

    loadAll(): FrequencyEntry[] {
        const stmt = this.db.prepare<[], FrequencyRow>('SELECT namespace, word, count FROM word_frequency');
        const entries: FrequencyEntry[] = [];
        for (const row of stmt.all()) {
            const namespace = NAMESPACES.get(row.namespace);
            // Rows from an unknown namespace belong to a newer schema; leave them alone.
            if (namespace) entries.push({ namespace, word: row.word, count: row.count });
        }
        return entries;
    }

    /**
     * One transaction per message: every increment lands or none does.
     */
    applyIncrements(increments: readonly FrequencyIncrement[]): void {
        const stmt = this.db.prepare<[string, string, number]>(`
            INSERT INTO word_frequency (namespace, word, count) VALUES (?, ?, ?)
            ON CONFLICT (namespace, word) DO UPDATE SET count = count + excluded.count
        `);
        const apply = this.db.transaction((batch: readonly FrequencyIncrement[]) => {
            for (const { namespace, word, delta } of batch) {
                stmt.run(namespace, word, delta);
            }
        });
        apply(increments);
    }

    public close() {
        if (this.db.open) this.db.close();
    }
}
