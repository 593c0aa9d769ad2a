import type {
    FrequencyEntry,
    FrequencyIncrement,
    IFrequencyRepository,
    ISeenMessageStore
} from '../../Platform/Ports.js';

/**
 * Process-local adapters: same contracts, nothing survives the process.
 */
export class MemoryFrequencyRepository implements IFrequencyRepository {
    private entries: Map<string, FrequencyEntry> = new Map();

    constructor(seed: FrequencyEntry[] = []) {
        for (const entry of seed) {
            this.entries.set(`${entry.namespace}:${entry.word}`, { ...entry });
        }
    }

    loadAll(): FrequencyEntry[] {
        return [...this.entries.values()].map(entry => ({ ...entry }));
    }

    applyIncrements(increments: readonly FrequencyIncrement[]): void {
        for (const { namespace, word, delta } of increments) {
            const key = `${namespace}:${word}`;
            const existing = this.entries.get(key);
            this.entries.set(key, { namespace, word, count: (existing?.count ?? 0) + delta });
        }
    }

    close(): void { }
}

export class MemorySeenMessageStore implements ISeenMessageStore {
    private records: string[] = [];

    constructor(seed: string[] = []) {
        for (const fingerprint of seed) this.append(fingerprint);
    }

    loadAll(): string[] {
        return [...this.records];
    }

    append(fingerprint: string): boolean {
        if (this.records.includes(fingerprint)) return false;
        this.records.push(fingerprint);
        return true;
    }

    close(): void { }
}
