import type { Word } from '../kernel-core/L0/Alphabet.js';

/**
 * Count namespaces: body vocabulary, and the two address fields kept apart
 * so call signs never pollute the body vocabulary.
 */
export enum FrequencyNamespace {
    WORD = 'word',
    SENDER = 'sender',
    RECEIVER = 'receiver'
}

export interface FrequencyEntry {
    namespace: FrequencyNamespace;
    word: Word;
    count: number;
}

export interface FrequencyIncrement {
    namespace: FrequencyNamespace;
    word: Word;
    delta: number;
}

/**
 * Persistence Port: Frequency Repository
 * Durable word -> count mapping, loaded whole at startup.
 * `applyIncrements` is all-or-nothing and durable when it returns.
 */
export interface IFrequencyRepository {
    loadAll(): FrequencyEntry[];
    applyIncrements(increments: readonly FrequencyIncrement[]): void;
    close(): void;
}

/**
 * Persistence Port: Seen-Message Store
 * Append-only fingerprint records, read back in append order.
 * `append` returns false when the fingerprint was already present.
 */
export interface ISeenMessageStore {
    loadAll(): string[];
    append(fingerprint: string): boolean;
    close(): void;
}
