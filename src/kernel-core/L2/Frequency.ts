// src/kernel-core/L2/Frequency.ts
import type { Word } from '../L0/Alphabet.js';
import { Classification } from '../L1/Classifier.js';
import type { Message } from '../L1/Message.js';
import { DecoderError, ErrorCode, isDecoderError, persistenceFailure } from '../Errors.js';
import { FrequencyNamespace } from '../../Platform/Ports.js';
import type { FrequencyIncrement, IFrequencyRepository } from '../../Platform/Ports.js';
import type { Logger } from '../../Platform/Logger.js';
import { silentLogger } from '../../Platform/Logger.js';

export interface WordCount {
    word: Word;
    count: number;
}

export interface FrequencyUpdate {
    applied: boolean;
    /** Total of all count increments written for the message. */
    increments: number;
}

/**
 * Running vocabulary model built from clear text.
 *
 * Counts only grow. The repository write happens first and the in-memory
 * mirror is touched only once it has returned, so a failed write leaves both
 * unchanged.
 */
export class FrequencyStore {
    private counts: Map<FrequencyNamespace, Map<Word, number>> = new Map();
    private isOpen = false;

    constructor(
        private readonly repository: IFrequencyRepository,
        private readonly logger: Logger = silentLogger
    ) { }

    public open(): void {
        if (this.isOpen) return;
        const entries = this.guard('load frequencies', () => this.repository.loadAll());
        this.counts = new Map();
        for (const entry of entries) {
            this.table(entry.namespace).set(entry.word, entry.count);
        }
        this.isOpen = true;
        this.logger.debug({ entries: entries.length }, 'Frequency store loaded');
    }

    public close(): void {
        if (!this.isOpen) return;
        this.isOpen = false;
        this.guard('close frequency store', () => this.repository.close());
    }

    public get opened(): boolean {
        return this.isOpen;
    }

    /**
     * Counts every body word of a CLEAR message, plus its sender and receiver
     * in their own namespaces when present. CIPHER messages are ignored.
     */
    public update(message: Message): FrequencyUpdate {
        this.assertOpen();
        if (message.classification !== Classification.CLEAR) {
            return { applied: false, increments: 0 };
        }

        const increments = collectIncrements(message);
        if (increments.length === 0) return { applied: true, increments: 0 };

        this.guard('apply frequency increments', () => this.repository.applyIncrements(increments));

        let total = 0;
        for (const { namespace, word, delta } of increments) {
            const table = this.table(namespace);
            table.set(word, (table.get(word) ?? 0) + delta);
            total += delta;
        }
        return { applied: true, increments: total };
    }

    /**
     * Every stored word whose length equals the target length `n`,
     * most frequent first, ties in alphabetical order.
     */
    public candidatesOfLength(n: number, namespace: FrequencyNamespace = FrequencyNamespace.WORD): WordCount[] {
        this.assertOpen();
        const candidates: WordCount[] = [];
        for (const [word, count] of this.table(namespace)) {
            if (word.length === n) candidates.push({ word, count });
        }
        return candidates.sort((a, b) => b.count - a.count || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));
    }

    public count(word: Word, namespace: FrequencyNamespace = FrequencyNamespace.WORD): number {
        this.assertOpen();
        return this.table(namespace).get(word) ?? 0;
    }

    public size(namespace: FrequencyNamespace = FrequencyNamespace.WORD): number {
        this.assertOpen();
        return this.table(namespace).size;
    }

    private table(namespace: FrequencyNamespace): Map<Word, number> {
        let table = this.counts.get(namespace);
        if (!table) {
            table = new Map();
            this.counts.set(namespace, table);
        }
        return table;
    }

    private assertOpen(): void {
        if (!this.isOpen) throw new DecoderError(ErrorCode.STORE_NOT_OPEN, 'Frequency store is not open');
    }

    private guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            if (isDecoderError(e)) throw e;
            this.logger.error(e, `Frequency store: ${operation} failed`);
            throw persistenceFailure(operation, e);
        }
    }
}

/**
 * One increment per distinct (namespace, word), summing repeats in the body.
 */
export function collectIncrements(message: Pick<Message, 'body' | 'sender' | 'receiver'>): FrequencyIncrement[] {
    const deltas = new Map<string, FrequencyIncrement>();
    const bump = (namespace: FrequencyNamespace, word: Word) => {
        const key = `${namespace}:${word}`;
        const existing = deltas.get(key);
        if (existing) existing.delta += 1;
        else deltas.set(key, { namespace, word, delta: 1 });
    };

    for (const word of message.body) bump(FrequencyNamespace.WORD, word);
    if (message.sender !== null) bump(FrequencyNamespace.SENDER, message.sender);
    if (message.receiver !== null) bump(FrequencyNamespace.RECEIVER, message.receiver);

    return [...deltas.values()];
}
