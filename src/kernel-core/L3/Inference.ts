// src/kernel-core/L3/Inference.ts
import { compareOffsets, offsetSequence } from '../L0/Alphabet.js';
import type { OffsetSequence, Word } from '../L0/Alphabet.js';
import type { Message } from '../L1/Message.js';
import type { FrequencyStore } from '../L2/Frequency.js';
import { DecoderError, ErrorCode } from '../Errors.js';
import { FrequencyNamespace } from '../../Platform/Ports.js';

/** Knobs on the cipher machine, and the corroboration needed for a FULL key. */
export const DEFAULT_GROUP_COUNT = 4;

export enum Completeness {
    FULL = 'FULL',
    PARTIAL = 'PARTIAL'
}

export interface KeyMatch {
    cipherWord: Word;
    clearWord: Word;
    count: number;
}

export interface CandidateKey {
    offsets: OffsetSequence;
    /** Sum of the stored counts of every clear word that proposed this key. */
    weight: number;
    /** Distinct cipher words corroborating the key, in reading order. */
    words: readonly Word[];
    matches: readonly KeyMatch[];
    completeness: Completeness;
}

export interface InferenceOptions {
    groupCount: number;
}

interface Ballot {
    offsets: number[];
    weight: number;
    words: Set<Word>;
    matches: KeyMatch[];
}

/**
 * Proposes substitution keys by voting.
 *
 * Every stored clear word of the same length as a cipher word proposes the
 * offset pattern that would turn it into that cipher word, weighted by its
 * count. Identical patterns from different cipher words pool their votes.
 *
 * Limitation: this assumes distinct clear words give distinct patterns
 * against one cipher word, so agreement across independent words is read as
 * evidence for the true key. Nothing here verifies a decode.
 */
export class KeyInferenceEngine {
    public readonly groupCount: number;

    constructor(options: Partial<InferenceOptions> = {}) {
        const groupCount = options.groupCount ?? DEFAULT_GROUP_COUNT;
        if (!Number.isInteger(groupCount) || groupCount < 1) {
            throw new DecoderError(ErrorCode.INVALID_CONFIG, `Group count must be a positive integer, got ${groupCount}`, { groupCount });
        }
        this.groupCount = groupCount;
    }

    /**
     * Candidate keys for a cipher message's body, strongest first.
     * An empty list means no stored word is length-compatible with any body word.
     */
    public infer(cipherMessage: Pick<Message, 'body'>, freq: FrequencyStore): CandidateKey[] {
        return this.vote(distinct(cipherMessage.body), freq, FrequencyNamespace.WORD);
    }

    /**
     * Candidate keys for a single address field against its own namespace.
     */
    public inferWord(word: Word | null, freq: FrequencyStore, namespace: FrequencyNamespace): CandidateKey[] {
        if (word === null) return [];
        return this.vote([word], freq, namespace);
    }

    /**
     * Distinct body words with at least one length-compatible stored word.
     * Fewer than `groupCount` means no key can be FULL: a partial code.
     */
    public decodableWords(cipherMessage: Pick<Message, 'body'>, freq: FrequencyStore): number {
        return distinct(cipherMessage.body)
            .filter(word => freq.candidatesOfLength(word.length).length > 0)
            .length;
    }

    private vote(cipherWords: readonly Word[], freq: FrequencyStore, namespace: FrequencyNamespace): CandidateKey[] {
        const ballots = new Map<string, Ballot>();

        for (const cipherWord of cipherWords) {
            for (const { word: clearWord, count } of freq.candidatesOfLength(cipherWord.length, namespace)) {
                const offsets = offsetSequence(cipherWord, clearWord);
                const id = offsets.join(',');
                let ballot = ballots.get(id);
                if (!ballot) {
                    ballot = { offsets, weight: 0, words: new Set(), matches: [] };
                    ballots.set(id, ballot);
                }
                ballot.weight += count;
                ballot.words.add(cipherWord);
                ballot.matches.push({ cipherWord, clearWord, count });
            }
        }

        return [...ballots.values()]
            .map((ballot): CandidateKey => ({
                offsets: Object.freeze(ballot.offsets),
                weight: ballot.weight,
                words: Object.freeze([...ballot.words]),
                matches: Object.freeze(ballot.matches),
                completeness: ballot.words.size >= this.groupCount ? Completeness.FULL : Completeness.PARTIAL
            }))
            .sort(rankCandidates);
    }
}

/**
 * Weight descending, then FULL before PARTIAL, then more corroborating
 * words, then offset order. Total, so rankings are reproducible.
 */
export function rankCandidates(a: CandidateKey, b: CandidateKey): number {
    if (a.weight !== b.weight) return b.weight - a.weight;
    if (a.completeness !== b.completeness) return a.completeness === Completeness.FULL ? -1 : 1;
    if (a.words.length !== b.words.length) return b.words.length - a.words.length;
    return compareOffsets(a.offsets, b.offsets);
}

function distinct(words: readonly Word[]): Word[] {
    return [...new Set(words)];
}
