// src/kernel-core/L1/Message.ts
import type { Word } from '../L0/Alphabet.js';
import { canonicalize, fingerprint, tokenize } from '../L0/Crypto.js';
import { SymbolGuard, readMarker } from '../L0/Guards.js';
import { Classification, DEFAULT_CLEAR_THRESHOLD, Dictionary, classify } from './Classifier.js';

/**
 * Fields recovered from corrected text.
 * Sender is the first token, receiver the last, each only when marked;
 * an unmarked end token stays in the body.
 */
export interface ParsedFields {
    readonly sender: Word | null;
    readonly receiver: Word | null;
    readonly body: readonly Word[];
    /** Tokens dropped from the body because they hold symbols outside the alphabet. */
    readonly rejected: readonly string[];
}

export interface Message extends ParsedFields {
    readonly text: string;
    readonly classification: Classification;
    readonly fingerprint: string;
}

export function parseFields(correctedText: string): ParsedFields {
    const tokens = tokenize(correctedText);
    let start = 0;
    let end = tokens.length;

    let sender: Word | null = null;
    const first = tokens[0];
    const leading = first !== undefined ? readMarker(first) : null;
    if (leading) {
        sender = leading.name;
        start = 1;
    }

    let receiver: Word | null = null;
    const last = end > start ? tokens[end - 1] : undefined;
    const trailing = last !== undefined ? readMarker(last) : null;
    if (trailing) {
        receiver = trailing.name;
        end -= 1;
    }

    const body: Word[] = [];
    const rejected: string[] = [];
    for (const token of tokens.slice(start, end)) {
        if (SymbolGuard(token).ok) body.push(token);
        else rejected.push(token);
    }

    return {
        sender,
        receiver,
        body: Object.freeze(body),
        rejected: Object.freeze(rejected)
    };
}

export class MessageParser {
    constructor(
        private readonly dictionary: Dictionary,
        private readonly threshold: number = DEFAULT_CLEAR_THRESHOLD
    ) { }

    /**
     * Never throws on malformed text: unreadable fields come back as null.
     * `classification` overrides the dictionary heuristic (operator-confirmed decodes).
     */
    public parse(correctedText: string, classification?: Classification): Message {
        const fields = parseFields(correctedText);
        const message: Message = {
            ...fields,
            text: canonicalize(correctedText),
            classification: classification ?? classify(fields, this.dictionary, this.threshold),
            fingerprint: fingerprint(correctedText)
        };
        return Object.freeze(message);
    }
}
