// src/kernel-core/L1/Classifier.ts
import { readFileSync } from 'fs';
import type { Word } from '../L0/Alphabet.js';
import { DecoderError, ErrorCode } from '../Errors.js';

export enum Classification {
    CLEAR = 'CLEAR',
    CIPHER = 'CIPHER'
}

export const DEFAULT_CLEAR_THRESHOLD = 0.25;

/**
 * Static reference vocabulary used to recognise clear text.
 * Words are held upper-cased; blank lines and `#` comments are skipped.
 */
export class Dictionary {
    private constructor(private readonly words: ReadonlySet<string>) { }

    public static of(words: Iterable<string>): Dictionary {
        const normalized = new Set<string>();
        for (const word of words) {
            const entry = word.trim().toUpperCase();
            if (entry.length > 0 && !entry.startsWith('#')) normalized.add(entry);
        }
        return new Dictionary(normalized);
    }

    public static fromFile(path: string): Dictionary {
        let content: string;
        try {
            content = readFileSync(path, 'utf-8');
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new DecoderError(ErrorCode.DICTIONARY_UNAVAILABLE, `Cannot read word list ${path}: ${reason}`, { path });
        }
        return Dictionary.of(content.split(/\r?\n/));
    }

    public has(word: Word): boolean {
        return this.words.has(word);
    }

    public get size(): number {
        return this.words.size;
    }
}

export function isRecognised(word: Word, dictionary: Dictionary): boolean {
    return dictionary.has(word) || /^[0-9]+$/.test(word);
}

/**
 * CLEAR when recognised body words are strictly more than `threshold` of the body.
 * An empty body is never CLEAR.
 */
export function classify(
    message: { readonly body: readonly Word[] },
    dictionary: Dictionary,
    threshold: number = DEFAULT_CLEAR_THRESHOLD
): Classification {
    const recognised = message.body.filter(word => isRecognised(word, dictionary)).length;
    const isClear = recognised > message.body.length * threshold;
    return isClear ? Classification.CLEAR : Classification.CIPHER;
}
