// src/kernel-core/L0/Alphabet.ts
import { DecoderError, ErrorCode } from '../Errors.js';

/**
 * The closed symbol set of intercepted traffic, in ordinal order:
 * letters, then digits, then the two punctuation symbols.
 */
export const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789=-';
export const ALPHABET_SIZE = ALPHABET.length;

export type Word = string;
export type OffsetSequence = readonly number[];

const ORDINALS: ReadonlyMap<string, number> = new Map(
    Array.from(ALPHABET, (symbol, index) => [symbol, index] as const)
);

export function isSymbol(char: string): boolean {
    return ORDINALS.has(char);
}

export function isWord(candidate: string): boolean {
    if (candidate.length === 0) return false;
    for (const char of candidate) {
        if (!isSymbol(char)) return false;
    }
    return true;
}

export function ordinal(symbol: string): number {
    const value = ORDINALS.get(symbol);
    if (value === undefined) {
        throw new DecoderError(ErrorCode.INVALID_SYMBOL, `'${symbol}' is not in the alphabet`, { symbol });
    }
    return value;
}

/**
 * Non-negative remainder, so negative differences wrap the way the dials do.
 */
export function mod(value: number): number {
    return ((value % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE;
}

export function symbolAt(position: number): string {
    if (!Number.isInteger(position)) {
        throw new DecoderError(ErrorCode.INVALID_SYMBOL, `Ordinal ${position} is not an integer`, { position });
    }
    return ALPHABET.charAt(mod(position));
}

// --- Offset arithmetic ---

export function offset(cipherSymbol: string, clearSymbol: string): number {
    return mod(ordinal(cipherSymbol) - ordinal(clearSymbol));
}

/** Inverse of `offset`: recovers the cipher symbol from the clear one. */
export function shift(clearSymbol: string, by: number): string {
    return symbolAt(ordinal(clearSymbol) + by);
}

/** Inverse of `offset`: recovers the clear symbol from the cipher one. */
export function unshift(cipherSymbol: string, by: number): string {
    return symbolAt(ordinal(cipherSymbol) - by);
}

/**
 * Per-position offsets turning `clearWord` into `cipherWord`.
 * Only length-compatible words can be compared.
 */
export function offsetSequence(cipherWord: Word, clearWord: Word): number[] {
    if (cipherWord.length !== clearWord.length) {
        throw new DecoderError(
            ErrorCode.LENGTH_MISMATCH,
            `Cannot compare '${cipherWord}' (${cipherWord.length}) with '${clearWord}' (${clearWord.length})`,
            { cipherWord, clearWord }
        );
    }
    const offsets: number[] = [];
    for (let i = 0; i < cipherWord.length; i++) {
        offsets.push(offset(cipherWord.charAt(i), clearWord.charAt(i)));
    }
    return offsets;
}

export function isOffset(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value < ALPHABET_SIZE;
}

/**
 * Element-wise numeric order; a strict prefix sorts first.
 */
export function compareOffsets(a: OffsetSequence, b: OffsetSequence): number {
    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
        const diff = (a[i] ?? 0) - (b[i] ?? 0);
        if (diff !== 0) return diff;
    }
    return a.length - b.length;
}
