import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import {
    ALPHABET,
    ALPHABET_SIZE,
    compareOffsets,
    isOffset,
    isWord,
    offset,
    offsetSequence,
    ordinal,
    shift,
    symbolAt,
    unshift
} from '../Alphabet.js';
import { ErrorCode, isDecoderError } from '../../Errors.js';

const genSymbol = fc.constantFrom(...Array.from(ALPHABET));

function codeOf(fn: () => unknown): ErrorCode | undefined {
    try {
        fn();
    } catch (e) {
        return isDecoderError(e) ? e.code : undefined;
    }
    return undefined;
}

describe('L0 Alphabet', () => {

    describe('Ordinals', () => {
        test('letters, then digits, then = and -', () => {
            expect(ALPHABET_SIZE).toBe(38);
            expect(ordinal('A')).toBe(0);
            expect(ordinal('Z')).toBe(25);
            expect(ordinal('0')).toBe(26);
            expect(ordinal('9')).toBe(35);
            expect(ordinal('=')).toBe(36);
            expect(ordinal('-')).toBe(37);
        });

        test('rejects symbols outside the alphabet', () => {
            expect(codeOf(() => ordinal('a'))).toBe(ErrorCode.INVALID_SYMBOL);
            expect(codeOf(() => ordinal('!'))).toBe(ErrorCode.INVALID_SYMBOL);
            expect(codeOf(() => ordinal('AB'))).toBe(ErrorCode.INVALID_SYMBOL);
        });

        test('symbolAt wraps around the alphabet', () => {
            expect(symbolAt(-1)).toBe('-');
            expect(symbolAt(38)).toBe('A');
            expect(symbolAt(40)).toBe('C');
            expect(codeOf(() => symbolAt(1.5))).toBe(ErrorCode.INVALID_SYMBOL);
        });

        test('isWord requires a non-empty run of alphabet symbols', () => {
            expect(isWord('CONVOY')).toBe(true);
            expect(isWord('UNIT-7=')).toBe(true);
            expect(isWord('')).toBe(false);
            expect(isWord('convoy')).toBe(false);
        });
    });

    describe('Offsets', () => {
        test('offset is the cipher ordinal minus the clear ordinal, wrapped', () => {
            expect(offset('C', 'A')).toBe(2);
            expect(offset('A', 'C')).toBe(36);
            expect(offset('-', 'A')).toBe(37);
        });

        test('shift and unshift invert offset for every symbol pair', () => {
            fc.assert(fc.property(genSymbol, genSymbol, (cipherSymbol, clearSymbol) => {
                const by = offset(cipherSymbol, clearSymbol);
                expect(isOffset(by)).toBe(true);
                expect(shift(clearSymbol, by)).toBe(cipherSymbol);
                expect(unshift(cipherSymbol, by)).toBe(clearSymbol);
            }));
        });

        test('for a fixed clear symbol, offset is a bijection over the alphabet', () => {
            fc.assert(fc.property(genSymbol, (clearSymbol) => {
                const offsets = new Set(Array.from(ALPHABET, symbol => offset(symbol, clearSymbol)));
                expect(offsets.size).toBe(ALPHABET_SIZE);
            }));
        });

        test('offsetSequence compares position by position', () => {
            expect(offsetSequence('CNQJC', 'ALPHA')).toEqual([2, 2, 1, 2, 2]);
            expect(offsetSequence('ALPHA', 'ALPHA')).toEqual([0, 0, 0, 0, 0]);
        });

        test('offsetSequence refuses words of different lengths', () => {
            expect(codeOf(() => offsetSequence('CAT', 'FISH'))).toBe(ErrorCode.LENGTH_MISMATCH);
        });

        test('isOffset accepts integers 0..37 only', () => {
            expect(isOffset(0)).toBe(true);
            expect(isOffset(37)).toBe(true);
            expect(isOffset(38)).toBe(false);
            expect(isOffset(-1)).toBe(false);
            expect(isOffset(2.5)).toBe(false);
        });
    });

    describe('Offset order', () => {
        test('compares element-wise', () => {
            expect(compareOffsets([1, 2], [1, 3])).toBeLessThan(0);
            expect(compareOffsets([4], [1, 9])).toBeGreaterThan(0);
            expect(compareOffsets([3, 3], [3, 3])).toBe(0);
        });

        test('a strict prefix sorts first', () => {
            expect(compareOffsets([1, 2], [1, 2, 0])).toBeLessThan(0);
            expect(compareOffsets([1, 2, 0], [1, 2])).toBeGreaterThan(0);
        });
    });
});
