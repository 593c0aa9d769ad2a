import { describe, test, expect } from '@jest/globals';
import { join } from 'path';
import { Classification, Dictionary, classify, isRecognised } from '../Classifier.js';
import { ErrorCode, isDecoderError } from '../../Errors.js';
import { DEFAULT_DICTIONARY_PATH } from '../../../Platform/Config.js';

describe('L1 Classifier', () => {
    const dictionary = Dictionary.of(['ATTACK', 'AT', 'DAWN', 'HOLD']);

    describe('Dictionary', () => {
        test('normalizes entries and skips blanks and comments', () => {
            const words = Dictionary.of(['  go ', '# header', '', 'Stop']);
            expect(words.size).toBe(2);
            expect(words.has('GO')).toBe(true);
            expect(words.has('STOP')).toBe(true);
        });

        test('loads the bundled word list', () => {
            const bundled = Dictionary.fromFile(DEFAULT_DICTIONARY_PATH);
            expect(bundled.has('CONVOY')).toBe(true);
            expect(bundled.has('ATTACK')).toBe(true);
        });

        test('a missing file is DICTIONARY_UNAVAILABLE', () => {
            let caught: unknown;
            try {
                Dictionary.fromFile(join(__dirname, 'no-such-list.txt'));
            } catch (e) {
                caught = e;
            }
            expect(isDecoderError(caught, ErrorCode.DICTIONARY_UNAVAILABLE)).toBe(true);
        });
    });

    describe('classify', () => {
        test('numbers count as recognised', () => {
            expect(isRecognised('1430', dictionary)).toBe(true);
            expect(isRecognised('14A', dictionary)).toBe(false);
            expect(classify({ body: ['1430', 'XQZ'] }, dictionary)).toBe(Classification.CLEAR);
        });

        test('recognised words must be strictly above the threshold', () => {
            expect(classify({ body: ['HOLD', 'XQZ', 'PLMK', 'RRT'] }, dictionary)).toBe(Classification.CIPHER);
            expect(classify({ body: ['HOLD', 'DAWN', 'PLMK', 'RRT'] }, dictionary)).toBe(Classification.CLEAR);
        });

        test('the threshold is configurable', () => {
            const body = ['HOLD', 'DAWN', 'PLMK', 'RRT'];
            expect(classify({ body }, dictionary, 0.5)).toBe(Classification.CIPHER);
            expect(classify({ body }, dictionary, 0)).toBe(Classification.CLEAR);
        });

        test('an empty body is CIPHER', () => {
            expect(classify({ body: [] }, dictionary)).toBe(Classification.CIPHER);
            expect(classify({ body: [] }, dictionary, 0)).toBe(Classification.CIPHER);
        });
    });
});
