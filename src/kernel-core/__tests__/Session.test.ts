import { describe, test, expect, beforeEach } from '@jest/globals';
import { SessionCoordinator } from '../Session.js';
import type { Outcome } from '../Session.js';
import { Dictionary } from '../L1/Classifier.js';
import { MessageParser } from '../L1/Message.js';
import { FrequencyStore } from '../L2/Frequency.js';
import { Completeness, KeyInferenceEngine } from '../L3/Inference.js';
import { SeenMessageLog } from '../L5/SeenLog.js';
import { fingerprint } from '../L0/Crypto.js';
import { ErrorCode, isDecoderError } from '../Errors.js';
import { MemoryFrequencyRepository, MemorySeenMessageStore } from '../../infrastructure/persistence/MemoryStores.js';
import { FrequencyNamespace } from '../../Platform/Ports.js';
import type { FrequencyIncrement, IFrequencyRepository } from '../../Platform/Ports.js';
import type { Logger } from '../../Platform/Logger.js';

const DICTIONARY = Dictionary.of(['ALPHA', 'BRAVO', 'ATTACK', 'AT', 'DAWN']);
const SEED = '=HQ ALPHA ALPHA ALPHA ALPHA ALPHA BRAVO BRAVO BRAVO =BASE';
const CIPHER = 'DMSGB CNRJC DTCXQ';

class FailingRepository extends MemoryFrequencyRepository {
    applyIncrements(_increments: readonly FrequencyIncrement[]): void {
        throw new Error('disk full');
    }
}

function createSession(options: { dedup?: boolean; repository?: IFrequencyRepository; logger?: Logger; groupCount?: number } = {}) {
    const seenStore = new MemorySeenMessageStore();
    const session = new SessionCoordinator({
        parser: new MessageParser(DICTIONARY),
        frequency: new FrequencyStore(options.repository ?? new MemoryFrequencyRepository()),
        seen: new SeenMessageLog(seenStore),
        engine: new KeyInferenceEngine({ groupCount: options.groupCount ?? 2 }),
        logger: options.logger,
        dedup: options.dedup
    });
    session.open();
    return { session, seenStore };
}

function isKind<K extends Outcome['kind']>(outcome: Outcome, kind: K): outcome is Extract<Outcome, { kind: K }> {
    return outcome.kind === kind;
}

function expectKind<K extends Outcome['kind']>(outcome: Outcome, kind: K): Extract<Outcome, { kind: K }> {
    if (!isKind(outcome, kind)) throw new Error(`Expected ${kind}, got ${outcome.kind}`);
    return outcome;
}

describe('Session Coordinator', () => {
    let session: SessionCoordinator;

    beforeEach(() => {
        session = createSession().session;
    });

    describe('Clear text', () => {
        test('updates frequencies and records the message', () => {
            const outcome = expectKind(session.process(SEED), 'FREQUENCY_UPDATED');

            expect(outcome.increments).toBe(10);
            expect(outcome.text).toBe(SEED);
            expect(outcome.rejected).toEqual([]);
            expect(session.Frequency.count('ALPHA')).toBe(5);
            expect(session.Frequency.count('HQ', FrequencyNamespace.SENDER)).toBe(1);
            expect(session.Seen.contains(fingerprint(SEED))).toBe(true);
        });

        test('a repeated message is skipped without touching counts', () => {
            session.process(SEED);
            const outcome = session.process(`  ${SEED.toLowerCase()}\n`);

            expect(outcome).toEqual({ kind: 'DUPLICATE', fingerprint: fingerprint(SEED) });
            expect(session.Frequency.count('ALPHA')).toBe(5);
        });

        test('reports tokens dropped from the body', () => {
            const outcome = expectKind(session.process('=HQ ATTACK AT D@WN'), 'FREQUENCY_UPDATED');
            expect(outcome.rejected).toEqual(['D@WN']);
            expect(outcome.increments).toBe(3);
        });

        test('with dedup disabled a repeated message is counted again', () => {
            const { session: counting } = createSession({ dedup: false });
            counting.process('ATTACK AT DAWN');
            expectKind(counting.process('ATTACK AT DAWN'), 'FREQUENCY_UPDATED');
            expect(counting.Frequency.count('ATTACK')).toBe(2);
        });
    });

    describe('Cipher text', () => {
        test('suggests the key the stored vocabulary agrees on', () => {
            session.process(SEED);
            const outcome = expectKind(session.process(CIPHER), 'KEY_SUGGESTIONS');

            expect(outcome.candidates[0]?.offsets).toEqual([2, 2, 2, 2, 2]);
            expect(outcome.candidates[0]?.weight).toBe(8);
            expect(outcome.candidates[0]?.completeness).toBe(Completeness.FULL);
            expect(outcome.partial).toBe(false);
            expect(outcome.decodableWords).toBe(3);
            expect(outcome.recorded).toBe(true);
            expect(session.Seen.contains(fingerprint(CIPHER))).toBe(true);
        });

        test('each suggested key carries its knob code', () => {
            session.process(SEED);
            const outcome = expectKind(session.process(CIPHER), 'KEY_SUGGESTIONS');

            expect(outcome.candidates[0]?.knobs).toEqual([2, 2]);
            // [3, 1, 3, 37, 1] puts 3 and 1 on the first knob
            expect(outcome.candidates[1]?.offsets).toEqual([3, 1, 3, 37, 1]);
            expect(outcome.candidates[1]?.knobs).toBeNull();
        });

        test('reports rejected tokens in cipher text', () => {
            session.process(SEED);
            const outcome = expectKind(session.process('CNRJC DT#XQ'), 'KEY_SUGGESTIONS');
            expect(outcome.rejected).toEqual(['DT#XQ']);
        });

        test('address fields get their own suggestions', () => {
            session.process(SEED);
            const outcome = expectKind(session.process('=JS CNRJC KR='), 'KEY_SUGGESTIONS');

            expect(outcome.fields.sender.map(candidate => candidate.offsets)).toEqual([[2, 2]]);
            expect(outcome.fields.receiver).toEqual([]);
            expect(outcome.partial).toBe(true);
        });

        test('a cipher message with nothing to suggest is not recorded', () => {
            const outcome = expectKind(session.process(CIPHER), 'KEY_SUGGESTIONS');

            expect(outcome.candidates).toEqual([]);
            expect(outcome.recorded).toBe(false);
            expect(session.Seen.contains(fingerprint(CIPHER))).toBe(false);
        });

        test('cipher text never changes frequencies', () => {
            session.process(SEED);
            session.process(CIPHER);
            expect(session.Frequency.size()).toBe(2);
        });
    });

    describe('confirm', () => {
        test('counts the decode and records both forms', () => {
            session.process(SEED);
            const outcome = expectKind(session.confirm('=JS CNRJC DTCXQ', [2]), 'FREQUENCY_UPDATED');

            expect(outcome.text).toBe('=HQ ALPHA BRAVO');
            expect(outcome.increments).toBe(3);
            expect(session.Frequency.count('ALPHA')).toBe(6);
            expect(session.Frequency.count('HQ', FrequencyNamespace.SENDER)).toBe(2);
            expect(session.Seen.contains(fingerprint('=HQ ALPHA BRAVO'))).toBe(true);
            expect(session.Seen.contains(fingerprint('=JS CNRJC DTCXQ'))).toBe(true);
        });

        test('a decode that was already counted is a duplicate', () => {
            session.confirm('CNRJC DTCXQ', [2]);
            expect(session.confirm('CNRJC DTCXQ', [2]).kind).toBe('DUPLICATE');
            expect(session.Frequency.count('ALPHA')).toBe(1);
        });

        test('a repeated confirmation still records its capture', () => {
            session.process('=HQ ALPHA BRAVO');
            const outcome = session.confirm('=JS CNRJC DTCXQ', [2]);

            expect(outcome.kind).toBe('DUPLICATE');
            expect(session.Seen.contains(fingerprint('=JS CNRJC DTCXQ'))).toBe(true);
            expect(session.Frequency.count('ALPHA')).toBe(1);
        });

        test('rejects an invalid key', () => {
            expect(() => session.confirm(CIPHER, [38])).toThrow(/INVALID_KEY/);
        });
    });

    describe('dial', () => {
        test('adds each knob its own reading', () => {
            const { session: machine } = createSession({ groupCount: 4 });
            expect(machine.dial([19, 0, 0, 0, 19], 1, [2, 4, 8, 16])).toEqual({
                firstKnob: 1,
                knobs: [21, 4, 8, 16],
                complete: true
            });
        });

        test('rotates readings and key to the first knob', () => {
            const { session: machine } = createSession({ groupCount: 4 });
            expect(machine.dial([9, 8, 5, 36], 2, [2, 4, 8, 16]).knobs).toEqual([12, 13, 14, 11]);
        });

        test('a short key gives a partial code', () => {
            const { session: machine } = createSession({ groupCount: 4 });
            expect(machine.dial([7, 8], 1, [2, 4, 8, 16])).toEqual({
                firstKnob: 1,
                knobs: [9, 12, null, null],
                complete: false
            });
        });

        test('a key that sets one knob twice is refused', () => {
            expect(() => session.dial([3, 1, 3, 37, 1], 1, [0, 0])).toThrow(/INVALID_KEY/);
            expect(() => session.dial([2, 2], 1, [0, 0, 0])).toThrow(/INVALID_KEY/);
        });
    });

    describe('Failures', () => {
        test('a failed frequency write leaves the message unseen', () => {
            const errors: unknown[] = [];
            const logger: Logger = { debug: () => { }, info: () => { }, warn: () => { }, error: data => errors.push(data) };
            const { session: failing, seenStore } = createSession({ repository: new FailingRepository(), logger });

            let caught: unknown;
            try {
                failing.process(SEED);
            } catch (e) {
                caught = e;
            }

            expect(isDecoderError(caught, ErrorCode.PERSISTENCE_FAILURE)).toBe(true);
            expect(failing.Seen.contains(fingerprint(SEED))).toBe(false);
            expect(seenStore.loadAll()).toEqual([]);
            expect(errors).toEqual([{ fingerprint: fingerprint(SEED), code: ErrorCode.PERSISTENCE_FAILURE }]);
        });

        test('a closed session refuses messages', () => {
            session.close();
            expect(() => session.process(SEED)).toThrow(/STORE_NOT_OPEN/);
        });
    });
});
