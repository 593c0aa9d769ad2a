import { describe, test, expect, beforeEach } from '@jest/globals';
import { SeenMessageLog } from '../SeenLog.js';
import { ErrorCode, isDecoderError } from '../../Errors.js';
import { MemorySeenMessageStore } from '../../../infrastructure/persistence/MemoryStores.js';

class RefusingStore extends MemorySeenMessageStore {
    append(_fingerprint: string): boolean {
        throw new Error('read-only volume');
    }
}

describe('L5 Seen-Message Log', () => {
    let store: MemorySeenMessageStore;
    let log: SeenMessageLog;

    beforeEach(() => {
        store = new MemorySeenMessageStore();
        log = new SeenMessageLog(store);
        log.open();
    });

    test('records a fingerprint once', () => {
        expect(log.contains('fp-1')).toBe(false);
        expect(log.record('fp-1')).toBe(true);
        expect(log.contains('fp-1')).toBe(true);
        expect(log.record('fp-1')).toBe(false);
        expect(store.loadAll()).toEqual(['fp-1']);
        expect(log.size).toBe(1);
    });

    test('membership is rebuilt from the store at open', () => {
        log.record('fp-1');
        log.record('fp-2');
        log.close();

        const reopened = new SeenMessageLog(store);
        reopened.open();
        expect(reopened.contains('fp-2')).toBe(true);
        expect(reopened.size).toBe(2);
    });

    test('a failed append leaves the fingerprint unseen', () => {
        const refusing = new SeenMessageLog(new RefusingStore());
        refusing.open();

        let caught: unknown;
        try {
            refusing.record('fp-1');
        } catch (e) {
            caught = e;
        }
        expect(isDecoderError(caught, ErrorCode.PERSISTENCE_FAILURE)).toBe(true);
        expect(refusing.contains('fp-1')).toBe(false);
    });

    test('a closed log refuses queries', () => {
        log.close();
        expect(() => log.contains('fp-1')).toThrow(/STORE_NOT_OPEN/);
        expect(() => log.record('fp-1')).toThrow(/STORE_NOT_OPEN/);
    });
});
