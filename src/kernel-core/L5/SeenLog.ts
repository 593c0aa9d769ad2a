// src/kernel-core/L5/SeenLog.ts
import { DecoderError, ErrorCode, isDecoderError, persistenceFailure } from '../Errors.js';
import type { ISeenMessageStore } from '../../Platform/Ports.js';
import type { Logger } from '../../Platform/Logger.js';
import { silentLogger } from '../../Platform/Logger.js';

/**
 * Write-once set of message fingerprints.
 * Membership is rebuilt from the store at open; a fingerprint joins the set
 * only after its record is durable.
 */
export class SeenMessageLog {
    private fingerprints: Set<string> = new Set();
    private isOpen = false;

    constructor(
        private readonly store: ISeenMessageStore,
        private readonly logger: Logger = silentLogger
    ) { }

    public open(): void {
        if (this.isOpen) return;
        const records = this.guard('load seen messages', () => this.store.loadAll());
        this.fingerprints = new Set(records);
        this.isOpen = true;
        this.logger.debug({ records: records.length }, 'Seen-message log loaded');
    }

    public close(): void {
        if (!this.isOpen) return;
        this.isOpen = false;
        this.guard('close seen-message log', () => this.store.close());
    }

    public contains(fingerprint: string): boolean {
        this.assertOpen();
        return this.fingerprints.has(fingerprint);
    }

    /**
     * Idempotent: recording a present fingerprint writes nothing.
     * Returns true when a new record was appended.
     */
    public record(fingerprint: string): boolean {
        this.assertOpen();
        if (this.fingerprints.has(fingerprint)) return false;

        const appended = this.guard('append seen message', () => this.store.append(fingerprint));
        this.fingerprints.add(fingerprint);
        return appended;
    }

    public get size(): number {
        this.assertOpen();
        return this.fingerprints.size;
    }

    private assertOpen(): void {
        if (!this.isOpen) throw new DecoderError(ErrorCode.STORE_NOT_OPEN, 'Seen-message log is not open');
    }

    private guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            if (isDecoderError(e)) throw e;
            this.logger.error(e, `Seen-message log: ${operation} failed`);
            throw persistenceFailure(operation, e);
        }
    }
}
