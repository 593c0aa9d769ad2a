import type { OffsetSequence } from './L0/Alphabet.js';
import { Classification } from './L1/Classifier.js';
import type { Message, MessageParser } from './L1/Message.js';
import type { FrequencyStore } from './L2/Frequency.js';
import type { CandidateKey, KeyInferenceEngine } from './L3/Inference.js';
import { Completeness } from './L3/Inference.js';
import { assertKey, decodeMessage, dialSetting, foldKnobs, isComplete } from './L4/Knobs.js';
import type { KnobPattern } from './L4/Knobs.js';
import type { SeenMessageLog } from './L5/SeenLog.js';
import { DecoderError, ErrorCode, isDecoderError } from './Errors.js';
import { FrequencyNamespace } from '../Platform/Ports.js';
import type { Logger } from '../Platform/Logger.js';
import { silentLogger } from '../Platform/Logger.js';

export interface DuplicateOutcome {
    kind: 'DUPLICATE';
    fingerprint: string;
}

export interface FrequencyUpdatedOutcome {
    kind: 'FREQUENCY_UPDATED';
    fingerprint: string;
    /** Clear text whose words were counted (the decode, for confirmations). */
    text: string;
    increments: number;
    /** Tokens dropped from the captured body for symbols outside the alphabet. */
    rejected: readonly string[];
}

export interface SuggestedKey extends CandidateKey {
    /** The key folded onto the machine's knobs; null when two positions on one knob disagree. */
    knobs: KnobPattern | null;
}

export interface KeySuggestionsOutcome {
    kind: 'KEY_SUGGESTIONS';
    fingerprint: string;
    candidates: SuggestedKey[];
    fields: {
        sender: SuggestedKey[];
        receiver: SuggestedKey[];
    };
    rejected: readonly string[];
    /** Distinct body words that had any length-compatible stored word. */
    decodableWords: number;
    /** No body key reached FULL: fewer than GROUP_COUNT words corroborate. */
    partial: boolean;
    /** Whether the message was recorded as seen (only when something was suggested). */
    recorded: boolean;
}

export type Outcome = DuplicateOutcome | FrequencyUpdatedOutcome | KeySuggestionsOutcome;

export interface DialCode {
    firstKnob: number;
    /** Positions to set, starting at `firstKnob`; null where the key never reached a knob. */
    knobs: KnobPattern;
    complete: boolean;
}

export interface SessionComponents {
    parser: MessageParser;
    frequency: FrequencyStore;
    seen: SeenMessageLog;
    engine: KeyInferenceEngine;
    logger?: Logger;
    /** Gate on the seen log; disabling it reprocesses repeated messages. */
    dedup?: boolean;
}

/**
 * SessionCoordinator: the only entry point for the capture and prompt layers.
 * One message is processed to completion before the next; a fingerprint is
 * recorded only after the message's effect is durable.
 */
export class SessionCoordinator {
    private readonly parser: MessageParser;
    private readonly frequency: FrequencyStore;
    private readonly seen: SeenMessageLog;
    private readonly engine: KeyInferenceEngine;
    private readonly logger: Logger;
    private readonly dedup: boolean;

    constructor(components: SessionComponents) {
        this.parser = components.parser;
        this.frequency = components.frequency;
        this.seen = components.seen;
        this.engine = components.engine;
        this.logger = components.logger ?? silentLogger;
        this.dedup = components.dedup ?? true;
    }

    public open(): void {
        this.frequency.open();
        this.seen.open();
    }

    public close(): void {
        try {
            this.frequency.close();
        } finally {
            this.seen.close();
        }
    }

    public get Frequency(): FrequencyStore {
        return this.frequency;
    }

    public get Seen(): SeenMessageLog {
        return this.seen;
    }

    public process(correctedText: string): Outcome {
        const message = this.parser.parse(correctedText);
        return this.reportingFailures(message.fingerprint, () => {
            if (this.isDuplicate(message)) return this.duplicate(message);
            return message.classification === Classification.CLEAR
                ? this.applyClear(message, [message.fingerprint], message.rejected)
                : this.suggest(message);
        });
    }

    /**
     * Feedback path: the operator confirmed `key` for a cipher message.
     * The decode is counted as clear text and both the decode and the cipher
     * capture are recorded as seen, the capture even when the decode was
     * already counted.
     */
    public confirm(cipherText: string, key: OffsetSequence): Outcome {
        const cipher = this.parser.parse(cipherText);
        const decoded = this.parser.parse(decodeMessage(cipher, key), Classification.CLEAR);
        return this.reportingFailures(decoded.fingerprint, () => {
            if (this.isDuplicate(decoded)) {
                this.seen.record(cipher.fingerprint);
                return this.duplicate(decoded);
            }
            return this.applyClear(decoded, [decoded.fingerprint, cipher.fingerprint], cipher.rejected);
        });
    }

    /**
     * Dial positions that put `key` on the machine, given the current reading
     * of every knob and the 1-based knob the keyed word starts on.
     */
    public dial(key: OffsetSequence, firstKnob: number, readings: readonly number[]): DialCode {
        assertKey(key);
        const pattern = foldKnobs(key, this.engine.groupCount);
        if (pattern === null) {
            throw new DecoderError(
                ErrorCode.INVALID_KEY,
                `Key ${key.join('-')} sets one knob to two values`,
                { key: [...key], groupCount: this.engine.groupCount }
            );
        }
        const knobs = dialSetting(pattern, readings, firstKnob);
        this.logger.info({ firstKnob, knobs }, 'Dial code computed');
        return { firstKnob, knobs, complete: isComplete(knobs) };
    }

    private isDuplicate(message: Message): boolean {
        return this.dedup && this.seen.contains(message.fingerprint);
    }

    private duplicate(message: Message): DuplicateOutcome {
        this.logger.info({ fingerprint: message.fingerprint }, 'Duplicate message skipped');
        return { kind: 'DUPLICATE', fingerprint: message.fingerprint };
    }

    private applyClear(message: Message, fingerprints: string[], rejected: readonly string[]): FrequencyUpdatedOutcome {
        const update = this.frequency.update(message);
        for (const fingerprint of fingerprints) this.seen.record(fingerprint);

        this.logger.info({ fingerprint: message.fingerprint, increments: update.increments }, 'Clear text counted');
        return {
            kind: 'FREQUENCY_UPDATED',
            fingerprint: message.fingerprint,
            text: message.text,
            increments: update.increments,
            rejected
        };
    }

    private suggest(message: Message): KeySuggestionsOutcome {
        const candidates = this.withKnobs(this.engine.infer(message, this.frequency));
        const sender = this.withKnobs(this.engine.inferWord(message.sender, this.frequency, FrequencyNamespace.SENDER));
        const receiver = this.withKnobs(this.engine.inferWord(message.receiver, this.frequency, FrequencyNamespace.RECEIVER));

        const suggested = candidates.length + sender.length + receiver.length > 0;
        if (suggested) this.seen.record(message.fingerprint);

        const outcome: KeySuggestionsOutcome = {
            kind: 'KEY_SUGGESTIONS',
            fingerprint: message.fingerprint,
            candidates,
            fields: { sender, receiver },
            rejected: message.rejected,
            decodableWords: this.engine.decodableWords(message, this.frequency),
            partial: !candidates.some(key => key.completeness === Completeness.FULL),
            recorded: suggested
        };
        this.logger.info(
            { fingerprint: message.fingerprint, candidates: candidates.length, partial: outcome.partial },
            suggested ? 'Cipher text: keys suggested' : 'Cipher text: no suggestion'
        );
        return outcome;
    }

    private withKnobs(candidates: CandidateKey[]): SuggestedKey[] {
        return candidates.map(candidate => ({ ...candidate, knobs: foldKnobs(candidate.offsets, this.engine.groupCount) }));
    }

    private reportingFailures<T>(fingerprint: string, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            if (isDecoderError(e)) this.logger.error({ fingerprint, code: e.code }, e.message);
            throw e;
        }
    }
}
