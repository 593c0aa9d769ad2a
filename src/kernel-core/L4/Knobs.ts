// src/kernel-core/L4/Knobs.ts
import { ALPHABET_SIZE, isOffset, mod, unshift } from '../L0/Alphabet.js';
import type { OffsetSequence, Word } from '../L0/Alphabet.js';
import { KeyGuard, MARKER } from '../L0/Guards.js';
import type { ParsedFields } from '../L1/Message.js';
import { DecoderError, ErrorCode } from '../Errors.js';

/**
 * One entry per knob; null where the word never reached that knob.
 */
export type KnobPattern = readonly (number | null)[];

/**
 * The machine turns its knobs round-robin: position i uses knob i mod groupCount.
 * Folding a per-position key onto the knobs fails (null) when two positions on
 * the same knob disagree.
 */
export function foldKnobs(offsets: OffsetSequence, groupCount: number): KnobPattern | null {
    const knobs: (number | null)[] = new Array<number | null>(groupCount).fill(null);
    for (let i = 0; i < offsets.length; i++) {
        const value = offsets[i];
        if (value === undefined) continue;
        const knob = i % groupCount;
        const current = knobs[knob];
        if (current === null || current === undefined) knobs[knob] = value;
        else if (current !== value) return null;
    }
    return Object.freeze(knobs);
}

/** A partial code leaves at least one knob unknown. */
export function isComplete(pattern: KnobPattern): pattern is readonly number[] {
    return pattern.every(knob => knob !== null);
}

/**
 * Rotates a pattern toward its start so that entry 0 is the knob the word's
 * first symbol sits on (1-based).
 */
export function alignKnobs(pattern: KnobPattern, firstKnob: number): KnobPattern {
    const size = pattern.length;
    if (!Number.isInteger(firstKnob) || firstKnob < 1 || firstKnob > size) {
        throw new DecoderError(ErrorCode.INVALID_KEY, `Knob ${firstKnob} is outside 1..${size}`, { firstKnob });
    }
    return Object.freeze(pattern.map((_, i) => pattern[(firstKnob - 1 + i) % size] ?? null));
}

/**
 * Dial positions to set: the current reading of each knob plus its relative
 * offset, both aligned on `firstKnob`. Unknown knobs stay null.
 */
export function dialSetting(pattern: KnobPattern, readings: readonly number[], firstKnob: number): KnobPattern {
    if (readings.length !== pattern.length) {
        throw new DecoderError(
            ErrorCode.INVALID_KEY,
            `Expected ${pattern.length} knob readings, got ${readings.length}`,
            { readings: [...readings] }
        );
    }
    const bad = readings.find(reading => !isOffset(reading));
    if (bad !== undefined) {
        throw new DecoderError(ErrorCode.INVALID_KEY, `Knob reading ${bad} is outside 0..${ALPHABET_SIZE - 1}`, { reading: bad });
    }

    const current = alignKnobs(readings, firstKnob);
    return Object.freeze(alignKnobs(pattern, firstKnob).map((knob, i) => {
        const reading = current[i];
        return knob === null || reading === null || reading === undefined ? null : mod(knob + reading);
    }));
}

// --- Applying keys ---

export function assertKey(key: OffsetSequence): void {
    const result = KeyGuard(key);
    if (!result.ok) {
        throw new DecoderError(result.code ?? ErrorCode.INVALID_KEY, result.violation ?? 'Invalid key', { key: [...key] });
    }
}

/** Clear word from a cipher word; the key repeats when shorter than the word. */
export function decodeWord(cipherWord: Word, key: OffsetSequence): Word {
    assertKey(key);
    return Array.from(cipherWord, (symbol, i) => unshift(symbol, key[i % key.length] ?? 0)).join('');
}

/**
 * Clear text for a whole message as `=SENDER body RECEIVER=`, each word
 * decoded with the same key.
 */
export function decodeMessage(message: ParsedFields, key: OffsetSequence): string {
    assertKey(key);
    const tokens: string[] = [];
    if (message.sender !== null) tokens.push(`${MARKER}${decodeWord(message.sender, key)}`);
    for (const word of message.body) tokens.push(decodeWord(word, key));
    if (message.receiver !== null) tokens.push(`${decodeWord(message.receiver, key)}${MARKER}`);
    return tokens.join(' ');
}
