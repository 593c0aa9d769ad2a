// src/kernel-core/L0/Guards.ts
import { ALPHABET_SIZE, isOffset, isSymbol, isWord } from './Alphabet.js';
import { ErrorCode } from '../Errors.js';

// --- Guard Pattern ---
export interface GuardResult {
    ok: boolean;
    code?: ErrorCode;
    violation?: string;
}

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string): GuardResult => ({ ok: false, code, violation: msg });

export const MARKER = '=';

export type MarkerSide = 'PREFIX' | 'SUFFIX';

export interface MarkedField {
    name: string;
    side: MarkerSide;
}

// --- Concrete Guards ---

// 1. Symbols (every character drawn from the alphabet)
export const SymbolGuard: Guard<string> = (token) => {
    if (token.length === 0) return FAIL(ErrorCode.INVALID_SYMBOL, 'Empty token');
    for (const char of token) {
        if (!isSymbol(char)) return FAIL(ErrorCode.INVALID_SYMBOL, `Symbol '${char}' outside the alphabet`);
    }
    return OK;
};

// 2. Offset key (non-empty, every entry a valid dial offset)
export const KeyGuard: Guard<readonly number[]> = (key) => {
    if (key.length === 0) return FAIL(ErrorCode.INVALID_KEY, 'Key has no offsets');
    const bad = key.findIndex(value => !isOffset(value));
    if (bad >= 0) return FAIL(ErrorCode.INVALID_KEY, `Offset ${key[bad]} at position ${bad} is outside 0..${ALPHABET_SIZE - 1}`);
    return OK;
};

// 3. Field marker: exactly one '=' at one end, a non-empty name without '='
export function readMarker(token: string): MarkedField | null {
    if (token.length < 2) return null;

    let side: MarkerSide;
    let name: string;
    if (token.startsWith(MARKER)) {
        side = 'PREFIX';
        name = token.slice(1);
    } else if (token.endsWith(MARKER)) {
        side = 'SUFFIX';
        name = token.slice(0, -1);
    } else {
        return null;
    }

    if (name.includes(MARKER) || !isWord(name)) return null;
    return { name, side };
}
