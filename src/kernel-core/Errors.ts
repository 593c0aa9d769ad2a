/**
 * Decoder Kernel Error Taxonomy
 * Centralized error codes for rejected input and terminal failures.
 *
 * Ordinary outcomes (absent fields, empty suggestion sets, duplicates) are
 * result values and never appear here.
 */

export enum ErrorCode {
    // I. Alphabet & Words
    INVALID_SYMBOL = 'INVALID_SYMBOL',
    LENGTH_MISMATCH = 'LENGTH_MISMATCH',
    INVALID_KEY = 'INVALID_KEY',

    // II. Store Lifecycle & Durability
    STORE_NOT_OPEN = 'STORE_NOT_OPEN',
    PERSISTENCE_FAILURE = 'PERSISTENCE_FAILURE',

    // III. Environment
    DICTIONARY_UNAVAILABLE = 'DICTIONARY_UNAVAILABLE',
    INVALID_CONFIG = 'INVALID_CONFIG',
}

export class DecoderError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Decoder:${code}] ${message}`);
        this.name = 'DecoderError';
    }
}

export function isDecoderError(e: unknown, code?: ErrorCode): e is DecoderError {
    return e instanceof DecoderError && (code === undefined || e.code === code);
}

/**
 * Wraps an adapter failure so callers see one code for every storage backend.
 */
export function persistenceFailure(operation: string, cause: unknown): DecoderError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new DecoderError(ErrorCode.PERSISTENCE_FAILURE, `${operation} failed: ${reason}`, { operation, reason });
}
