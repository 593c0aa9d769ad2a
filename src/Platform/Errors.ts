import { DecoderError, ErrorCode } from '../kernel-core/Errors.js';

/**
 * Decoder Platform: Surface Error Taxonomy
 * Translates kernel failures into errors the outer layers can report.
 */

export abstract class PlatformError extends Error {
    constructor(message: string, public code: string, public status: number, public metadata?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when a request carries text or keys the kernel cannot accept.
 */
export class RequestValidationError extends PlatformError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'REQUEST_INVALID', 400, details);
    }
}

/**
 * Thrown when the environment fails (storage unavailable, write refused).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string, underlying?: string) {
        super(message, 'INFRASTRUCTURE_FAILURE', 503, { underlying });
    }
}

/**
 * Thrown for kernel failures with no better classification.
 */
export class InternalError extends PlatformError {
    constructor(message: string) {
        super(message, 'INTERNAL', 500);
    }
}

const INPUT_CODES: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.INVALID_SYMBOL,
    ErrorCode.LENGTH_MISMATCH,
    ErrorCode.INVALID_KEY
]);

export function translateError(e: unknown): PlatformError {
    if (e instanceof PlatformError) return e;
    if (e instanceof DecoderError) {
        if (INPUT_CODES.has(e.code)) return new RequestValidationError(e.message, { code: e.code });
        if (e.code === ErrorCode.PERSISTENCE_FAILURE || e.code === ErrorCode.STORE_NOT_OPEN) {
            return new InfrastructureError(e.message, e.code);
        }
        return new InternalError(e.message);
    }
    return new InternalError(e instanceof Error ? e.message : String(e));
}
