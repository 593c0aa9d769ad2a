import { resolve } from 'path';
import { z } from 'zod';
import { DecoderError, ErrorCode } from '../kernel-core/Errors.js';
import { DEFAULT_CLEAR_THRESHOLD } from '../kernel-core/L1/Classifier.js';
import { DEFAULT_GROUP_COUNT } from '../kernel-core/L3/Inference.js';

export const DEFAULT_DICTIONARY_PATH = resolve(__dirname, '../../data/dictionary.txt');

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const ConfigSchema = z.object({
    DECODER_STORAGE: z.enum(['sqlite', 'memory']).default('sqlite'),
    DECODER_DB_PATH: z.string().min(1).default('decoder.db'),
    DECODER_DICTIONARY_PATH: z.string().min(1).default(DEFAULT_DICTIONARY_PATH),
    DECODER_GROUP_COUNT: z.coerce.number().int().min(1).default(DEFAULT_GROUP_COUNT),
    DECODER_CLEAR_THRESHOLD: z.coerce.number().min(0).max(1).default(DEFAULT_CLEAR_THRESHOLD),
    DECODER_DEDUP: booleanFlag.default('true'),
    DECODER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000)
});

export type StorageKind = z.infer<typeof ConfigSchema>['DECODER_STORAGE'];

export interface DecoderConfig {
    storage: StorageKind;
    dbPath: string;
    dictionaryPath: string;
    groupCount: number;
    clearThreshold: number;
    dedup: boolean;
    logLevel: z.infer<typeof ConfigSchema>['DECODER_LOG_LEVEL'];
    port: number;
}

/**
 * Reads decoder settings from an environment map. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DecoderConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = ConfigSchema.safeParse(present);
    if (!parsed.success) {
        const keys = parsed.error.issues.map(issue => issue.path.join('.'));
        throw new DecoderError(
            ErrorCode.INVALID_CONFIG,
            `Invalid configuration: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
            { keys }
        );
    }

    const values = parsed.data;
    return {
        storage: values.DECODER_STORAGE,
        dbPath: values.DECODER_DB_PATH,
        dictionaryPath: values.DECODER_DICTIONARY_PATH,
        groupCount: values.DECODER_GROUP_COUNT,
        clearThreshold: values.DECODER_CLEAR_THRESHOLD,
        dedup: values.DECODER_DEDUP,
        logLevel: values.DECODER_LOG_LEVEL,
        port: values.PORT
    };
}
