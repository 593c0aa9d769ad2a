import { Dictionary } from '../kernel-core/L1/Classifier.js';
import { MessageParser } from '../kernel-core/L1/Message.js';
import { FrequencyStore } from '../kernel-core/L2/Frequency.js';
import { KeyInferenceEngine } from '../kernel-core/L3/Inference.js';
import { SeenMessageLog } from '../kernel-core/L5/SeenLog.js';
import { SessionCoordinator } from '../kernel-core/Session.js';
import { MemoryFrequencyRepository, MemorySeenMessageStore } from '../infrastructure/persistence/MemoryStores.js';
import { SQLiteFrequencyRepository } from '../infrastructure/persistence/SQLiteFrequencyRepository.js';
import { SQLiteSeenMessageStore } from '../infrastructure/persistence/SQLiteSeenMessageStore.js';
import type { DecoderConfig } from './Config.js';
import type { Logger } from './Logger.js';
import { createLogger } from './Logger.js';
import type { IFrequencyRepository, ISeenMessageStore } from './Ports.js';

export interface StoragePorts {
    frequency: IFrequencyRepository;
    seen: ISeenMessageStore;
}

export interface PlatformOverrides {
    dictionary?: Dictionary;
    storage?: StoragePorts;
    logger?: Logger;
}

export function createStorage(config: DecoderConfig): StoragePorts {
    if (config.storage === 'memory') {
        return { frequency: new MemoryFrequencyRepository(), seen: new MemorySeenMessageStore() };
    }
    return {
        frequency: new SQLiteFrequencyRepository(config.dbPath),
        seen: new SQLiteSeenMessageStore(config.dbPath)
    };
}

/**
 * DecoderPlatform: composition root.
 * Wires parser, stores and engine into one coordinator; the stores are owned
 * by that coordinator for the life of the process.
 */
export function createSession(config: DecoderConfig, overrides: PlatformOverrides = {}): SessionCoordinator {
    const logger = overrides.logger ?? createLogger('Decoder', config.logLevel);
    const dictionary = overrides.dictionary ?? Dictionary.fromFile(config.dictionaryPath);
    const storage = overrides.storage ?? createStorage(config);

    logger.debug({ words: dictionary.size, storage: config.storage }, 'Dictionary loaded');

    return new SessionCoordinator({
        parser: new MessageParser(dictionary, config.clearThreshold),
        frequency: new FrequencyStore(storage.frequency, logger),
        seen: new SeenMessageLog(storage.seen, logger),
        engine: new KeyInferenceEngine({ groupCount: config.groupCount }),
        logger,
        dedup: config.dedup
    });
}
