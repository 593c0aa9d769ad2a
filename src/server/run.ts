import dotenv from 'dotenv';
import { loadConfig } from '../Platform/Config.js';
import { createSession } from '../Platform/DecoderPlatform.js';
import { createLogger } from '../Platform/Logger.js';
import { DecoderServer } from './Server.js';

async function bootstrap() {
    dotenv.config();
    const config = loadConfig(process.env);
    const logger = createLogger('DecoderServer', config.logLevel);

    const session = createSession(config, { logger });
    session.open();
    logger.info({ storage: config.storage, groupCount: config.groupCount }, 'DecoderServer: Session open');

    const server = new DecoderServer(session, config.port, logger);
    await server.start();

    const shutdown = () => {
        void server.shutdown();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

bootstrap().catch(e => {
    console.error(e);
    process.exitCode = 1;
});
