import { Config, validateConfig } from './config/Config';
import { BotHandler } from './components/BotHandler';
import { createLogger, errorMeta } from './utils/logger';

const log = createLogger('main');

async function main() {
    try {
        // Load and validate configuration
        const config = Config.getInstance();
        validateConfig(config);

        log.info('Starting facility applications bot', {
            environment: config.nodeEnv,
            database: config.mongodbDbName
        });

        const botHandler = new BotHandler(config);
        await botHandler.initialize();

        log.info('Bot started successfully');

        const shutdown = async (signal: string) => {
            log.info('Shutting down bot', { signal });
            try {
                await botHandler.shutdown();
                process.exit(0);
            } catch (error) {
                log.error('Shutdown failed', errorMeta(error));
                process.exit(1);
            }
        };

        process.once('SIGINT', () => void shutdown('SIGINT'));
        process.once('SIGTERM', () => void shutdown('SIGTERM'));
    } catch (error) {
        log.error('Failed to start bot', errorMeta(error));
        process.exit(1);
    }
}

// Start the application
if (require.main === module) {
    void main();
}
