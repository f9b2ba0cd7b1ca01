import { Config, validateConfig } from './config';
import { BotHandler } from './components/BotHandler';
import { logger } from './utils/logger';

async function main() {
    try {
        // Load and validate configuration
        const config = Config.getInstance();
        validateConfig(config);

        logger.info('Starting document assistant bot...', {
            environment: config.nodeEnv,
            storage: config.storageDriver,
            database: config.storageDriver === 'mongodb' ? config.mongodbDbName : undefined
        });

        // Initialize bot handler
        const botHandler = new BotHandler(config);
        await botHandler.initialize();

        logger.info('Bot started successfully!');

        // Handle graceful shutdown
        const shutdown = async (signal: string) => {
            logger.info('Shutting down bot...', { signal });
            try {
                await botHandler.shutdown();
                process.exit(0);
            } catch (error) {
                logger.error('Shutdown failed', { error });
                process.exit(1);
            }
        };

        process.once('SIGINT', () => void shutdown('SIGINT'));
        process.once('SIGTERM', () => void shutdown('SIGTERM'));

    } catch (error) {
        logger.error('Failed to start bot', { error });
        process.exit(1);
    }
}

// Start the application
if (require.main === module) {
    void main();
}
