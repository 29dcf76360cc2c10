import 'reflect-metadata';
import dotenv from 'dotenv';
import Container from 'typedi';
import { createApp, initializeContext } from './app';
import { loadConfig } from './config';
import { logger } from './lib/logger';
import { SeedService } from './services/persistence/SeedService';

dotenv.config();

async function main(): Promise<void> {
    const config = loadConfig();
    const context = await initializeContext(config);
    await Container.get(SeedService).ensureDefaultAdmin();

    const app = createApp(context);
    app.listen(config.port, '0.0.0.0', () => {
        logger.info(`Interface docs backend running on port ${config.port}`);
        logger.info(`Health check: http://localhost:${config.port}/health`);
    });
}

main().catch(error => {
    logger.error('Startup failed', error);
    process.exit(1);
});
