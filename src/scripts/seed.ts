import 'reflect-metadata';
import dotenv from 'dotenv';
import Container from 'typedi';
import { initializeContext } from '../app';
import { loadConfig } from '../config';
import { logger } from '../lib/logger';
import { SeedService } from '../services/persistence/SeedService';

dotenv.config();

/**
 * Seeds the default admin and the FAQ module dictionary.
 */
async function seed(): Promise<void> {
    const { dataSource } = await initializeContext(loadConfig());
    try {
        const seeder = Container.get(SeedService);
        const admin = await seeder.ensureDefaultAdmin();
        if (admin) logger.info('Default admin created', { username: admin.username });

        const result = await seeder.ensureFaqModuleDictionary();
        logger.info('Seed complete', { ...result });
    } finally {
        await dataSource.destroy();
    }
}

seed().catch(error => {
    logger.error('Seed failed', error);
    process.exit(1);
});
