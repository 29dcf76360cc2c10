import fs from 'fs';
import path from 'path';
import { DataSource } from 'typeorm';
import type { AppConfig } from '../config';
import { ENTITIES } from '../entities';
import { logger } from './logger';

const log = logger.child('Database');

/**
 * SQLite compiled to wasm (sql.js). A file database is loaded from
 * `databasePath` and written back after every change; `:memory:` is never saved.
 */
export function createDataSource(config: Pick<AppConfig, 'databasePath'>): DataSource {
    const inMemory = config.databasePath === ':memory:';
    if (!inMemory) {
        fs.mkdirSync(path.dirname(config.databasePath), { recursive: true });
    }

    return new DataSource({
        type: 'sqljs',
        ...(inMemory ? {} : { location: config.databasePath, autoSave: true }),
        entities: ENTITIES,
        synchronize: true,
        logging: false
    });
}

export async function initializeDataSource(config: Pick<AppConfig, 'databasePath'>): Promise<DataSource> {
    const dataSource = createDataSource(config);
    await dataSource.initialize();
    log.info('Database ready', { database: config.databasePath });
    return dataSource;
}
