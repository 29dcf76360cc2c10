import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import Container from 'typedi';
import type { DataSource } from 'typeorm';
import type { AppConfig } from './config';
import { APP_CONFIG, DATA_SOURCE } from './lib/container';
import { initializeDataSource } from './lib/data-source';
import { errorHandler, notFoundRoute } from './lib/http';
import { authMiddleware } from './middleware/auth';
import { requestLogger } from './middleware/requestLogger';
import { usersRouter } from './routes/admin/users';
import { authRouter } from './routes/auth';
import { importExportRouter } from './routes/integration/import-export';
import { dictionariesRouter } from './routes/persistence/dictionaries';
import { documentsRouter } from './routes/persistence/documents';
import { faqsRouter } from './routes/persistence/faqs';
import { interfacesRouter } from './routes/persistence/interfaces';
import { parametersRouter } from './routes/persistence/parameters';
import { projectsRouter } from './routes/persistence/projects';
import { UPLOADS_PREFIX } from './services/storage/FileStorageService';

export interface AppContext {
    config: AppConfig;
    dataSource: DataSource;
}

/**
 * Opens the database and registers the config and connection for injection.
 */
export async function initializeContext(config: AppConfig): Promise<AppContext> {
    const dataSource = await initializeDataSource(config);
    Container.set(APP_CONFIG, config);
    Container.set(DATA_SOURCE, dataSource);
    return { config, dataSource };
}

export function createApp(context: AppContext): express.Express {
    const { config } = context;
    const app = express();

    // Middleware
    app.use(cors({ origin: config.corsOrigin }));
    app.use(express.json({ limit: '5mb' }));
    app.use(requestLogger);

    // Public Routes
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });
    app.use(`/${UPLOADS_PREFIX}`, express.static(config.uploadDir));

    app.use('/api/auth', authRouter);

    // Protected Routes
    app.use('/api', authMiddleware);

    app.use('/api/projects', projectsRouter);
    app.use('/api/interfaces', interfacesRouter);
    app.use('/api/parameters', parametersRouter);
    app.use('/api/dictionaries', dictionariesRouter);
    app.use('/api/documents', documentsRouter);
    app.use('/api/faqs', faqsRouter);
    app.use('/api/users', usersRouter);
    app.use('/api/import-export', importExportRouter);

    app.use(notFoundRoute);
    app.use(errorHandler);

    return app;
}
