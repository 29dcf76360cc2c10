import fs from 'fs/promises';
import path from 'path';
import { Inject, Service } from 'typedi';
import { DataSource } from 'typeorm';
import { z } from 'zod';
import type { AppConfig } from '../../config';
import { Dictionary, DictionaryValue, Project, User } from '../../entities';
import { APP_CONFIG, DATA_SOURCE } from '../../lib/container';
import { logger } from '../../lib/logger';
import { UserService } from './UserService';

const log = logger.child('Seed');

export const FAQ_MODULE_CODE = 'FAQ_MODULE';
const FAQ_MODULES_FILE = path.join(__dirname, '../../../data/faq-modules.json');

const moduleListSchema = z.array(z.object({
    key: z.string().min(1),
    value: z.string().min(1),
    description: z.string().nullish()
})).min(1);

export type FaqModule = z.infer<typeof moduleListSchema>[number];

export interface FaqModuleSeedResult {
    dictionaryId: number;
    projectId: number;
    added: number;
}

export async function loadFaqModules(filePath: string = FAQ_MODULES_FILE): Promise<FaqModule[]> {
    const raw = await fs.readFile(filePath, 'utf-8');
    return moduleListSchema.parse(JSON.parse(raw));
}

@Service()
export class SeedService {
    constructor(
        @Inject(DATA_SOURCE) private readonly dataSource: DataSource,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        private readonly users: UserService
    ) { }

    /**
     * Creates the configured admin account when the user table is empty.
     */
    async ensureDefaultAdmin(): Promise<User | null> {
        if (await this.users.countUsers() > 0) return null;

        const { username, password } = this.config.defaultAdmin;
        const admin = await this.users.createUser({ username, name: 'Administrator', password, role: 'admin' });
        if (!password) {
            log.warn('Default admin created without a password; any password will log in', undefined, { username });
        }
        return admin;
    }

    /**
     * Creates the FAQ module dictionary under the first project, adding only
     * the module keys that are missing. Safe to run repeatedly.
     */
    async ensureFaqModuleDictionary(modules?: FaqModule[]): Promise<FaqModuleSeedResult> {
        const entries = modules ?? await loadFaqModules();
        const owner = await this.dataSource.getRepository(User).findOne({
            where: { role: 'admin' },
            order: { id: 'ASC' }
        });
        const creatorId = owner?.id ?? null;

        return this.dataSource.transaction(async manager => {
            const projects = manager.getRepository(Project);
            let [project] = await projects.find({ order: { id: 'ASC' }, take: 1 });
            if (!project) {
                project = await projects.save(projects.create({
                    name: '默认项目',
                    manager: '系统管理员',
                    contact_info: '-',
                    description: 'Created to hold shared dictionaries',
                    creator_id: creatorId
                }));
                log.info('Created default project', { projectId: project.id });
            }

            const dictionaries = manager.getRepository(Dictionary);
            let dictionary = await dictionaries.findOneBy({ code: FAQ_MODULE_CODE });
            if (!dictionary) {
                dictionary = await dictionaries.save(dictionaries.create({
                    project_id: project.id,
                    name: 'FAQ模块',
                    code: FAQ_MODULE_CODE,
                    description: 'Modules used to classify FAQ entries',
                    creator_id: creatorId
                }));
            }

            const values = manager.getRepository(DictionaryValue);
            const existing = await values.findBy({ dictionary_id: dictionary.id });
            const dictionaryId = dictionary.id;
            const missing = entries
                .map((entry, index) => ({ entry, index }))
                .filter(({ entry }) => !existing.some(value => value.key === entry.key));

            await values.save(missing.map(({ entry, index }) => values.create({
                dictionary_id: dictionaryId,
                key: entry.key,
                value: entry.value,
                description: entry.description ?? null,
                order_index: index
            })));

            log.info('FAQ module dictionary ready', { dictionaryId, added: missing.length });
            return { dictionaryId, projectId: dictionary.project_id, added: missing.length };
        });
    }
}
