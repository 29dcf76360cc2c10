import { Inject, Service } from 'typedi';
import { DataSource, EntityManager } from 'typeorm';
import { Dictionary, DictionaryValue, Interface, Parameter, Project } from '../../entities';
import { DATA_SOURCE } from '../../lib/container';
import { NotFoundError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { AuthUser } from '../../types/domain.types';
import { canMutate } from '../../utils/permissions';
import type { ImportedDictionary, ImportedInterface, ImportJsonInput } from '../../validation/import.schemas';

const log = logger.child('Import');

export interface UpsertCounts {
    created: number;
    updated: number;
    skipped: number;
}

export interface ImportSummary {
    interfaces: UpsertCounts;
    dictionaries: UpsertCounts;
}

const emptyCounts = (): UpsertCounts => ({ created: 0, updated: 0, skipped: 0 });

/**
 * Upserts an export bundle into one project by code. Children (parameters,
 * dictionary values) of updated rows are replaced. Rows owned by someone
 * else are skipped unless the caller is an admin.
 */
@Service()
export class ImportService {
    constructor(@Inject(DATA_SOURCE) private readonly dataSource: DataSource) { }

    async importJson(input: ImportJsonInput, user: AuthUser): Promise<ImportSummary> {
        const projectExists = await this.dataSource.getRepository(Project).existsBy({ id: input.project_id });
        if (!projectExists) throw new NotFoundError(`Project not found: ${input.project_id}`);

        const summary = await this.dataSource.transaction(async manager => {
            const result: ImportSummary = { interfaces: emptyCounts(), dictionaries: emptyCounts() };
            for (const item of input.data.interfaces) {
                result.interfaces[await this.upsertInterface(manager, input.project_id, item, user)] += 1;
            }
            for (const item of input.data.dictionaries) {
                result.dictionaries[await this.upsertDictionary(manager, input.project_id, item, user)] += 1;
            }
            return result;
        });

        log.info('JSON import finished', { projectId: input.project_id, userId: user.id, ...summary });
        return summary;
    }

    private async upsertInterface(
        manager: EntityManager,
        projectId: number,
        item: ImportedInterface,
        user: AuthUser
    ): Promise<keyof UpsertCounts> {
        const repository = manager.getRepository(Interface);
        const existing = await repository.findOneBy({ code: item.code });
        if (existing && !canMutate(user, existing.creator_id)) {
            log.debug('Skipping interface owned by another user', { code: item.code });
            return 'skipped';
        }

        const { parameters, ...fields } = item;
        const saved = await repository.save(existing
            ? repository.merge(existing, { ...fields, project_id: projectId })
            : repository.create({ ...fields, project_id: projectId, creator_id: user.id }));

        const parameterRepository = manager.getRepository(Parameter);
        if (existing) await parameterRepository.delete({ interface_id: saved.id });
        await parameterRepository.save(parameters.map(parameter => parameterRepository.create({
            ...parameter,
            interface_id: saved.id,
            dictionary_id: null
        })));

        return existing ? 'updated' : 'created';
    }

    private async upsertDictionary(
        manager: EntityManager,
        projectId: number,
        item: ImportedDictionary,
        user: AuthUser
    ): Promise<keyof UpsertCounts> {
        const repository = manager.getRepository(Dictionary);
        const existing = await repository.findOneBy({ code: item.code });
        if (existing && !canMutate(user, existing.creator_id)) {
            log.debug('Skipping dictionary owned by another user', { code: item.code });
            return 'skipped';
        }

        const { values, ...fields } = item;
        const saved = await repository.save(existing
            ? repository.merge(existing, { ...fields, project_id: projectId })
            : repository.create({ ...fields, project_id: projectId, interface_id: null, creator_id: user.id }));

        const valueRepository = manager.getRepository(DictionaryValue);
        if (existing) await valueRepository.delete({ dictionary_id: saved.id });
        await valueRepository.save(values.map(value => valueRepository.create({ ...value, dictionary_id: saved.id })));

        return existing ? 'updated' : 'created';
    }
}
