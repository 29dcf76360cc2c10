import { Inject, Service } from 'typedi';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import { Dictionary, DictionaryValue, Interface, Project } from '../../entities';
import { DATA_SOURCE } from '../../lib/container';
import { ConflictError, NotFoundError, ValidationError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { AuthUser, Paginated } from '../../types/domain.types';
import { assertCanMutate } from '../../utils/permissions';
import type {
    CreateDictionaryInput,
    DictionaryValueInput,
    ListDictionariesQuery,
    UpdateDictionaryInput
} from '../../validation/dictionary.schemas';
import { likePattern, pageWindow, toPage } from './pagination';

const log = logger.child('Dictionaries');

const VALUE_ORDER = { order_index: 'ASC', id: 'ASC' } as const;

export type DictionaryWithValues = Dictionary & { values: DictionaryValue[] };
export type DictionarySummary = Dictionary & { values_count: number };

export function buildValues(manager: EntityManager, dictionaryId: number, inputs: DictionaryValueInput[], offset = 0): DictionaryValue[] {
    const repository = manager.getRepository(DictionaryValue);
    return inputs.map((input, position) => repository.create({
        dictionary_id: dictionaryId,
        key: input.key,
        value: input.value,
        description: input.description ?? null,
        order_index: input.order_index ?? offset + position
    }));
}

@Service()
export class DictionaryService {
    private readonly dictionaries: Repository<Dictionary>;
    private readonly values: Repository<DictionaryValue>;

    constructor(@Inject(DATA_SOURCE) private readonly dataSource: DataSource) {
        this.dictionaries = dataSource.getRepository(Dictionary);
        this.values = dataSource.getRepository(DictionaryValue);
    }

    async getEntity(id: number): Promise<Dictionary> {
        const dictionary = await this.dictionaries.findOneBy({ id });
        if (!dictionary) throw new NotFoundError(`Dictionary not found: ${id}`);
        return dictionary;
    }

    private async withValues(dictionary: Dictionary): Promise<DictionaryWithValues> {
        const values = await this.values.find({ where: { dictionary_id: dictionary.id }, order: VALUE_ORDER });
        return Object.assign(dictionary, { values });
    }

    private async assertProjectExists(projectId: number): Promise<void> {
        if (!(await this.dataSource.getRepository(Project).existsBy({ id: projectId }))) {
            throw new NotFoundError(`Project not found: ${projectId}`);
        }
    }

    private async assertInterfaceExists(interfaceId: number | null | undefined): Promise<void> {
        if (interfaceId === null || interfaceId === undefined) return;
        if (!(await this.dataSource.getRepository(Interface).existsBy({ id: interfaceId }))) {
            throw new ValidationError(`Interface not found: ${interfaceId}`);
        }
    }

    private async assertCodeAvailable(code: string, exceptId?: number): Promise<void> {
        const existing = await this.dictionaries.findOneBy({ code });
        if (existing && existing.id !== exceptId) {
            throw new ConflictError(`Dictionary code already exists: ${code}`);
        }
    }

    async list(query: ListDictionariesQuery): Promise<Paginated<DictionaryWithValues>> {
        const qb = this.dictionaries.createQueryBuilder('dictionary').orderBy('dictionary.id', 'ASC');
        if (query.project_id) {
            qb.andWhere('dictionary.project_id = :projectId', { projectId: query.project_id });
        }
        if (query.keyword) {
            qb.andWhere(
                "(dictionary.name LIKE :kw ESCAPE '\\' OR dictionary.code LIKE :kw ESCAPE '\\' OR dictionary.description LIKE :kw ESCAPE '\\')",
                { kw: likePattern(query.keyword) }
            );
        }
        const { skip, take } = pageWindow(query);
        const [rows, total] = await qb.skip(skip).take(take).getManyAndCount();
        return toPage(await this.attachValues(rows), total, query);
    }

    async attachValues(dictionaries: Dictionary[]): Promise<DictionaryWithValues[]> {
        if (dictionaries.length === 0) return [];
        const values = await this.values.find({
            where: { dictionary_id: In(dictionaries.map(dictionary => dictionary.id)) },
            order: VALUE_ORDER
        });
        return dictionaries.map(dictionary => Object.assign(dictionary, {
            values: values.filter(value => value.dictionary_id === dictionary.id)
        }));
    }

    async listByProject(projectId: number): Promise<DictionarySummary[]> {
        await this.assertProjectExists(projectId);
        const rows = await this.dictionaries.find({ where: { project_id: projectId }, order: { id: 'ASC' } });
        const counts = await Promise.all(rows.map(row => this.values.countBy({ dictionary_id: row.id })));
        return rows.map((row, index) => Object.assign(row, { values_count: counts[index] }));
    }

    async listByInterface(interfaceId: number): Promise<DictionaryWithValues[]> {
        const rows = await this.dictionaries.find({ where: { interface_id: interfaceId }, order: { id: 'ASC' } });
        return this.attachValues(rows);
    }

    async get(id: number): Promise<DictionaryWithValues> {
        return this.withValues(await this.getEntity(id));
    }

    async getByCode(code: string): Promise<DictionaryWithValues> {
        const dictionary = await this.dictionaries.findOneBy({ code });
        if (!dictionary) throw new NotFoundError(`Dictionary not found: ${code}`);
        return this.withValues(dictionary);
    }

    async create(input: CreateDictionaryInput, user: AuthUser): Promise<DictionaryWithValues> {
        await this.assertProjectExists(input.project_id);
        await this.assertInterfaceExists(input.interface_id);
        await this.assertCodeAvailable(input.code);

        const id = await this.dataSource.transaction(async manager => {
            const dictionary = await manager.getRepository(Dictionary).save(manager.getRepository(Dictionary).create({
                project_id: input.project_id,
                name: input.name,
                code: input.code,
                description: input.description ?? null,
                interface_id: input.interface_id ?? null,
                creator_id: user.id
            }));
            await manager.getRepository(DictionaryValue).save(buildValues(manager, dictionary.id, input.values));
            return dictionary.id;
        });

        log.info('Dictionary created', { dictionaryId: id, code: input.code, userId: user.id });
        return this.get(id);
    }

    async update(id: number, input: UpdateDictionaryInput, user: AuthUser): Promise<DictionaryWithValues> {
        const dictionary = await this.getEntity(id);
        assertCanMutate(user, dictionary.creator_id, 'dictionary');

        if (input.project_id !== undefined) {
            await this.assertProjectExists(input.project_id);
            dictionary.project_id = input.project_id;
        }
        if (input.code !== undefined && input.code !== dictionary.code) {
            await this.assertCodeAvailable(input.code, id);
            dictionary.code = input.code;
        }
        if (input.interface_id !== undefined) {
            await this.assertInterfaceExists(input.interface_id);
            dictionary.interface_id = input.interface_id;
        }
        if (input.name !== undefined) dictionary.name = input.name;
        if (input.description !== undefined) dictionary.description = input.description;

        await this.dictionaries.save(dictionary);
        return this.get(id);
    }

    async delete(id: number, user: AuthUser): Promise<void> {
        const dictionary = await this.getEntity(id);
        assertCanMutate(user, dictionary.creator_id, 'dictionary');
        await this.dictionaries.delete({ id });
        log.info('Dictionary deleted', { dictionaryId: id, userId: user.id });
    }

    async listValues(id: number): Promise<DictionaryValue[]> {
        await this.getEntity(id);
        return this.values.find({ where: { dictionary_id: id }, order: VALUE_ORDER });
    }

    async addValue(id: number, input: DictionaryValueInput, user: AuthUser): Promise<DictionaryValue> {
        const dictionary = await this.getEntity(id);
        assertCanMutate(user, dictionary.creator_id, 'dictionary');

        const offset = await this.values.countBy({ dictionary_id: id });
        const [value] = buildValues(this.dataSource.manager, id, [input], offset);
        return this.values.save(value);
    }

    async deleteValue(valueId: number, user: AuthUser): Promise<void> {
        const value = await this.values.findOneBy({ id: valueId });
        if (!value) throw new NotFoundError(`Dictionary value not found: ${valueId}`);

        const dictionary = await this.getEntity(value.dictionary_id);
        assertCanMutate(user, dictionary.creator_id, 'dictionary');
        await this.values.delete({ id: valueId });
    }
}
