import { Inject, Service } from 'typedi';
import { Brackets, DataSource, In, Repository } from 'typeorm';
import { Interface, Parameter, Project } from '../../entities';
import { DATA_SOURCE } from '../../lib/container';
import { ConflictError, NotFoundError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { AuthUser, Paginated } from '../../types/domain.types';
import { assertCanMutate } from '../../utils/permissions';
import type {
    CreateInterfaceInput,
    ListInterfacesQuery,
    SearchInterfacesInput,
    UpdateInterfaceInput
} from '../../validation/interface.schemas';
import { DictionaryService, DictionaryWithValues } from './DictionaryService';
import { likePattern, pageWindow, toPage } from './pagination';
import { assertDictionariesExist, buildParameters } from './ParameterService';

const log = logger.child('Interfaces');

export type InterfaceWithParameters = Interface & { parameters: Parameter[] };
export type InterfaceDetail = InterfaceWithParameters & { dictionaries: DictionaryWithValues[] };

@Service()
export class InterfaceService {
    private readonly interfaces: Repository<Interface>;

    constructor(
        @Inject(DATA_SOURCE) private readonly dataSource: DataSource,
        private readonly dictionaries: DictionaryService
    ) {
        this.interfaces = dataSource.getRepository(Interface);
    }

    async getEntity(id: number): Promise<Interface> {
        const row = await this.interfaces.findOneBy({ id });
        if (!row) throw new NotFoundError(`Interface not found: ${id}`);
        return row;
    }

    private async assertProjectExists(projectId: number): Promise<void> {
        if (!(await this.dataSource.getRepository(Project).existsBy({ id: projectId }))) {
            throw new NotFoundError(`Project not found: ${projectId}`);
        }
    }

    private async assertCodeAvailable(code: string, exceptId?: number): Promise<void> {
        const existing = await this.interfaces.findOneBy({ code });
        if (existing && existing.id !== exceptId) {
            throw new ConflictError(`Interface code already exists: ${code}`);
        }
    }

    async attachParameters(rows: Interface[]): Promise<InterfaceWithParameters[]> {
        if (rows.length === 0) return [];
        const parameters = await this.dataSource.getRepository(Parameter).find({
            where: { interface_id: In(rows.map(row => row.id)) },
            order: { order_index: 'ASC', id: 'ASC' }
        });
        return rows.map(row => Object.assign(row, {
            parameters: parameters.filter(parameter => parameter.interface_id === row.id)
        }));
    }

    private async detail(row: Interface): Promise<InterfaceDetail> {
        const [withParameters] = await this.attachParameters([row]);
        const dictionaries = await this.dictionaries.listByInterface(row.id);
        return Object.assign(withParameters, { dictionaries });
    }

    async list(query: ListInterfacesQuery): Promise<Paginated<Interface>> {
        const { skip, take } = pageWindow(query);
        const [rows, total] = await this.interfaces.findAndCount({
            where: query.project_id ? { project_id: query.project_id } : {},
            order: { id: 'ASC' },
            skip,
            take
        });
        return toPage(rows, total, query);
    }

    async listByProject(projectId: number): Promise<Interface[]> {
        await this.assertProjectExists(projectId);
        return this.interfaces.find({ where: { project_id: projectId }, order: { id: 'ASC' } });
    }

    /**
     * Keyword matches name, code or description. Every comma-separated tag
     * in the filter must appear in the interface's tags.
     */
    async search(input: SearchInterfacesInput): Promise<Paginated<Interface>> {
        const qb = this.interfaces.createQueryBuilder('iface').orderBy('iface.id', 'ASC');

        if (input.project_id) qb.andWhere('iface.project_id = :projectId', { projectId: input.project_id });
        if (input.interface_type) qb.andWhere('iface.interface_type = :type', { type: input.interface_type });
        if (input.status) qb.andWhere('iface.status = :status', { status: input.status });
        if (input.category) qb.andWhere('iface.category = :category', { category: input.category });

        if (input.keyword) {
            const kw = likePattern(input.keyword);
            qb.andWhere(new Brackets(where => {
                where.where("iface.name LIKE :kw ESCAPE '\\'", { kw })
                    .orWhere("iface.code LIKE :kw ESCAPE '\\'", { kw })
                    .orWhere("iface.description LIKE :kw ESCAPE '\\'", { kw });
            }));
        }

        const tags = (input.tags ?? '').split(',').map(tag => tag.trim()).filter(Boolean);
        tags.forEach((tag, index) => {
            qb.andWhere(`iface.tags LIKE :tag${index} ESCAPE '\\'`, { [`tag${index}`]: likePattern(tag) });
        });

        const { skip, take } = pageWindow(input);
        const [rows, total] = await qb.skip(skip).take(take).getManyAndCount();
        return toPage(rows, total, input);
    }

    async get(id: number): Promise<InterfaceDetail> {
        return this.detail(await this.getEntity(id));
    }

    async getByCode(code: string): Promise<InterfaceDetail> {
        const row = await this.interfaces.findOneBy({ code });
        if (!row) throw new NotFoundError(`Interface not found: ${code}`);
        return this.detail(row);
    }

    async create(input: CreateInterfaceInput, user: AuthUser): Promise<InterfaceDetail> {
        await this.assertProjectExists(input.project_id);
        await this.assertCodeAvailable(input.code);

        const id = await this.dataSource.transaction(async manager => {
            await assertDictionariesExist(manager, input.parameters.map(parameter => parameter.dictionary_id));
            const repository = manager.getRepository(Interface);
            const saved = await repository.save(repository.create({
                project_id: input.project_id,
                name: input.name,
                code: input.code,
                description: input.description ?? null,
                interface_type: input.interface_type,
                url: input.url ?? null,
                method: input.method ?? null,
                category: input.category ?? null,
                tags: input.tags ?? null,
                status: input.status,
                input_example: input.input_example ?? null,
                output_example: input.output_example ?? null,
                view_definition: input.view_definition ?? null,
                notes: input.notes ?? null,
                creator_id: user.id
            }));
            await manager.getRepository(Parameter).save(buildParameters(manager, saved.id, input.parameters));
            return saved.id;
        });

        log.info('Interface created', { interfaceId: id, code: input.code, userId: user.id });
        return this.get(id);
    }

    async update(id: number, input: UpdateInterfaceInput, user: AuthUser): Promise<InterfaceDetail> {
        const row = await this.getEntity(id);
        assertCanMutate(user, row.creator_id, 'interface');

        if (input.project_id !== undefined && input.project_id !== row.project_id) {
            await this.assertProjectExists(input.project_id);
            row.project_id = input.project_id;
        }
        if (input.code !== undefined && input.code !== row.code) {
            await this.assertCodeAvailable(input.code, id);
            row.code = input.code;
        }
        if (input.name !== undefined) row.name = input.name;
        if (input.description !== undefined) row.description = input.description;
        if (input.interface_type !== undefined) row.interface_type = input.interface_type;
        if (input.url !== undefined) row.url = input.url;
        if (input.method !== undefined) row.method = input.method;
        if (input.category !== undefined) row.category = input.category;
        if (input.tags !== undefined) row.tags = input.tags;
        if (input.status !== undefined) row.status = input.status;
        if (input.input_example !== undefined) row.input_example = input.input_example;
        if (input.output_example !== undefined) row.output_example = input.output_example;
        if (input.view_definition !== undefined) row.view_definition = input.view_definition;
        if (input.notes !== undefined) row.notes = input.notes;

        const parameters = input.parameters;
        await this.dataSource.transaction(async manager => {
            await manager.getRepository(Interface).save(row);
            if (parameters) {
                await assertDictionariesExist(manager, parameters.map(parameter => parameter.dictionary_id));
                await manager.getRepository(Parameter).delete({ interface_id: id });
                await manager.getRepository(Parameter).save(buildParameters(manager, id, parameters));
            }
        });

        return this.get(id);
    }

    async delete(id: number, user: AuthUser): Promise<void> {
        const row = await this.getEntity(id);
        assertCanMutate(user, row.creator_id, 'interface');
        await this.interfaces.delete({ id });
        log.info('Interface deleted', { interfaceId: id, userId: user.id });
    }
}
