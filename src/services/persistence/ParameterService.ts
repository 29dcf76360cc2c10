import { Inject, Service } from 'typedi';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import { Dictionary, Interface, Parameter } from '../../entities';
import { DATA_SOURCE } from '../../lib/container';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { AuthUser, ParamType } from '../../types/domain.types';
import { ParsedParameter, parseParameterText } from '../../utils/parameterImport';
import { assertCanMutate } from '../../utils/permissions';
import type { ImportCommitInput, ParameterInput, UpdateParameterInput } from '../../validation/parameter.schemas';

const log = logger.child('Parameters');

const PARAMETER_ORDER = { order_index: 'ASC', id: 'ASC' } as const;

export async function assertDictionariesExist(manager: EntityManager, ids: Array<number | null | undefined>): Promise<void> {
    const wanted = [...new Set(ids.filter((id): id is number => typeof id === 'number'))];
    if (wanted.length === 0) return;

    const found = await manager.getRepository(Dictionary).findBy({ id: In(wanted) });
    const missing = wanted.filter(id => !found.some(dictionary => dictionary.id === id));
    if (missing.length > 0) {
        throw new ValidationError(`Dictionary not found: ${missing.join(', ')}`);
    }
}

/**
 * Builds parameter rows for an interface; rows without an explicit
 * order_index take their position in the list.
 */
export function buildParameters(manager: EntityManager, interfaceId: number, inputs: ParameterInput[]): Parameter[] {
    const repository = manager.getRepository(Parameter);
    return inputs.map((input, position) => repository.create({
        interface_id: interfaceId,
        param_type: input.param_type,
        field_name: input.field_name,
        name: input.name,
        data_type: input.data_type,
        required: input.required,
        default_value: input.default_value ?? null,
        description: input.description ?? null,
        example: input.example ?? null,
        order_index: input.order_index ?? position,
        dictionary_id: input.dictionary_id ?? null
    }));
}

@Service()
export class ParameterService {
    private readonly parameters: Repository<Parameter>;

    constructor(@Inject(DATA_SOURCE) private readonly dataSource: DataSource) {
        this.parameters = dataSource.getRepository(Parameter);
    }

    private async getInterface(interfaceId: number): Promise<Interface> {
        const owner = await this.dataSource.getRepository(Interface).findOneBy({ id: interfaceId });
        if (!owner) throw new NotFoundError(`Interface not found: ${interfaceId}`);
        return owner;
    }

    async get(id: number): Promise<Parameter> {
        const parameter = await this.parameters.findOneBy({ id });
        if (!parameter) throw new NotFoundError(`Parameter not found: ${id}`);
        return parameter;
    }

    async listForInterface(interfaceId: number, paramType?: ParamType): Promise<Parameter[]> {
        await this.getInterface(interfaceId);
        return this.parameters.find({
            where: paramType ? { interface_id: interfaceId, param_type: paramType } : { interface_id: interfaceId },
            order: PARAMETER_ORDER
        });
    }

    async create(interfaceId: number, input: ParameterInput, user: AuthUser): Promise<Parameter> {
        const owner = await this.getInterface(interfaceId);
        assertCanMutate(user, owner.creator_id, 'interface');
        await assertDictionariesExist(this.dataSource.manager, [input.dictionary_id]);

        const orderIndex = input.order_index
            ?? await this.parameters.countBy({ interface_id: interfaceId, param_type: input.param_type });
        const [parameter] = buildParameters(this.dataSource.manager, interfaceId, [{ ...input, order_index: orderIndex }]);
        const saved = await this.parameters.save(parameter);
        log.debug('Parameter created', { parameterId: saved.id, interfaceId });
        return saved;
    }

    async update(id: number, input: UpdateParameterInput, user: AuthUser): Promise<Parameter> {
        const parameter = await this.get(id);
        const owner = await this.getInterface(parameter.interface_id);
        assertCanMutate(user, owner.creator_id, 'interface');
        await assertDictionariesExist(this.dataSource.manager, [input.dictionary_id]);

        if (input.field_name !== undefined) parameter.field_name = input.field_name;
        if (input.name !== undefined) parameter.name = input.name;
        if (input.data_type !== undefined) parameter.data_type = input.data_type;
        if (input.required !== undefined) parameter.required = input.required;
        if (input.default_value !== undefined) parameter.default_value = input.default_value;
        if (input.description !== undefined) parameter.description = input.description;
        if (input.example !== undefined) parameter.example = input.example;
        if (input.order_index !== undefined) parameter.order_index = input.order_index;
        if (input.dictionary_id !== undefined) parameter.dictionary_id = input.dictionary_id;

        return this.parameters.save(parameter);
    }

    async delete(id: number, user: AuthUser): Promise<void> {
        const parameter = await this.get(id);
        const owner = await this.getInterface(parameter.interface_id);
        assertCanMutate(user, owner.creator_id, 'interface');
        await this.parameters.delete({ id });
    }

    /**
     * Parses pasted text; order indexes continue after the existing rows of the same type.
     */
    async previewImport(interfaceId: number, text: string, paramType: ParamType): Promise<ParsedParameter[]> {
        await this.getInterface(interfaceId);
        const startIndex = await this.parameters.countBy({ interface_id: interfaceId, param_type: paramType });
        return parseParameterText(text, { paramType, startIndex });
    }

    /**
     * Appends the reviewed rows and renumbers that type's order_index to 0..n-1,
     * existing rows first.
     */
    async commitImport(interfaceId: number, input: ImportCommitInput, user: AuthUser): Promise<Parameter[]> {
        const owner = await this.getInterface(interfaceId);
        assertCanMutate(user, owner.creator_id, 'interface');

        const saved = await this.dataSource.transaction(async manager => {
            const repository = manager.getRepository(Parameter);
            await assertDictionariesExist(manager, input.parameters.map(row => row.dictionary_id));

            const existing = await repository.find({
                where: { interface_id: interfaceId, param_type: input.param_type },
                order: PARAMETER_ORDER
            });
            const imported = buildParameters(manager, interfaceId, input.parameters.map(row => ({
                ...row,
                param_type: input.param_type,
                required: input.param_type === 'input' ? row.required : false
            })));

            const all = [...existing, ...imported];
            all.forEach((parameter, index) => {
                parameter.order_index = index;
            });
            await repository.save(all);

            return repository.find({
                where: { interface_id: interfaceId, param_type: input.param_type },
                order: PARAMETER_ORDER
            });
        });

        log.info('Imported parameters', { interfaceId, paramType: input.param_type, count: input.parameters.length });
        return saved;
    }
}
