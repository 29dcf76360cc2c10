import { z } from 'zod';
import { INTERFACE_STATUSES, INTERFACE_TYPES } from '../types/domain.types';
import { optionalText, pageSchema, queryId, requiredText } from './common';
import { parameterFieldsSchema } from './parameter.schemas';

export const createInterfaceSchema = z.object({
    project_id: z.number().int().positive(),
    name: requiredText(200),
    code: requiredText(100),
    description: optionalText(),
    interface_type: z.enum(INTERFACE_TYPES),
    url: optionalText(500),
    method: optionalText(10),
    category: optionalText(100),
    tags: optionalText(500),
    status: z.enum(INTERFACE_STATUSES).default('active'),
    input_example: optionalText(),
    output_example: optionalText(),
    view_definition: optionalText(),
    notes: optionalText(),
    parameters: z.array(parameterFieldsSchema).default([])
});

export const updateInterfaceSchema = createInterfaceSchema
    .omit({ parameters: true, status: true })
    .partial()
    .extend({
        status: z.enum(INTERFACE_STATUSES).optional(),
        // Present means replace every parameter
        parameters: z.array(parameterFieldsSchema).optional()
    });

export const listInterfacesQuerySchema = pageSchema.extend({
    project_id: queryId()
});

export const searchInterfacesSchema = pageSchema.extend({
    project_id: z.number().int().positive().nullish(),
    keyword: optionalText(),
    interface_type: z.enum(INTERFACE_TYPES).nullish(),
    category: optionalText(),
    tags: optionalText(),
    status: z.enum(INTERFACE_STATUSES).nullish()
});

export type CreateInterfaceInput = z.infer<typeof createInterfaceSchema>;
export type UpdateInterfaceInput = z.infer<typeof updateInterfaceSchema>;
export type SearchInterfacesInput = z.infer<typeof searchInterfacesSchema>;
export type ListInterfacesQuery = z.infer<typeof listInterfacesQuerySchema>;
