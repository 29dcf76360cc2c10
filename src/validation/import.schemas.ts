import { z } from 'zod';
import { INTERFACE_STATUSES, INTERFACE_TYPES, PARAM_TYPES } from '../types/domain.types';

// Shape written by the JSON export; unknown keys (ids, timestamps) are ignored

const nullableText = z.string().nullish().transform(value => value ?? null);

const importedParameterSchema = z.object({
    param_type: z.enum(PARAM_TYPES),
    field_name: z.string().min(1),
    name: z.string().min(1),
    data_type: z.string().min(1).default('string'),
    required: z.boolean().default(false),
    default_value: nullableText,
    description: nullableText,
    example: nullableText,
    order_index: z.number().int().min(0).default(0)
});

const importedInterfaceSchema = z.object({
    name: z.string().min(1),
    code: z.string().min(1),
    description: nullableText,
    interface_type: z.enum(INTERFACE_TYPES),
    url: nullableText,
    method: nullableText,
    category: nullableText,
    tags: nullableText,
    status: z.enum(INTERFACE_STATUSES).default('active'),
    input_example: nullableText,
    output_example: nullableText,
    view_definition: nullableText,
    notes: nullableText,
    parameters: z.array(importedParameterSchema).default([])
});

const importedDictionarySchema = z.object({
    name: z.string().min(1),
    code: z.string().min(1),
    description: nullableText,
    values: z.array(z.object({
        key: z.string().min(1),
        value: z.string(),
        description: nullableText,
        order_index: z.number().int().min(0).default(0)
    })).default([])
});

export const importJsonSchema = z.object({
    project_id: z.number().int().positive(),
    data: z.object({
        interfaces: z.array(importedInterfaceSchema).default([]),
        dictionaries: z.array(importedDictionarySchema).default([])
    })
});

export type ImportJsonInput = z.infer<typeof importJsonSchema>;
export type ImportedInterface = ImportJsonInput['data']['interfaces'][number];
export type ImportedDictionary = ImportJsonInput['data']['dictionaries'][number];
