import { z } from 'zod';
import { optionalText, pageSchema, queryId, queryText, requiredText } from './common';

export const dictionaryValueSchema = z.object({
    key: requiredText(100),
    value: requiredText(500),
    description: optionalText(),
    order_index: z.number().int().min(0).optional()
});

export const createDictionarySchema = z.object({
    project_id: z.number().int().positive(),
    name: requiredText(200),
    code: requiredText(100),
    description: optionalText(),
    interface_id: z.number().int().positive().nullish(),
    values: z.array(dictionaryValueSchema).default([])
});

export const updateDictionarySchema = createDictionarySchema.omit({ values: true }).partial();

export const listDictionariesQuerySchema = pageSchema.extend({
    project_id: queryId(),
    keyword: queryText()
});

export type DictionaryValueInput = z.infer<typeof dictionaryValueSchema>;
export type CreateDictionaryInput = z.infer<typeof createDictionarySchema>;
export type UpdateDictionaryInput = z.infer<typeof updateDictionarySchema>;
export type ListDictionariesQuery = z.infer<typeof listDictionariesQuerySchema>;
