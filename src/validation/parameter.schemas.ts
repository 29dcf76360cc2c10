import { z } from 'zod';
import { PARAM_TYPES } from '../types/domain.types';
import { optionalText, requiredText } from './common';

export const parameterFieldsSchema = z.object({
    param_type: z.enum(PARAM_TYPES),
    field_name: requiredText(100),
    name: requiredText(200),
    data_type: requiredText(50),
    required: z.boolean().default(false),
    default_value: optionalText(500),
    description: optionalText(),
    example: optionalText(500),
    order_index: z.number().int().min(0).optional(),
    dictionary_id: z.number().int().positive().nullish()
});

export const updateParameterSchema = parameterFieldsSchema.omit({ param_type: true }).partial();

export const listParametersQuerySchema = z.object({
    param_type: z.enum(PARAM_TYPES).optional()
});

export const importPreviewSchema = z.object({
    param_type: z.enum(PARAM_TYPES),
    text: z.string().max(1_000_000)
});

// Commit accepts rows as previewed; param_type on each row is overridden by the body's
export const importCommitSchema = z.object({
    param_type: z.enum(PARAM_TYPES),
    parameters: z.array(parameterFieldsSchema.omit({ param_type: true }).extend({
        // Parsed rows may carry an empty name or field name, never both
        field_name: z.string().trim().max(100),
        name: z.string().trim().max(200),
        data_type: z.string().trim().max(50).default('string')
    }).refine(row => row.field_name !== '' || row.name !== '', 'field_name or name is required')).min(1)
});

export type ParameterInput = z.infer<typeof parameterFieldsSchema>;
export type UpdateParameterInput = z.infer<typeof updateParameterSchema>;
export type ImportCommitInput = z.infer<typeof importCommitSchema>;
