import { z } from 'zod';
import { ATTACHMENT_CATEGORIES } from '../types/attachment.types';
import { DOCUMENT_TYPES, FAQ_CONTENT_TYPES } from '../types/domain.types';
import { optionalText, pageSchema, queryText, requiredText } from './common';

// Multipart bodies: every field arrives as a string

export const createDocumentSchema = z.object({
    title: requiredText(200),
    description: optionalText(),
    region: optionalText(50),
    person: optionalText(50),
    document_type: z.enum(DOCUMENT_TYPES),
    clipboard_data: optionalText()
});

export const updateDocumentSchema = z.object({
    title: requiredText(200).optional(),
    description: optionalText(),
    region: optionalText(50),
    person: optionalText(50)
});

export const listDocumentsQuerySchema = pageSchema.extend({
    keyword: queryText(),
    document_type: z.preprocess(
        value => (value === '' ? undefined : value),
        z.enum(DOCUMENT_TYPES).optional()
    ),
    region: queryText(),
    person: queryText()
});

export const attachmentUploadSchema = z.object({
    category: z.preprocess(
        value => (value === '' ? undefined : value),
        z.enum(ATTACHMENT_CATEGORIES).optional()
    )
});

export const createFaqSchema = z.object({
    title: requiredText(200),
    description: optionalText(),
    module: optionalText(100),
    person: optionalText(50),
    content_type: z.enum(FAQ_CONTENT_TYPES).default('attachment'),
    rich_content: optionalText(),
    clipboard_data: optionalText()
});

export const updateFaqSchema = z.object({
    title: requiredText(200).optional(),
    description: optionalText(),
    module: optionalText(100),
    person: optionalText(50),
    rich_content: optionalText()
});

export const listFaqsQuerySchema = pageSchema.extend({
    keyword: queryText(),
    module: queryText(),
    person: queryText(),
    content_type: z.preprocess(
        value => (value === '' ? undefined : value),
        z.enum(FAQ_CONTENT_TYPES).optional()
    )
});

export type CreateDocumentInput = z.infer<typeof createDocumentSchema>;
export type UpdateDocumentInput = z.infer<typeof updateDocumentSchema>;
export type ListDocumentsQuery = z.infer<typeof listDocumentsQuerySchema>;
export type CreateFaqInput = z.infer<typeof createFaqSchema>;
export type UpdateFaqInput = z.infer<typeof updateFaqSchema>;
export type ListFaqsQuery = z.infer<typeof listFaqsQuerySchema>;
