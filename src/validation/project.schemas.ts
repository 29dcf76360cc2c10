import { z } from 'zod';
import { optionalText, pageSchema, queryText, requiredText } from './common';

// Free-form note, usually { name, version, update_date }
const documentNoteSchema = z.record(z.unknown());

export const createProjectSchema = z.object({
    name: requiredText(200),
    manager: requiredText(100),
    contact_info: requiredText(2000),
    description: optionalText(),
    documents: z.array(documentNoteSchema).nullish()
});

export const updateProjectSchema = createProjectSchema.partial();

export const listProjectsQuerySchema = pageSchema.extend({
    keyword: queryText()
});

export type CreateProjectInput = z.infer<typeof createProjectSchema>;
export type UpdateProjectInput = z.infer<typeof updateProjectSchema>;
export type ListProjectsQuery = z.infer<typeof listProjectsQuerySchema>;
