import { z } from 'zod';

const blankToNull = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? null : value;

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

export const requiredText = (max: number) => z.string().trim().min(1, 'Required').max(max);

/** Absent stays undefined (leave unchanged); blank or null clears the value */
export const optionalText = (max?: number) =>
    z.preprocess(blankToNull, (max ? z.string().trim().max(max) : z.string().trim()).nullish());

/** Query string filter; blank means no filter */
export const queryText = () => z.preprocess(blankToUndefined, z.string().trim().optional());

export const queryId = () => z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional());

export const pageSchema = z.object({
    page: z.coerce.number().int().min(1).default(1),
    page_size: z.coerce.number().int().min(1).max(100).default(20)
});

export type PageInput = z.infer<typeof pageSchema>;
