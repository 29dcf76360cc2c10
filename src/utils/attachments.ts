import { z } from 'zod';
import { logger } from '../lib/logger';
import { ATTACHMENT_CATEGORIES, Attachment, AttachmentView, LegacyFileColumns } from '../types/attachment.types';

const log = logger.child('Attachments');

const attachmentSchema = z.object({
    filename: z.string(),
    stored_filename: z.string().min(1),
    file_path: z.string().min(1),
    file_size: z.number().nonnegative(),
    mime_type: z.string().nullish().transform(value => value ?? null),
    upload_time: z.string(),
    category: z.enum(ATTACHMENT_CATEGORIES).optional()
});

function parseJson(raw: string | null | undefined): unknown[] {
    if (!raw) return [];
    try {
        const value: unknown = JSON.parse(raw);
        return Array.isArray(value) ? value : [];
    } catch (error) {
        log.warn('Stored list is not valid JSON; treating it as empty', error);
        return [];
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Free-form JSON list column (project document notes).
 */
export function parseJsonList(raw: string | null | undefined): Record<string, unknown>[] {
    return parseJson(raw).filter(isRecord);
}

export function parseAttachments(raw: string | null | undefined): Attachment[] {
    const attachments: Attachment[] = [];
    for (const entry of parseJson(raw)) {
        const parsed = attachmentSchema.safeParse(entry);
        if (parsed.success) {
            attachments.push(parsed.data);
        } else {
            log.warn('Skipping malformed attachment entry', undefined, { entry });
        }
    }
    return attachments;
}

export function lastPathSegment(filePath: string): string {
    return filePath.replace(/\\/g, '/').split('/').filter(Boolean).pop() ?? filePath;
}

/**
 * Rows created before attachment lists existed only carry the single-file
 * columns. An empty list on such a row reads as a one-element list built
 * from those columns.
 */
export function withLegacyFallback(attachments: Attachment[], legacy: LegacyFileColumns): Attachment[] {
    if (attachments.length > 0 || !legacy.file_path) return attachments;

    const storedFilename = lastPathSegment(legacy.file_path);
    return [{
        filename: legacy.file_name ?? storedFilename,
        stored_filename: storedFilename,
        file_path: legacy.file_path,
        file_size: legacy.file_size ?? 0,
        mime_type: legacy.mime_type,
        upload_time: legacy.created_at.toISOString()
    }];
}

export function toFileUrl(filePath: string): string {
    const normalized = filePath.replace(/\\/g, '/');
    return normalized.startsWith('/') ? normalized : `/${normalized}`;
}

export function withFileUrls(attachments: Attachment[]): AttachmentView[] {
    return attachments.map(attachment => ({ ...attachment, file_url: toFileUrl(attachment.file_path) }));
}

export function serializeAttachments(attachments: Attachment[]): string | null {
    return attachments.length > 0 ? JSON.stringify(attachments) : null;
}
