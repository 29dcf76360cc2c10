import { ConflictError } from '../../lib/errors';
import type { Attachment, LegacyFileColumns } from '../../types/attachment.types';
import { parseAttachments, withLegacyFallback } from '../../utils/attachments';
import { isPdfFile } from '../../utils/fileTypes';
import type { RemovalGuard } from '../storage/AttachmentService';

export interface LegacyFileRow extends LegacyFileColumns {
    attachments: string | null;
}

/** Written with every attachment list so the legacy columns never shadow it again */
export const CLEARED_LEGACY_COLUMNS = {
    file_path: null,
    file_name: null,
    file_size: null,
    mime_type: null
};

export function readAttachments(row: LegacyFileRow): Attachment[] {
    return withLegacyFallback(parseAttachments(row.attachments), row);
}

function isPdfPreview(attachment: Attachment): boolean {
    return attachment.category !== 'download' && isPdfFile(attachment.filename, attachment.mime_type);
}

/**
 * Vetoes removing the last previewable PDF.
 */
export function keepLastPdf(label: string): RemovalGuard {
    return (removed, remaining) => {
        if (isPdfPreview(removed) && !remaining.some(isPdfPreview)) {
            throw new ConflictError(`Cannot delete the last PDF of this ${label}`);
        }
    };
}
