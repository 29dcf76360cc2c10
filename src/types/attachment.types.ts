/**
 * Attachment Type Definitions
 *
 * Attachments are embedded in their owner's row as a JSON array; the
 * stored filename is the only key used to address one for deletion.
 */

export const ATTACHMENT_CATEGORIES = ['preview', 'download'] as const;
export type AttachmentCategory = typeof ATTACHMENT_CATEGORIES[number];

export interface Attachment {
    /** Original name supplied by the uploader */
    filename: string;
    /** Collision-free name on disk, unique within the owner's directory */
    stored_filename: string;
    /** Path relative to the server root, e.g. uploads/projects/3/1700000000000_a1b2c3_spec.pdf */
    file_path: string;
    file_size: number;
    mime_type: string | null;
    upload_time: string;
    category?: AttachmentCategory;
}

export interface AttachmentView extends Attachment {
    file_url: string;
}

export type StorageArea = 'projects' | 'documents' | 'faqs';

/** Bytes received from a multipart upload or a pasted clipboard image */
export interface UploadedFile {
    originalName: string;
    mimeType: string;
    buffer: Buffer;
}

/** Single-file columns written by rows created before attachment lists existed */
export interface LegacyFileColumns {
    file_path: string | null;
    file_name: string | null;
    file_size: number | null;
    mime_type: string | null;
    created_at: Date;
}
