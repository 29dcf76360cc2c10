import path from 'path';

const MIME_BY_EXTENSION: Record<string, string> = {
    '.pdf': 'application/pdf',
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.gif': 'image/gif',
    '.webp': 'image/webp',
    '.bmp': 'image/bmp',
    '.svg': 'image/svg+xml',
    '.txt': 'text/plain',
    '.csv': 'text/csv',
    '.json': 'application/json',
    '.zip': 'application/zip',
    '.doc': 'application/msword',
    '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    '.xls': 'application/vnd.ms-excel',
    '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
};

const EXTENSION_BY_IMAGE_MIME: Record<string, string> = {
    'image/png': '.png',
    'image/jpeg': '.jpg',
    'image/gif': '.gif',
    'image/webp': '.webp',
    'image/bmp': '.bmp'
};

const MAX_FILENAME_LENGTH = 120;

export function extensionOf(filename: string): string {
    return path.extname(filename).toLowerCase();
}

export function isPdfFile(filename: string, mimeType?: string | null): boolean {
    return extensionOf(filename) === '.pdf' || mimeType?.toLowerCase() === 'application/pdf';
}

export function isImageFile(mimeType?: string | null): boolean {
    return !!mimeType && mimeType.toLowerCase().startsWith('image/');
}

export function guessMimeType(filename: string): string | null {
    return MIME_BY_EXTENSION[extensionOf(filename)] ?? null;
}

export function imageExtensionFor(mimeType: string): string {
    return EXTENSION_BY_IMAGE_MIME[mimeType.toLowerCase()] ?? '.png';
}

/**
 * Reduces an uploader-supplied name to a single safe path segment.
 * Keeps the extension when the name has to be shortened.
 */
export function sanitizeFilename(filename: string): string {
    const base = filename.replace(/\\/g, '/').split('/').pop() ?? '';
    let safe = base
        .replace(/[<>:"|?*\u0000-\u001f]/g, '_')
        .replace(/\s+/g, '_')
        .replace(/^\.+/, '');

    if (safe.length > MAX_FILENAME_LENGTH) {
        const ext = path.extname(safe).slice(0, 16);
        safe = safe.slice(0, MAX_FILENAME_LENGTH - ext.length) + ext;
    }
    return safe || 'file';
}
