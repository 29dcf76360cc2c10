import { PayloadTooLargeError, ValidationError } from '../lib/errors';
import type { UploadedFile } from '../types/attachment.types';
import { imageExtensionFor } from './fileTypes';

const DATA_URL = /^data:(image\/[\w.+-]+);base64,([\s\S]*)$/i;
const BASE64 = /^[A-Za-z0-9+/=\s]+$/;

/**
 * Decodes a pasted screenshot sent as a data URL or bare base64 (assumed PNG).
 */
export function decodeClipboardImage(data: string, maxBytes: number, now: number = Date.now()): UploadedFile {
    const match = DATA_URL.exec(data.trim());
    const mimeType = match ? match[1].toLowerCase() : 'image/png';
    const payload = match ? match[2] : data.trim();

    if (!payload || !BASE64.test(payload)) {
        throw new ValidationError('Clipboard data is not a base64 encoded image');
    }

    const buffer = Buffer.from(payload.replace(/\s+/g, ''), 'base64');
    if (buffer.length === 0) {
        throw new ValidationError('Clipboard data is not a base64 encoded image');
    }
    if (buffer.length > maxBytes) {
        throw new PayloadTooLargeError('File exceeds the maximum upload size');
    }

    return {
        originalName: `clipboard_${now}${imageExtensionFor(mimeType)}`,
        mimeType,
        buffer
    };
}
