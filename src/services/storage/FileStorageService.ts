import fs from 'fs/promises';
import path from 'path';
import { Inject, Service } from 'typedi';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../../config';
import { APP_CONFIG } from '../../lib/container';
import { AppError, ValidationError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { Attachment, AttachmentCategory, StorageArea, UploadedFile } from '../../types/attachment.types';
import { guessMimeType, sanitizeFilename } from '../../utils/fileTypes';

const log = logger.child('Storage');

/** Prefix of every stored file_path; also the static mount point */
export const UPLOADS_PREFIX = 'uploads';

function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

function isMissingFile(error: unknown): boolean {
    return hasErrorCode(error, 'ENOENT');
}

/**
 * Files live at <uploadDir>/<area>/<ownerId>/<stored_filename> and are
 * recorded with the relative path uploads/<area>/<ownerId>/<stored_filename>.
 */
@Service()
export class FileStorageService {
    constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) { }

    generateStoredFilename(originalName: string): string {
        const suffix = uuidv4().replace(/-/g, '').slice(0, 6);
        return `${Date.now()}_${suffix}_${sanitizeFilename(originalName)}`;
    }

    ownerDirectory(area: StorageArea, ownerId: number): string {
        return path.join(this.config.uploadDir, area, String(ownerId));
    }

    /**
     * Maps a stored relative path onto the upload root; paths escaping it are rejected.
     */
    resolve(filePath: string): string {
        const relative = filePath
            .replace(/\\/g, '/')
            .replace(/^\/+/, '')
            .replace(new RegExp(`^${UPLOADS_PREFIX}/`), '');
        const absolute = path.resolve(this.config.uploadDir, relative);
        if (!absolute.startsWith(this.config.uploadDir + path.sep)) {
            throw new ValidationError(`File path is outside the upload directory: ${filePath}`);
        }
        return absolute;
    }

    async save(area: StorageArea, ownerId: number, file: UploadedFile, category?: AttachmentCategory): Promise<Attachment> {
        const storedFilename = this.generateStoredFilename(file.originalName);
        const directory = this.ownerDirectory(area, ownerId);
        const absolute = path.join(directory, storedFilename);

        try {
            await fs.mkdir(directory, { recursive: true });
            await fs.writeFile(absolute, file.buffer, { flag: 'wx' });
        } catch (error) {
            log.error('Failed to write uploaded file', error, { path: absolute });
            // EEXIST: the path belongs to another upload, leave it alone
            if (hasErrorCode(error, 'EEXIST')) {
                throw new AppError(500, 'Failed to store uploaded file');
            }
            await fs.rm(absolute, { force: true }).catch(cleanupError => {
                log.warn('Could not remove partial upload', cleanupError, { path: absolute });
            });
            throw new AppError(500, 'Failed to store uploaded file');
        }

        log.debug('Stored upload', { area, ownerId, storedFilename, size: file.buffer.length });

        const attachment: Attachment = {
            filename: file.originalName,
            stored_filename: storedFilename,
            file_path: [UPLOADS_PREFIX, area, ownerId, storedFilename].join('/'),
            file_size: file.buffer.length,
            mime_type: file.mimeType && file.mimeType !== 'application/octet-stream'
                ? file.mimeType
                : guessMimeType(file.originalName) ?? (file.mimeType || null),
            upload_time: new Date().toISOString()
        };
        if (category) attachment.category = category;
        return attachment;
    }

    /**
     * Best effort: a missing file or an unsafe path is logged and ignored.
     */
    async remove(filePath: string): Promise<void> {
        let absolute: string;
        try {
            absolute = this.resolve(filePath);
        } catch (error) {
            log.warn('Refusing to delete file outside the upload directory', error, { filePath });
            return;
        }

        try {
            await fs.unlink(absolute);
            log.debug('Deleted file', { filePath });
        } catch (error) {
            if (isMissingFile(error)) {
                log.warn('File already removed from disk', undefined, { filePath });
                return;
            }
            log.warn('Failed to delete file', error, { filePath });
        }
    }

    async removeOwnerDirectory(area: StorageArea, ownerId: number): Promise<void> {
        const directory = this.ownerDirectory(area, ownerId);
        try {
            await fs.rm(directory, { recursive: true, force: true });
        } catch (error) {
            log.warn('Failed to remove upload directory', error, { directory });
        }
    }
}
