import { Service } from 'typedi';
import { ConflictError, NotFoundError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { Attachment, AttachmentCategory, StorageArea, UploadedFile } from '../../types/attachment.types';
import { FileStorageService } from './FileStorageService';

const log = logger.child('Attachments');

/**
 * One owner row's attachment list as read, plus a way to write it back.
 * `persist` resolves to false when the row changed since it was read.
 */
export interface AttachmentTarget {
    area: StorageArea;
    ownerId: number;
    /** Used in error messages, e.g. "project" */
    label: string;
    current: Attachment[];
    persist(attachments: Attachment[]): Promise<boolean>;
}

/** Throws to veto a removal; receives the entry and the list left after it. */
export type RemovalGuard = (removed: Attachment, remaining: Attachment[]) => void;

@Service()
export class AttachmentService {
    constructor(private readonly storage: FileStorageService) { }

    async append(target: AttachmentTarget, file: UploadedFile, category?: AttachmentCategory): Promise<Attachment[]> {
        const attachment = await this.storage.save(target.area, target.ownerId, file, category);
        const next = [...target.current, attachment];

        let saved: boolean;
        try {
            saved = await target.persist(next);
        } catch (error) {
            await this.storage.remove(attachment.file_path);
            throw error;
        }

        if (!saved) {
            await this.storage.remove(attachment.file_path);
            throw new ConflictError(`The ${target.label} was modified concurrently; retry the upload`);
        }

        log.info('Attachment added', { area: target.area, ownerId: target.ownerId, storedFilename: attachment.stored_filename });
        return next;
    }

    async remove(target: AttachmentTarget, storedFilename: string, guard?: RemovalGuard): Promise<Attachment[]> {
        const removed = target.current.find(entry => entry.stored_filename === storedFilename);
        if (!removed) {
            throw new NotFoundError(`Attachment not found: ${storedFilename}`);
        }

        const remaining = target.current.filter(entry => entry.stored_filename !== storedFilename);
        guard?.(removed, remaining);

        if (!(await target.persist(remaining))) {
            throw new ConflictError(`The ${target.label} was modified concurrently; retry the deletion`);
        }

        await this.storage.remove(removed.file_path);
        log.info('Attachment removed', { area: target.area, ownerId: target.ownerId, storedFilename });
        return remaining;
    }
}
