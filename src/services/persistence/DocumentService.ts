import { Inject, Service } from 'typedi';
import { DataSource, Repository } from 'typeorm';
import type { AppConfig } from '../../config';
import { Document } from '../../entities';
import { APP_CONFIG, DATA_SOURCE } from '../../lib/container';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { Attachment, AttachmentCategory, AttachmentView, UploadedFile } from '../../types/attachment.types';
import type { AuthUser, DocumentType, Paginated } from '../../types/domain.types';
import { serializeAttachments, withFileUrls } from '../../utils/attachments';
import { decodeClipboardImage } from '../../utils/clipboard';
import { isImageFile, isPdfFile } from '../../utils/fileTypes';
import { assertCanMutate } from '../../utils/permissions';
import type { CreateDocumentInput, ListDocumentsQuery, UpdateDocumentInput } from '../../validation/document.schemas';
import { AttachmentService, AttachmentTarget } from '../storage/AttachmentService';
import { FileStorageService } from '../storage/FileStorageService';
import { CLEARED_LEGACY_COLUMNS, keepLastPdf, readAttachments } from './legacyFiles';
import { likePattern, pageWindow, toPage } from './pagination';
import { updateIfVersion } from './versioned';

const log = logger.child('Documents');

export interface DocumentView {
    id: number;
    title: string;
    description: string | null;
    region: string | null;
    person: string | null;
    document_type: DocumentType;
    attachments: AttachmentView[];
    creator_id: number | null;
    version: number;
    created_at: Date;
    updated_at: Date;
}

export function toDocumentView(document: Document): DocumentView {
    return {
        id: document.id,
        title: document.title,
        description: document.description,
        region: document.region,
        person: document.person,
        document_type: document.document_type,
        attachments: withFileUrls(readAttachments(document)),
        creator_id: document.creator_id,
        version: document.version,
        created_at: document.created_at,
        updated_at: document.updated_at
    };
}

/** Preview files must match the document type; download files may be anything */
export function matchesDocumentType(file: UploadedFile, documentType: DocumentType): boolean {
    return documentType === 'pdf' ? isPdfFile(file.originalName, file.mimeType) : isImageFile(file.mimeType);
}

function typeMismatchMessage(documentType: DocumentType): string {
    return documentType === 'pdf'
        ? 'Only PDF files can be previewed in a PDF document'
        : 'Only image files can be previewed in an image document';
}

@Service()
export class DocumentService {
    private readonly documents: Repository<Document>;

    constructor(
        @Inject(DATA_SOURCE) private readonly dataSource: DataSource,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        private readonly attachments: AttachmentService,
        private readonly storage: FileStorageService
    ) {
        this.documents = dataSource.getRepository(Document);
    }

    async getEntity(id: number): Promise<Document> {
        const document = await this.documents.findOneBy({ id });
        if (!document) throw new NotFoundError(`Document not found: ${id}`);
        return document;
    }

    async list(query: ListDocumentsQuery): Promise<Paginated<DocumentView>> {
        const qb = this.documents.createQueryBuilder('document')
            .orderBy('document.created_at', 'DESC')
            .addOrderBy('document.id', 'DESC');

        if (query.keyword) {
            qb.andWhere(
                "(document.title LIKE :kw ESCAPE '\\' OR document.description LIKE :kw ESCAPE '\\')",
                { kw: likePattern(query.keyword) }
            );
        }
        if (query.document_type) qb.andWhere('document.document_type = :type', { type: query.document_type });
        if (query.region) qb.andWhere('document.region = :region', { region: query.region });
        if (query.person) qb.andWhere('document.person = :person', { person: query.person });

        const { skip, take } = pageWindow(query);
        const [rows, total] = await qb.skip(skip).take(take).getManyAndCount();
        return toPage(rows.map(toDocumentView), total, query);
    }

    async get(id: number): Promise<DocumentView> {
        return toDocumentView(await this.getEntity(id));
    }

    /**
     * Takes either uploaded files or one pasted image, never both.
     */
    async create(input: CreateDocumentInput, files: UploadedFile[], user: AuthUser): Promise<DocumentView> {
        const clipboard = input.clipboard_data;
        if (files.length === 0 && !clipboard) {
            throw new ValidationError('Provide at least one file or clipboard_data');
        }
        if (files.length > 0 && clipboard) {
            throw new ValidationError('Provide either files or clipboard_data, not both');
        }
        if (clipboard && input.document_type !== 'image') {
            throw new ValidationError('Clipboard paste is only supported for image documents');
        }

        const uploads = clipboard ? [decodeClipboardImage(clipboard, this.config.maxUploadBytes)] : files;
        const mismatch = uploads.find(file => !matchesDocumentType(file, input.document_type));
        if (mismatch) {
            throw new ValidationError(`${typeMismatchMessage(input.document_type)}: ${mismatch.originalName}`);
        }

        const document = await this.documents.save(this.documents.create({
            title: input.title,
            description: input.description ?? null,
            region: input.region ?? null,
            person: input.person ?? null,
            document_type: input.document_type,
            attachments: null,
            creator_id: user.id
        }));

        const stored: Attachment[] = [];
        try {
            for (const file of uploads) {
                stored.push(await this.storage.save('documents', document.id, file, 'preview'));
            }
            document.attachments = serializeAttachments(stored);
            const saved = await this.documents.save(document);
            log.info('Document created', { documentId: saved.id, files: stored.length, userId: user.id });
            return toDocumentView(saved);
        } catch (error) {
            await this.storage.removeOwnerDirectory('documents', document.id);
            await this.documents.delete({ id: document.id });
            throw error;
        }
    }

    async update(id: number, input: UpdateDocumentInput, user: AuthUser): Promise<DocumentView> {
        const document = await this.getEntity(id);
        assertCanMutate(user, document.creator_id, 'document');

        const changes: Partial<Pick<Document, 'title' | 'description' | 'region' | 'person'>> = {};
        if (input.title !== undefined) changes.title = input.title;
        if (input.description !== undefined) changes.description = input.description;
        if (input.region !== undefined) changes.region = input.region;
        if (input.person !== undefined) changes.person = input.person;

        if (Object.keys(changes).length > 0) {
            await this.documents.update({ id }, changes);
        }
        return toDocumentView(await this.getEntity(id));
    }

    async delete(id: number, user: AuthUser): Promise<void> {
        const document = await this.getEntity(id);
        assertCanMutate(user, document.creator_id, 'document');

        const files = readAttachments(document);
        await this.documents.delete({ id });
        for (const file of files) {
            await this.storage.remove(file.file_path);
        }
        await this.storage.removeOwnerDirectory('documents', id);
        log.info('Document deleted', { documentId: id, userId: user.id });
    }

    private attachmentTarget(document: Document): AttachmentTarget {
        return {
            area: 'documents',
            ownerId: document.id,
            label: 'document',
            current: readAttachments(document),
            persist: list => updateIfVersion(this.dataSource, Document, document.id, document.version, {
                attachments: serializeAttachments(list),
                ...CLEARED_LEGACY_COLUMNS
            })
        };
    }

    async addAttachment(
        id: number,
        file: UploadedFile,
        user: AuthUser,
        category: AttachmentCategory = 'preview'
    ): Promise<AttachmentView[]> {
        const document = await this.getEntity(id);
        assertCanMutate(user, document.creator_id, 'document');
        if (category === 'preview' && !matchesDocumentType(file, document.document_type)) {
            throw new ValidationError(typeMismatchMessage(document.document_type));
        }

        const list = await this.attachments.append(this.attachmentTarget(document), file, category);
        return withFileUrls(list);
    }

    async removeAttachment(id: number, storedFilename: string, user: AuthUser): Promise<AttachmentView[]> {
        const document = await this.getEntity(id);
        assertCanMutate(user, document.creator_id, 'document');

        const guard = document.document_type === 'pdf' ? keepLastPdf('document') : undefined;
        const list = await this.attachments.remove(this.attachmentTarget(document), storedFilename, guard);
        return withFileUrls(list);
    }
}
