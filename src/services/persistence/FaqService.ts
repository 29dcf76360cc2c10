import { Inject, Service } from 'typedi';
import { DataSource, Repository } from 'typeorm';
import { Faq } from '../../entities';
import { DATA_SOURCE } from '../../lib/container';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { AttachmentView, UploadedFile } from '../../types/attachment.types';
import type { AuthUser, DocumentType, FaqContentType, Paginated } from '../../types/domain.types';
import { serializeAttachments, withFileUrls } from '../../utils/attachments';
import { isPdfFile } from '../../utils/fileTypes';
import { assertCanMutate } from '../../utils/permissions';
import type { CreateFaqInput, ListFaqsQuery, UpdateFaqInput } from '../../validation/document.schemas';
import { AttachmentService, AttachmentTarget } from '../storage/AttachmentService';
import { FileStorageService } from '../storage/FileStorageService';
import { CLEARED_LEGACY_COLUMNS, keepLastPdf, readAttachments } from './legacyFiles';
import { likePattern, pageWindow, toPage } from './pagination';
import { updateIfVersion } from './versioned';

const log = logger.child('FAQs');

export interface FaqView {
    id: number;
    title: string;
    description: string | null;
    module: string | null;
    person: string | null;
    document_type: DocumentType;
    content_type: FaqContentType;
    rich_content: string | null;
    attachments: AttachmentView[];
    creator_id: number | null;
    version: number;
    created_at: Date;
    updated_at: Date;
}

export function toFaqView(faq: Faq): FaqView {
    return {
        id: faq.id,
        title: faq.title,
        description: faq.description,
        module: faq.module,
        person: faq.person,
        document_type: faq.document_type,
        content_type: faq.content_type,
        rich_content: faq.rich_content,
        attachments: withFileUrls(readAttachments(faq)),
        creator_id: faq.creator_id,
        version: faq.version,
        created_at: faq.created_at,
        updated_at: faq.updated_at
    };
}

/**
 * FAQ entries are either rich text or a single PDF; PDF entries may gain
 * further PDF attachments later but never lose the last one.
 */
@Service()
export class FaqService {
    private readonly faqs: Repository<Faq>;

    constructor(
        @Inject(DATA_SOURCE) private readonly dataSource: DataSource,
        private readonly attachments: AttachmentService,
        private readonly storage: FileStorageService
    ) {
        this.faqs = dataSource.getRepository(Faq);
    }

    async getEntity(id: number): Promise<Faq> {
        const faq = await this.faqs.findOneBy({ id });
        if (!faq) throw new NotFoundError(`FAQ not found: ${id}`);
        return faq;
    }

    async list(query: ListFaqsQuery): Promise<Paginated<FaqView>> {
        const qb = this.faqs.createQueryBuilder('faq')
            .orderBy('faq.created_at', 'DESC')
            .addOrderBy('faq.id', 'DESC');

        if (query.keyword) {
            qb.andWhere(
                "(faq.title LIKE :kw ESCAPE '\\' OR faq.description LIKE :kw ESCAPE '\\' OR faq.rich_content LIKE :kw ESCAPE '\\')",
                { kw: likePattern(query.keyword) }
            );
        }
        if (query.module) qb.andWhere('faq.module = :module', { module: query.module });
        if (query.person) qb.andWhere('faq.person = :person', { person: query.person });
        if (query.content_type) qb.andWhere('faq.content_type = :contentType', { contentType: query.content_type });

        const { skip, take } = pageWindow(query);
        const [rows, total] = await qb.skip(skip).take(take).getManyAndCount();
        return toPage(rows.map(toFaqView), total, query);
    }

    async get(id: number): Promise<FaqView> {
        return toFaqView(await this.getEntity(id));
    }

    async create(input: CreateFaqInput, files: UploadedFile[], user: AuthUser): Promise<FaqView> {
        if (input.content_type === 'rich_text') {
            if (!input.rich_content) {
                throw new ValidationError('rich_content is required for rich text FAQs');
            }
            if (files.length > 0 || input.clipboard_data) {
                throw new ValidationError('Rich text FAQs do not take file uploads');
            }
        } else {
            if (input.clipboard_data) {
                throw new ValidationError('Attachment FAQs take a PDF file, not clipboard data');
            }
            if (files.length !== 1) {
                throw new ValidationError('Attachment FAQs require exactly one PDF file');
            }
            if (!isPdfFile(files[0].originalName, files[0].mimeType)) {
                throw new ValidationError(`Only PDF files are accepted: ${files[0].originalName}`);
            }
        }

        const faq = await this.faqs.save(this.faqs.create({
            title: input.title,
            description: input.description ?? null,
            module: input.module ?? null,
            person: input.person ?? null,
            document_type: 'pdf',
            content_type: input.content_type,
            rich_content: input.content_type === 'rich_text' ? input.rich_content ?? null : null,
            attachments: null,
            creator_id: user.id
        }));

        if (files.length === 0) {
            log.info('FAQ created', { faqId: faq.id, contentType: faq.content_type, userId: user.id });
            return toFaqView(faq);
        }

        try {
            const stored = await this.storage.save('faqs', faq.id, files[0]);
            faq.attachments = serializeAttachments([stored]);
            const saved = await this.faqs.save(faq);
            log.info('FAQ created', { faqId: saved.id, contentType: saved.content_type, userId: user.id });
            return toFaqView(saved);
        } catch (error) {
            await this.storage.removeOwnerDirectory('faqs', faq.id);
            await this.faqs.delete({ id: faq.id });
            throw error;
        }
    }

    async update(id: number, input: UpdateFaqInput, user: AuthUser): Promise<FaqView> {
        const faq = await this.getEntity(id);
        assertCanMutate(user, faq.creator_id, 'FAQ');

        const changes: Partial<Pick<Faq, 'rich_content' | 'title' | 'description' | 'module' | 'person'>> = {};
        if (input.rich_content !== undefined) {
            if (faq.content_type === 'rich_text' && !input.rich_content) {
                throw new ValidationError('rich_content is required for rich text FAQs');
            }
            changes.rich_content = input.rich_content;
        }
        if (input.title !== undefined) changes.title = input.title;
        if (input.description !== undefined) changes.description = input.description;
        if (input.module !== undefined) changes.module = input.module;
        if (input.person !== undefined) changes.person = input.person;

        if (Object.keys(changes).length > 0) {
            await this.faqs.update({ id }, changes);
        }
        return toFaqView(await this.getEntity(id));
    }

    async delete(id: number, user: AuthUser): Promise<void> {
        const faq = await this.getEntity(id);
        assertCanMutate(user, faq.creator_id, 'FAQ');

        const files = readAttachments(faq);
        await this.faqs.delete({ id });
        for (const file of files) {
            await this.storage.remove(file.file_path);
        }
        await this.storage.removeOwnerDirectory('faqs', id);
        log.info('FAQ deleted', { faqId: id, userId: user.id });
    }

    private attachmentTarget(faq: Faq): AttachmentTarget {
        return {
            area: 'faqs',
            ownerId: faq.id,
            label: 'FAQ',
            current: readAttachments(faq),
            persist: list => updateIfVersion(this.dataSource, Faq, faq.id, faq.version, {
                attachments: serializeAttachments(list),
                ...CLEARED_LEGACY_COLUMNS
            })
        };
    }

    async addAttachment(id: number, file: UploadedFile, user: AuthUser): Promise<AttachmentView[]> {
        const faq = await this.getEntity(id);
        assertCanMutate(user, faq.creator_id, 'FAQ');
        if (faq.content_type === 'rich_text') {
            throw new ValidationError('Rich text FAQs do not take attachments');
        }
        if (!isPdfFile(file.originalName, file.mimeType)) {
            throw new ValidationError('Only PDF files can be attached to a FAQ');
        }

        const list = await this.attachments.append(this.attachmentTarget(faq), file);
        return withFileUrls(list);
    }

    async removeAttachment(id: number, storedFilename: string, user: AuthUser): Promise<AttachmentView[]> {
        const faq = await this.getEntity(id);
        assertCanMutate(user, faq.creator_id, 'FAQ');

        const guard = faq.content_type === 'attachment' ? keepLastPdf('FAQ') : undefined;
        const list = await this.attachments.remove(this.attachmentTarget(faq), storedFilename, guard);
        return withFileUrls(list);
    }
}
