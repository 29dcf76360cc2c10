import { Inject, Service } from 'typedi';
import { DataSource, Repository } from 'typeorm';
import { Dictionary, Interface, Project } from '../../entities';
import { DATA_SOURCE } from '../../lib/container';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { AttachmentView, UploadedFile } from '../../types/attachment.types';
import type { AuthUser, Paginated } from '../../types/domain.types';
import { parseAttachments, parseJsonList, serializeAttachments, withFileUrls } from '../../utils/attachments';
import { isPdfFile } from '../../utils/fileTypes';
import { assertCanMutate } from '../../utils/permissions';
import type { CreateProjectInput, ListProjectsQuery, UpdateProjectInput } from '../../validation/project.schemas';
import { AttachmentService, AttachmentTarget } from '../storage/AttachmentService';
import { FileStorageService } from '../storage/FileStorageService';
import { likePattern, pageWindow, toPage } from './pagination';
import { updateIfVersion } from './versioned';

const log = logger.child('Projects');

export interface ProjectView {
    id: number;
    name: string;
    manager: string;
    contact_info: string;
    description: string | null;
    documents: Record<string, unknown>[];
    attachments: AttachmentView[];
    creator_id: number | null;
    version: number;
    created_at: Date;
    updated_at: Date;
}

export interface ProjectDetail extends ProjectView {
    interfaces_count: number;
    dictionaries_count: number;
}

export function toProjectView(project: Project): ProjectView {
    return {
        id: project.id,
        name: project.name,
        manager: project.manager,
        contact_info: project.contact_info,
        description: project.description,
        documents: parseJsonList(project.documents),
        attachments: withFileUrls(parseAttachments(project.attachments)),
        creator_id: project.creator_id,
        version: project.version,
        created_at: project.created_at,
        updated_at: project.updated_at
    };
}

@Service()
export class ProjectService {
    private readonly projects: Repository<Project>;

    constructor(
        @Inject(DATA_SOURCE) private readonly dataSource: DataSource,
        private readonly attachments: AttachmentService,
        private readonly storage: FileStorageService
    ) {
        this.projects = dataSource.getRepository(Project);
    }

    async getEntity(id: number): Promise<Project> {
        const project = await this.projects.findOneBy({ id });
        if (!project) throw new NotFoundError(`Project not found: ${id}`);
        return project;
    }

    async list(query: ListProjectsQuery): Promise<Paginated<ProjectView>> {
        const qb = this.projects.createQueryBuilder('project').orderBy('project.id', 'DESC');
        if (query.keyword) {
            qb.where(
                "(project.name LIKE :kw ESCAPE '\\' OR project.manager LIKE :kw ESCAPE '\\' OR project.description LIKE :kw ESCAPE '\\')",
                { kw: likePattern(query.keyword) }
            );
        }
        const { skip, take } = pageWindow(query);
        const [rows, total] = await qb.skip(skip).take(take).getManyAndCount();
        return toPage(rows.map(toProjectView), total, query);
    }

    async get(id: number): Promise<ProjectDetail> {
        const project = await this.getEntity(id);
        const [interfacesCount, dictionariesCount] = await Promise.all([
            this.dataSource.getRepository(Interface).countBy({ project_id: id }),
            this.dataSource.getRepository(Dictionary).countBy({ project_id: id })
        ]);
        return { ...toProjectView(project), interfaces_count: interfacesCount, dictionaries_count: dictionariesCount };
    }

    async create(input: CreateProjectInput, user: AuthUser): Promise<ProjectView> {
        const project = this.projects.create({
            name: input.name,
            manager: input.manager,
            contact_info: input.contact_info,
            description: input.description ?? null,
            documents: input.documents?.length ? JSON.stringify(input.documents) : null,
            attachments: null,
            creator_id: user.id
        });
        const saved = await this.projects.save(project);
        log.info('Project created', { projectId: saved.id, userId: user.id });
        return toProjectView(saved);
    }

    async update(id: number, input: UpdateProjectInput, user: AuthUser): Promise<ProjectView> {
        const project = await this.getEntity(id);
        assertCanMutate(user, project.creator_id, 'project');

        // Only the edited columns are written; attachments belong to the attachment endpoints.
        const changes: Partial<Pick<Project, 'name' | 'manager' | 'contact_info' | 'description' | 'documents'>> = {};
        if (input.name !== undefined) changes.name = input.name;
        if (input.manager !== undefined) changes.manager = input.manager;
        if (input.contact_info !== undefined) changes.contact_info = input.contact_info;
        if (input.description !== undefined) changes.description = input.description;
        if (input.documents !== undefined) {
            changes.documents = input.documents?.length ? JSON.stringify(input.documents) : null;
        }

        if (Object.keys(changes).length > 0) {
            await this.projects.update({ id }, changes);
        }
        return toProjectView(await this.getEntity(id));
    }

    async delete(id: number, user: AuthUser): Promise<void> {
        const project = await this.getEntity(id);
        assertCanMutate(user, project.creator_id, 'project');

        await this.projects.delete({ id });
        await this.storage.removeOwnerDirectory('projects', id);
        log.info('Project deleted', { projectId: id, userId: user.id });
    }

    private attachmentTarget(project: Project): AttachmentTarget {
        return {
            area: 'projects',
            ownerId: project.id,
            label: 'project',
            current: parseAttachments(project.attachments),
            persist: list => updateIfVersion(this.dataSource, Project, project.id, project.version, {
                attachments: serializeAttachments(list)
            })
        };
    }

    async addAttachment(id: number, file: UploadedFile, user: AuthUser): Promise<AttachmentView[]> {
        const project = await this.getEntity(id);
        assertCanMutate(user, project.creator_id, 'project');
        if (!isPdfFile(file.originalName, file.mimeType)) {
            throw new ValidationError('Only PDF files can be attached to a project');
        }

        const list = await this.attachments.append(this.attachmentTarget(project), file);
        return withFileUrls(list);
    }

    async removeAttachment(id: number, storedFilename: string, user: AuthUser): Promise<AttachmentView[]> {
        const project = await this.getEntity(id);
        assertCanMutate(user, project.creator_id, 'project');

        const list = await this.attachments.remove(this.attachmentTarget(project), storedFilename);
        return withFileUrls(list);
    }
}
