import fs from 'fs';
import path from 'path';
import Container from 'typedi';
import { ProjectService } from '../../src/services/persistence/ProjectService';
import { toAuthUser } from '../../src/services/persistence/UserService';
import { createTestUser, fileForm, pdfBytes, startTestServer, TestServer, TestUser } from './helpers';

const projectBody = {
    name: 'Outpatient HIS',
    manager: 'Zhang Wei',
    contact_info: 'ext. 1001',
    description: 'Outpatient registration and billing',
    documents: [{ name: 'Interface spec', version: '1.2', update_date: '2024-05-01' }]
};

describe('projects API', () => {
    let server: TestServer;
    let admin: TestUser;
    let owner: TestUser;
    let other: TestUser;

    beforeAll(async () => {
        server = await startTestServer({ MAX_UPLOAD_MB: '3' });
        admin = await createTestUser(server, 'admin', 'admin');
        owner = await createTestUser(server, 'owner');
        other = await createTestUser(server, 'other');
    });

    afterAll(async () => {
        await server.close();
    });

    async function createProject(user: TestUser, name = projectBody.name): Promise<number> {
        const res = await user.api.post('/api/projects', { ...projectBody, name });
        expect(res.status).toBe(201);
        return res.data.id;
    }

    it('creates, reads, lists and updates a project', async () => {
        const id = await createProject(owner, 'Inpatient EMR');

        const detail = await owner.api.get(`/api/projects/${id}`);
        expect(detail.status).toBe(200);
        expect(detail.data).toMatchObject({
            name: 'Inpatient EMR',
            creator_id: owner.user.id,
            documents: projectBody.documents,
            attachments: [],
            interfaces_count: 0,
            dictionaries_count: 0
        });

        const list = await other.api.get('/api/projects', { params: { keyword: 'Inpatient' } });
        expect(list.status).toBe(200);
        expect(list.data.total).toBe(1);
        expect(list.data.page).toBe(1);
        expect(list.data.page_size).toBe(20);
        expect(list.data.items[0].id).toBe(id);

        const updated = await owner.api.put(`/api/projects/${id}`, { manager: 'Li Na' });
        expect(updated.status).toBe(200);
        expect(updated.data.manager).toBe('Li Na');
        expect(updated.data.name).toBe('Inpatient EMR');
    });

    it('rejects an invalid body', async () => {
        const res = await owner.api.post('/api/projects', { name: '' });
        expect(res.status).toBe(400);
    });

    it('returns 404 for unknown projects and 400 for malformed ids', async () => {
        expect((await owner.api.get('/api/projects/99999')).status).toBe(404);
        const malformed = await owner.api.get('/api/projects/abc');
        expect(malformed.status).toBe(400);
        expect(malformed.data.error).toBe('Invalid id: abc');
    });

    it('uploads a PDF and deletes it by stored filename', async () => {
        const id = await createProject(owner);

        const upload = await owner.api.post(
            `/api/projects/${id}/attachments`,
            fileForm('file', 'spec.pdf', pdfBytes(2 * 1024 * 1024), 'application/pdf')
        );
        expect(upload.status).toBe(200);
        expect(upload.data.attachments).toHaveLength(1);

        const [attachment] = upload.data.attachments;
        expect(attachment.filename).toBe('spec.pdf');
        expect(attachment.file_size).toBe(2 * 1024 * 1024);
        expect(attachment.mime_type).toBe('application/pdf');
        expect(attachment.stored_filename).toMatch(/^\d+_[0-9a-f]{6}_spec\.pdf$/);
        expect(attachment.file_path).toBe(`uploads/projects/${id}/${attachment.stored_filename}`);
        expect(attachment.file_url).toBe(`/uploads/projects/${id}/${attachment.stored_filename}`);

        const onDisk = path.join(server.config.uploadDir, 'projects', String(id), attachment.stored_filename);
        expect(fs.existsSync(onDisk)).toBe(true);

        const served = await owner.api.get(attachment.file_url, { responseType: 'arraybuffer' });
        expect(served.status).toBe(200);

        const removed = await owner.api.delete(`/api/projects/${id}/attachments/${attachment.stored_filename}`);
        expect(removed.status).toBe(200);
        expect(removed.data.attachments).toEqual([]);
        expect(fs.existsSync(onDisk)).toBe(false);
    });

    it('keeps earlier attachments when adding another', async () => {
        const id = await createProject(owner);
        const first = await owner.api.post(`/api/projects/${id}/attachments`, fileForm('file', 'a.pdf', pdfBytes(), 'application/pdf'));
        const second = await owner.api.post(`/api/projects/${id}/attachments`, fileForm('file', 'b.pdf', pdfBytes(), 'application/pdf'));

        expect(second.data.attachments.map((entry: { filename: string }) => entry.filename)).toEqual(['a.pdf', 'b.pdf']);

        const removed = await owner.api.delete(`/api/projects/${id}/attachments/${second.data.attachments[1].stored_filename}`);
        expect(removed.data.attachments).toEqual(first.data.attachments);
    });

    it('keeps an attachment added after the update read the project', async () => {
        const id = await createProject(owner, 'Pharmacy');
        const service = Container.get(ProjectService);
        const stale = await service.getEntity(id);

        const added = await owner.api.post(`/api/projects/${id}/attachments`, fileForm('file', 'late.pdf', pdfBytes(), 'application/pdf'));
        expect(added.status).toBe(200);

        const getEntity = jest.spyOn(service, 'getEntity').mockResolvedValueOnce(stale);
        try {
            const updated = await service.update(id, { name: 'Pharmacy v2' }, toAuthUser(owner.user));
            expect(updated.name).toBe('Pharmacy v2');
            expect(updated.attachments.map(entry => entry.filename)).toEqual(['late.pdf']);
        } finally {
            getEntity.mockRestore();
        }

        const detail = await owner.api.get(`/api/projects/${id}`);
        expect(detail.data.name).toBe('Pharmacy v2');
        expect(detail.data.contact_info).toBe(projectBody.contact_info);
        expect(detail.data.attachments).toEqual(added.data.attachments);
    });

    it('only accepts PDFs', async () => {
        const id = await createProject(owner);
        const res = await owner.api.post(`/api/projects/${id}/attachments`, fileForm('file', 'notes.txt', Buffer.from('hello'), 'text/plain'));

        expect(res.status).toBe(400);
        expect(res.data.error).toBe('Only PDF files can be attached to a project');
    });

    it('rejects oversized uploads with 413 and writes nothing', async () => {
        const id = await createProject(owner);
        const res = await owner.api.post(
            `/api/projects/${id}/attachments`,
            fileForm('file', 'huge.pdf', pdfBytes(4 * 1024 * 1024), 'application/pdf')
        );

        expect(res.status).toBe(413);
        expect(fs.existsSync(path.join(server.config.uploadDir, 'projects', String(id)))).toBe(false);
        expect((await owner.api.get(`/api/projects/${id}`)).data.attachments).toEqual([]);
    });

    it('returns 404 when deleting an unknown attachment', async () => {
        const id = await createProject(owner);
        const res = await owner.api.delete(`/api/projects/${id}/attachments/missing.pdf`);
        expect(res.status).toBe(404);
    });

    it('lets only the owner or an admin change a project', async () => {
        const id = await createProject(owner);

        const denied = await other.api.delete(`/api/projects/${id}`);
        expect(denied.status).toBe(403);

        const deniedUpload = await other.api.post(`/api/projects/${id}/attachments`, fileForm('file', 'x.pdf', pdfBytes(), 'application/pdf'));
        expect(deniedUpload.status).toBe(403);

        const allowed = await admin.api.delete(`/api/projects/${id}`);
        expect(allowed.status).toBe(204);
        expect((await owner.api.get(`/api/projects/${id}`)).status).toBe(404);
    });

    it('cascades deletes to interfaces and dictionaries and removes files', async () => {
        const id = await createProject(owner);
        await owner.api.post(`/api/projects/${id}/attachments`, fileForm('file', 'spec.pdf', pdfBytes(), 'application/pdf'));
        const iface = await owner.api.post('/api/interfaces', {
            project_id: id,
            name: 'Patient lookup',
            code: 'CASCADE_IFACE',
            interface_type: 'api',
            parameters: [{ param_type: 'input', field_name: 'patient_id', name: 'Patient ID', data_type: 'varchar' }]
        });
        const dictionary = await owner.api.post('/api/dictionaries', {
            project_id: id,
            name: 'Gender',
            code: 'CASCADE_DICT',
            values: [{ key: '1', value: 'Male' }]
        });
        expect((await owner.api.get(`/api/projects/${id}`)).data).toMatchObject({ interfaces_count: 1, dictionaries_count: 1 });

        expect((await owner.api.delete(`/api/projects/${id}`)).status).toBe(204);

        expect((await owner.api.get(`/api/interfaces/${iface.data.id}`)).status).toBe(404);
        expect((await owner.api.get(`/api/dictionaries/${dictionary.data.id}`)).status).toBe(404);
        expect(fs.existsSync(path.join(server.config.uploadDir, 'projects', String(id)))).toBe(false);
    });
});
