import { createTestUser, startTestServer, TestServer, TestUser } from './helpers';

describe('dictionaries API', () => {
    let server: TestServer;
    let owner: TestUser;
    let other: TestUser;
    let admin: TestUser;
    let projectId: number;

    beforeAll(async () => {
        server = await startTestServer();
        owner = await createTestUser(server, 'dict-owner');
        other = await createTestUser(server, 'dict-other');
        admin = await createTestUser(server, 'dict-admin', 'admin');
        const project = await owner.api.post('/api/projects', { name: 'Code tables', manager: 'Qian Yu', contact_info: 'ext. 4004' });
        projectId = project.data.id;
    });

    afterAll(async () => {
        await server.close();
    });

    it('creates a dictionary with ordered values', async () => {
        const res = await owner.api.post('/api/dictionaries', {
            project_id: projectId,
            name: 'Gender',
            code: 'GENDER',
            description: 'GB/T 2261.1',
            values: [
                { key: '1', value: 'Male' },
                { key: '2', value: 'Female' },
                { key: '9', value: 'Unspecified', description: 'Not stated' }
            ]
        });

        expect(res.status).toBe(201);
        expect(res.data.values.map((value: { key: string; order_index: number }) => [value.key, value.order_index])).toEqual([
            ['1', 0],
            ['2', 1],
            ['9', 2]
        ]);

        const byCode = await other.api.get('/api/dictionaries/code/GENDER');
        expect(byCode.status).toBe(200);
        expect(byCode.data.id).toBe(res.data.id);
        expect(byCode.data.values[2].description).toBe('Not stated');
    });

    it('rejects a duplicate code', async () => {
        await owner.api.post('/api/dictionaries', { project_id: projectId, name: 'Marital status', code: 'MARITAL' });
        const again = await owner.api.post('/api/dictionaries', { project_id: projectId, name: 'Marital status copy', code: 'MARITAL' });

        expect(again.status).toBe(409);
        expect(again.data.error).toBe('Dictionary code already exists: MARITAL');
    });

    it('returns 404 for a missing project or code', async () => {
        const missing = await owner.api.post('/api/dictionaries', { project_id: 99999, name: 'Orphan', code: 'ORPHAN' });
        expect(missing.status).toBe(404);
        expect((await owner.api.get('/api/dictionaries/code/NOPE')).status).toBe(404);
    });

    it('adds and deletes values', async () => {
        const created = await owner.api.post('/api/dictionaries', {
            project_id: projectId,
            name: 'Blood type',
            code: 'BLOOD_TYPE',
            values: [{ key: 'A', value: 'Type A' }]
        });
        const id = created.data.id;

        const added = await owner.api.post(`/api/dictionaries/${id}/values`, { key: 'B', value: 'Type B' });
        expect(added.status).toBe(201);
        expect(added.data.order_index).toBe(1);

        expect((await other.api.post(`/api/dictionaries/${id}/values`, { key: 'O', value: 'Type O' })).status).toBe(403);

        const values = await owner.api.get(`/api/dictionaries/${id}/values`);
        expect(values.data.map((value: { key: string }) => value.key)).toEqual(['A', 'B']);

        expect((await other.api.delete(`/api/dictionaries/values/${added.data.id}`)).status).toBe(403);
        expect((await owner.api.delete(`/api/dictionaries/values/${added.data.id}`)).status).toBe(204);
        expect((await owner.api.delete(`/api/dictionaries/values/${added.data.id}`)).status).toBe(404);

        const remaining = await owner.api.get(`/api/dictionaries/${id}/values`);
        expect(remaining.data.map((value: { key: string }) => value.key)).toEqual(['A']);
    });

    it('lists project dictionaries with value counts', async () => {
        const project = await owner.api.post('/api/projects', { name: 'Counted', manager: 'Zhou Min', contact_info: 'ext. 5005' });
        await owner.api.post('/api/dictionaries', {
            project_id: project.data.id,
            name: 'Payment type',
            code: 'PAYMENT_TYPE',
            values: [{ key: '01', value: 'Cash' }, { key: '02', value: 'Insurance' }]
        });
        await owner.api.post('/api/dictionaries', { project_id: project.data.id, name: 'Empty', code: 'EMPTY_DICT' });

        const res = await owner.api.get(`/api/projects/${project.data.id}/dictionaries`);
        expect(res.status).toBe(200);
        expect(res.data.map((row: { code: string; values_count: number }) => [row.code, row.values_count])).toEqual([
            ['PAYMENT_TYPE', 2],
            ['EMPTY_DICT', 0]
        ]);

        const paged = await owner.api.get('/api/dictionaries', { params: { project_id: project.data.id, page_size: 1, page: 2 } });
        expect(paged.data).toMatchObject({ total: 2, page: 2, page_size: 1 });
        expect(paged.data.items[0].code).toBe('EMPTY_DICT');
    });

    it('updates and deletes with owner or admin rights', async () => {
        const created = await owner.api.post('/api/dictionaries', { project_id: projectId, name: 'Ward', code: 'WARD' });
        const id = created.data.id;

        expect((await other.api.put(`/api/dictionaries/${id}`, { name: 'Hijacked' })).status).toBe(403);

        const renamed = await owner.api.put(`/api/dictionaries/${id}`, { name: 'Ward list', code: 'WARD_LIST' });
        expect(renamed.status).toBe(200);
        expect(renamed.data).toMatchObject({ name: 'Ward list', code: 'WARD_LIST' });

        const clash = await owner.api.put(`/api/dictionaries/${id}`, { code: 'GENDER' });
        expect(clash.status).toBe(409);

        expect((await admin.api.delete(`/api/dictionaries/${id}`)).status).toBe(204);
        expect((await owner.api.get(`/api/dictionaries/${id}`)).status).toBe(404);
    });
});
