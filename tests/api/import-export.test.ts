import * as ExcelJS from 'exceljs';
import { createTestUser, startTestServer, TestServer, TestUser } from './helpers';

describe('import and export API', () => {
    let server: TestServer;
    let owner: TestUser;
    let other: TestUser;
    let projectId: number;

    beforeAll(async () => {
        server = await startTestServer();
        owner = await createTestUser(server, 'export-owner');
        other = await createTestUser(server, 'export-other');

        const project = await owner.api.post('/api/projects', { name: 'Export source', manager: 'He Jun', contact_info: 'ext. 6006' });
        projectId = project.data.id;
        await owner.api.post('/api/interfaces', {
            project_id: projectId,
            name: 'Drug catalogue',
            code: 'DRUG_CATALOGUE',
            interface_type: 'view',
            view_definition: 'SELECT * FROM v_drug',
            parameters: [
                { param_type: 'output', field_name: 'drug_code', name: 'Drug code', data_type: 'varchar' },
                { param_type: 'output', field_name: 'drug_name', name: 'Drug name', data_type: 'string' }
            ]
        });
        await owner.api.post('/api/dictionaries', {
            project_id: projectId,
            name: 'Dosage form',
            code: 'DOSAGE_FORM',
            values: [{ key: 'T', value: 'Tablet' }, { key: 'I', value: 'Injection' }]
        });
    });

    afterAll(async () => {
        await server.close();
    });

    it('exports every interface and dictionary as JSON', async () => {
        const res = await owner.api.get('/api/import-export/export/json');

        expect(res.status).toBe(200);
        expect(res.headers['content-disposition']).toMatch(/^attachment; filename="his_interfaces_\d{8}_\d{6}\.json"$/);
        expect(res.data.interfaces).toHaveLength(1);
        expect(res.data.interfaces[0]).toMatchObject({ code: 'DRUG_CATALOGUE', interface_type: 'view', view_definition: 'SELECT * FROM v_drug' });
        expect(res.data.interfaces[0].parameters.map((row: { field_name: string }) => row.field_name)).toEqual(['drug_code', 'drug_name']);
        expect(res.data.dictionaries[0].values).toEqual([
            { key: 'T', value: 'Tablet', description: null, order_index: 0 },
            { key: 'I', value: 'Injection', description: null, order_index: 1 }
        ]);
        expect(typeof res.data.export_time).toBe('string');
    });

    it('exports a workbook with one sheet per table', async () => {
        const res = await owner.api.get('/api/import-export/export/excel', { responseType: 'arraybuffer' });

        expect(res.status).toBe(200);
        const buffer = Buffer.from(res.data);
        expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');

        const workbook = new ExcelJS.Workbook();
        await workbook.xlsx.load(res.data);
        expect(workbook.worksheets.map(sheet => sheet.name)).toEqual(['接口列表', '参数列表', '字典列表', '字典值']);

        const interfaces = workbook.getWorksheet('接口列表');
        expect(interfaces?.getRow(2).getCell(1).value).toBe('DRUG_CATALOGUE');
        expect(interfaces?.getRow(2).getCell(3).value).toBe('视图接口');
        expect(workbook.getWorksheet('参数列表')?.rowCount).toBe(3);
        expect(workbook.getWorksheet('字典值')?.getRow(3).getCell(3).value).toBe('Injection');
    });

    it('upserts an exported bundle by code', async () => {
        const exported = await owner.api.get('/api/import-export/export/json');
        const bundle = exported.data;
        bundle.interfaces[0].name = 'Drug catalogue v2';
        bundle.interfaces[0].parameters = [bundle.interfaces[0].parameters[0]];
        bundle.interfaces.push({
            code: 'DRUG_STOCK',
            name: 'Drug stock',
            interface_type: 'api',
            parameters: [{ param_type: 'input', field_name: 'drug_code', name: 'Drug code', data_type: 'varchar', required: true }]
        });

        const res = await owner.api.post('/api/import-export/import/json', { project_id: projectId, data: bundle });
        expect(res.status).toBe(200);
        expect(res.data).toEqual({
            interfaces: { created: 1, updated: 1, skipped: 0 },
            dictionaries: { created: 0, updated: 1, skipped: 0 }
        });

        const updated = await owner.api.get('/api/interfaces/code/DRUG_CATALOGUE');
        expect(updated.data.name).toBe('Drug catalogue v2');
        expect(updated.data.parameters.map((row: { field_name: string }) => row.field_name)).toEqual(['drug_code']);

        const created = await owner.api.get('/api/interfaces/code/DRUG_STOCK');
        expect(created.data.creator_id).toBe(owner.user.id);
        expect(created.data.parameters[0].required).toBe(true);

        const dictionary = await owner.api.get('/api/dictionaries/code/DOSAGE_FORM');
        expect(dictionary.data.values.map((value: { key: string }) => value.key)).toEqual(['T', 'I']);
    });

    it('skips rows owned by another user', async () => {
        const exported = await owner.api.get('/api/import-export/export/json');
        const res = await other.api.post('/api/import-export/import/json', { project_id: projectId, data: exported.data });

        expect(res.status).toBe(200);
        expect(res.data).toEqual({
            interfaces: { created: 0, updated: 0, skipped: 2 },
            dictionaries: { created: 0, updated: 0, skipped: 1 }
        });
    });

    it('validates the target project and the bundle', async () => {
        const missing = await owner.api.post('/api/import-export/import/json', { project_id: 99999, data: {} });
        expect(missing.status).toBe(404);

        const malformed = await owner.api.post('/api/import-export/import/json', {
            project_id: projectId,
            data: { interfaces: [{ code: 'NO_NAME', interface_type: 'api' }] }
        });
        expect(malformed.status).toBe(400);
    });
});
