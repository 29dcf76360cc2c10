import Container from 'typedi';
import { Dictionary, DictionaryValue, Project } from '../../src/entities';
import { FAQ_MODULE_CODE, loadFaqModules, SeedService } from '../../src/services/persistence/SeedService';
import { startTestServer, TestServer } from './helpers';

describe('seeding', () => {
    let server: TestServer;

    beforeAll(async () => {
        server = await startTestServer({ DEFAULT_ADMIN_USERNAME: 'root', DEFAULT_ADMIN_PASSWORD: 'test-password' });
    });

    afterAll(async () => {
        await server.close();
    });

    it('creates the default admin only once', async () => {
        const seeder = Container.get(SeedService);

        const admin = await seeder.ensureDefaultAdmin();
        expect(admin?.username).toBe('root');
        expect(admin?.role).toBe('admin');
        expect(await seeder.ensureDefaultAdmin()).toBeNull();

        const login = await server.anonymous.post('/api/auth/login', { username: 'root', password: 'test-password' });
        expect(login.status).toBe(200);
        expect(login.data.user.role).toBe('admin');
    });

    it('reads the FAQ module list', async () => {
        const modules = await loadFaqModules();
        expect(modules).toHaveLength(8);
        expect(modules[0]).toEqual({ key: '1', value: '患者管理', description: '患者相关常见问题模块' });
    });

    it('creates the FAQ module dictionary and a default project, then adds nothing more', async () => {
        const seeder = Container.get(SeedService);

        const first = await seeder.ensureFaqModuleDictionary();
        expect(first.added).toBe(8);

        const project = await server.dataSource.getRepository(Project).findOneByOrFail({ id: first.projectId });
        expect(project.name).toBe('默认项目');

        const second = await seeder.ensureFaqModuleDictionary();
        expect(second).toEqual({ dictionaryId: first.dictionaryId, projectId: first.projectId, added: 0 });

        const dictionary = await server.dataSource.getRepository(Dictionary).findOneByOrFail({ code: FAQ_MODULE_CODE });
        expect(dictionary.id).toBe(first.dictionaryId);
        expect(await server.dataSource.getRepository(DictionaryValue).countBy({ dictionary_id: dictionary.id })).toBe(8);
    });

    it('only adds missing module keys', async () => {
        const seeder = Container.get(SeedService);
        const result = await seeder.ensureFaqModuleDictionary([
            { key: '1', value: '患者管理' },
            { key: '9', value: '移动护理', description: null }
        ]);

        expect(result.added).toBe(1);
        const added = await server.dataSource.getRepository(DictionaryValue)
            .findOneByOrFail({ dictionary_id: result.dictionaryId, key: '9' });
        expect(added).toMatchObject({ value: '移动护理', description: null, order_index: 1 });
    });
});
