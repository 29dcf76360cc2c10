import path from 'path';
import { loadConfig, parseDuration } from './index';

describe('parseDuration', () => {
    it('reads bare seconds and unit suffixes', () => {
        expect(parseDuration('3600')).toBe(3600);
        expect(parseDuration('45m')).toBe(2700);
        expect(parseDuration('12H')).toBe(43200);
        expect(parseDuration('30d')).toBe(2592000);
    });

    it('rejects zero and unknown formats', () => {
        expect(parseDuration('0')).toBeNull();
        expect(parseDuration('2w')).toBeNull();
        expect(parseDuration('soon')).toBeNull();
    });
});

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig({ JWT_SECRET: 'test-secret' });

        expect(config.env).toBe('development');
        expect(config.port).toBe(8000);
        expect(config.databasePath).toBe(path.resolve('data/interface-docs.sqlite'));
        expect(config.uploadDir).toBe(path.resolve('uploads'));
        expect(config.maxUploadBytes).toBe(50 * 1024 * 1024);
        expect(config.tokenTtlSeconds).toBe(2592000);
        expect(config.corsOrigin).toBe('*');
        expect(config.defaultAdmin).toEqual({ username: 'admin', password: undefined });
    });

    it('keeps an in-memory database path as is', () => {
        expect(loadConfig({ DATABASE_PATH: ':memory:', JWT_SECRET: 'test-secret' }).databasePath).toBe(':memory:');
    });

    it('falls back to a development secret outside production', () => {
        expect(loadConfig({ NODE_ENV: 'test', JWT_SECRET: '  ' }).jwtSecret).toBe('development-only-secret');
    });

    it('requires a secret in production', () => {
        expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('Invalid configuration: JWT_SECRET is required in production');
    });

    it('reports invalid values', () => {
        expect(() => loadConfig({ PORT: 'eighty', JWT_SECRET: 'test-secret' })).toThrow(/^Invalid configuration: PORT: /);
        expect(() => loadConfig({ TOKEN_EXPIRES_IN: 'forever', JWT_SECRET: 'test-secret' }))
            .toThrow('Invalid configuration: TOKEN_EXPIRES_IN "forever" is not a duration like 3600, 45m, 12h or 30d');
    });

    it('converts the upload limit to bytes', () => {
        expect(loadConfig({ MAX_UPLOAD_MB: '1.5', JWT_SECRET: 'test-secret' }).maxUploadBytes).toBe(1572864);
    });
});
