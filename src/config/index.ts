import path from 'path';
import { z } from 'zod';
import { logger } from '../lib/logger';

const DEVELOPMENT_JWT_SECRET = 'development-only-secret';

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    DATABASE_PATH: z.string().min(1).default('data/interface-docs.sqlite'),
    UPLOAD_DIR: z.string().min(1).default('uploads'),
    MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
    JWT_SECRET: z.preprocess(blankToUndefined, z.string().optional()),
    TOKEN_EXPIRES_IN: z.string().default('30d'),
    CORS_ORIGIN: z.string().min(1).default('*'),
    DEFAULT_ADMIN_USERNAME: z.string().min(1).default('admin'),
    DEFAULT_ADMIN_PASSWORD: z.preprocess(blankToUndefined, z.string().optional())
});

export interface AppConfig {
    env: 'development' | 'production' | 'test';
    port: number;
    /** File path of the SQLite database, or `:memory:` */
    databasePath: string;
    /** Absolute path of the upload root served under /uploads */
    uploadDir: string;
    maxUploadBytes: number;
    jwtSecret: string;
    tokenTtlSeconds: number;
    corsOrigin: string;
    defaultAdmin: {
        username: string;
        password?: string;
    };
}

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/**
 * Parses "3600", "45m", "12h" or "30d" into seconds.
 */
export function parseDuration(value: string): number | null {
    const match = /^(\d+)\s*([smhd]?)$/i.exec(value.trim());
    if (!match) return null;
    const amount = Number(match[1]);
    const unit = match[2] ? DURATION_UNITS[match[2].toLowerCase()] : 1;
    return amount > 0 ? amount * unit : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid configuration: ${issues}`);
    }
    const vars = parsed.data;

    const tokenTtlSeconds = parseDuration(vars.TOKEN_EXPIRES_IN);
    if (tokenTtlSeconds === null) {
        throw new Error(`Invalid configuration: TOKEN_EXPIRES_IN "${vars.TOKEN_EXPIRES_IN}" is not a duration like 3600, 45m, 12h or 30d`);
    }

    let jwtSecret = vars.JWT_SECRET;
    if (!jwtSecret) {
        if (vars.NODE_ENV === 'production') {
            throw new Error('Invalid configuration: JWT_SECRET is required in production');
        }
        logger.warn('JWT_SECRET is not set; using the development secret');
        jwtSecret = DEVELOPMENT_JWT_SECRET;
    }

    return {
        env: vars.NODE_ENV,
        port: vars.PORT,
        databasePath: vars.DATABASE_PATH === ':memory:' ? ':memory:' : path.resolve(vars.DATABASE_PATH),
        uploadDir: path.resolve(vars.UPLOAD_DIR),
        maxUploadBytes: Math.floor(vars.MAX_UPLOAD_MB * 1024 * 1024),
        jwtSecret,
        tokenTtlSeconds,
        corsOrigin: vars.CORS_ORIGIN,
        defaultAdmin: {
            username: vars.DEFAULT_ADMIN_USERNAME,
            password: vars.DEFAULT_ADMIN_PASSWORD
        }
    };
}
