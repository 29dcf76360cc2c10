/**
 * Logger Utility
 *
 * Level-filtered console logging shared by every module.
 * - LOG_LEVEL selects the threshold (debug | info | warn | error | silent)
 * - Without LOG_LEVEL, debug output is only shown when NODE_ENV=development
 * - `child(scope)` prefixes every line with a module tag
 *
 * Usage:
 *   import { logger } from '../lib/logger';
 *   const log = logger.child('Projects');
 *   log.info('Project created', { projectId: 3 });
 *   log.warn('Attachment file already gone', error, { filePath });
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

const LEVEL_ORDER = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
} as const;

type Threshold = keyof typeof LEVEL_ORDER;

function isThreshold(value: string): value is Threshold {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveThreshold(): number {
    const configured = process.env.LOG_LEVEL?.toLowerCase();
    if (configured && isThreshold(configured)) {
        return LEVEL_ORDER[configured];
    }
    return process.env.NODE_ENV === 'development' ? LEVEL_ORDER.debug : LEVEL_ORDER.info;
}

export class Logger {
    constructor(
        private readonly scope?: string,
        private readonly threshold: number = resolveThreshold()
    ) { }

    child(scope: string): Logger {
        return new Logger(this.scope ? `${this.scope}:${scope}` : scope, this.threshold);
    }

    /**
     * Detailed diagnostics; hidden unless the threshold is debug.
     */
    debug(message: string, meta?: LogMeta): void {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: LogMeta): void {
        this.write('info', message, meta);
    }

    /**
     * @param error - Optional error; its message and stack are printed with the metadata
     */
    warn(message: string, error?: unknown, meta?: LogMeta): void {
        this.write('warn', message, this.describe(error, meta));
    }

    /**
     * @param error - Optional error; its message and stack are printed with the metadata
     */
    error(message: string, error?: unknown, meta?: LogMeta): void {
        this.write('error', message, this.describe(error, meta));
    }

    log(level: LogLevel, message: string, meta?: LogMeta): void {
        switch (level) {
            case 'debug':
                this.debug(message, meta);
                break;
            case 'info':
                this.info(message, meta);
                break;
            case 'warn':
                this.warn(message, undefined, meta);
                break;
            case 'error':
                this.error(message, undefined, meta);
                break;
        }
    }

    private describe(error: unknown, meta?: LogMeta): LogMeta | undefined {
        if (error instanceof Error) {
            return { message: error.message, stack: error.stack, ...meta };
        }
        if (error !== undefined && error !== null) {
            return { error, ...meta };
        }
        return meta;
    }

    private write(level: LogLevel, message: string, meta?: LogMeta): void {
        if (LEVEL_ORDER[level] < this.threshold) return;

        const tag = this.scope ? ` [${this.scope}]` : '';
        const line = `${new Date().toISOString()} [${level.toUpperCase()}]${tag} ${message}`;
        const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

        if (meta && Object.keys(meta).length > 0) {
            sink(line, meta);
        } else {
            sink(line);
        }
    }
}

export const logger = new Logger();
