import { NextFunction, Request, Response } from 'express';
import { logger } from '../lib/logger';

const log = logger.child('HTTP');

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();
    res.on('finish', () => {
        const duration = Date.now() - start;
        const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
        log.log(level, `${req.method} ${req.originalUrl} -> ${res.statusCode} (${duration}ms)`);
    });
    next();
}
