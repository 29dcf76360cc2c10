import { ErrorRequestHandler, Request, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { AppError, isUniqueViolation, NotFoundError, ValidationError } from './errors';
import { logger } from './logger';

const log = logger.child('HTTP');

export interface ErrorBody {
    error: string;
    details?: unknown;
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
    if (error instanceof AppError) {
        const body: ErrorBody = { error: error.message };
        if (error.details !== undefined) body.details = error.details;
        return { status: error.status, body };
    }

    if (error instanceof ZodError) {
        const message = error.issues
            .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
            .join('; ');
        return { status: 400, body: { error: message, details: error.issues } };
    }

    if (error instanceof multer.MulterError) {
        if (error.code === 'LIMIT_FILE_SIZE') {
            return { status: 413, body: { error: 'File exceeds the maximum upload size' } };
        }
        return { status: 400, body: { error: `Upload rejected: ${error.message}` } };
    }

    if (isUniqueViolation(error)) {
        return { status: 409, body: { error: 'A record with the same unique value already exists' } };
    }

    // express.json() failures carry a status of their own
    if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
        return { status: 400, body: { error: 'Malformed JSON body' } };
    }

    log.error('Unhandled error', error);
    return { status: 500, body: { error: error instanceof Error ? error.message : 'Internal server error' } };
}

export function sendError(res: Response, error: unknown): void {
    const { status, body } = toErrorResponse(error);
    res.status(status).json(body);
}

export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
    if (res.headersSent) {
        next(error);
        return;
    }
    sendError(res, error);
};

export function parseId(value: string | undefined, label = 'id'): number {
    const id = Number(value);
    if (!value || !Number.isInteger(id) || id <= 0) {
        throw new ValidationError(`Invalid ${label}: ${value ?? ''}`);
    }
    return id;
}

export function notFoundRoute(req: Request, res: Response): void {
    sendError(res, new NotFoundError(`Route not found: ${req.method} ${req.originalUrl}`));
}
