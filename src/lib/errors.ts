import { QueryFailedError } from 'typeorm';

// HTTP-aware error classes thrown by services and mapped to responses in lib/http.ts
export class AppError extends Error {
    constructor(public readonly status: number, message: string, public readonly details?: unknown) {
        super(message);
        this.name = 'AppError';
    }
}

export class ValidationError extends AppError {
    constructor(message: string, details?: unknown) {
        super(400, message, details);
        this.name = 'ValidationError';
    }
}

export class UnauthorizedError extends AppError {
    constructor(message = 'Not authenticated') {
        super(401, message);
        this.name = 'UnauthorizedError';
    }
}

export class ForbiddenError extends AppError {
    constructor(message: string) {
        super(403, message);
        this.name = 'ForbiddenError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super(409, message);
        this.name = 'ConflictError';
    }
}

export class PayloadTooLargeError extends AppError {
    constructor(message: string) {
        super(413, message);
        this.name = 'PayloadTooLargeError';
    }
}

// sql.js surfaces SQLite unique violations as "UNIQUE constraint failed: <table>.<column>"
export function isUniqueViolation(error: unknown): boolean {
    return error instanceof QueryFailedError && /UNIQUE constraint failed/i.test(error.message);
}
