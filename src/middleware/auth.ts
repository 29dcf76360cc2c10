import '../types/express.types';
import { NextFunction, Request, Response } from 'express';
import Container from 'typedi';
import { UnauthorizedError } from '../lib/errors';
import { sendError } from '../lib/http';
import { AuthService } from '../services/auth/AuthService';
import type { AuthUser } from '../types/domain.types';

export function bearerToken(req: Request): string | null {
    const header = req.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) return null;
    const token = header.slice('Bearer '.length).trim();
    return token || null;
}

export const authMiddleware = async (req: Request, res: Response, next: NextFunction) => {
    try {
        const token = bearerToken(req);
        if (!token) {
            throw new UnauthorizedError('Not authenticated');
        }

        req.user = await Container.get(AuthService).verifyToken(token);
        next();
    } catch (error) {
        sendError(res, error);
    }
};

/**
 * The caller set by authMiddleware; throws 401 when the route was mounted without it.
 */
export function requireUser(req: Request): AuthUser {
    if (!req.user) throw new UnauthorizedError();
    return req.user;
}
