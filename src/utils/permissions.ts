import { ForbiddenError } from '../lib/errors';
import type { AuthUser } from '../types/domain.types';

/**
 * Admins may change anything; everyone else only rows they created.
 * Rows without a creator are admin-only.
 */
export function canMutate(user: AuthUser, creatorId: number | null | undefined): boolean {
    if (user.role === 'admin') return true;
    if (creatorId === null || creatorId === undefined) return false;
    return creatorId === user.id;
}

export function assertCanMutate(user: AuthUser, creatorId: number | null | undefined, resource: string): void {
    if (!canMutate(user, creatorId)) {
        throw new ForbiddenError(`You do not have permission to modify this ${resource}`);
    }
}

export function assertAdmin(user: AuthUser): void {
    if (user.role !== 'admin') {
        throw new ForbiddenError('Administrator role required');
    }
}
