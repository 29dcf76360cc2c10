import { ForbiddenError } from '../lib/errors';
import type { AuthUser } from '../types/domain.types';
import { assertAdmin, assertCanMutate, canMutate } from './permissions';

const admin: AuthUser = { id: 1, username: 'admin', name: 'Admin', role: 'admin' };
const alice: AuthUser = { id: 2, username: 'alice', name: 'Alice', role: 'user' };

describe('canMutate', () => {
    it('lets admins change any row', () => {
        expect(canMutate(admin, 2)).toBe(true);
        expect(canMutate(admin, null)).toBe(true);
    });

    it('limits users to their own rows', () => {
        expect(canMutate(alice, 2)).toBe(true);
        expect(canMutate(alice, 3)).toBe(false);
        expect(canMutate(alice, null)).toBe(false);
    });
});

describe('assertCanMutate', () => {
    it('throws a 403 naming the resource', () => {
        expect(() => assertCanMutate(alice, 1, 'project')).toThrow(ForbiddenError);
        expect(() => assertCanMutate(alice, 1, 'project')).toThrow('You do not have permission to modify this project');
        expect(() => assertCanMutate(alice, 2, 'project')).not.toThrow();
    });
});

describe('assertAdmin', () => {
    it('rejects regular users', () => {
        expect(() => assertAdmin(alice)).toThrow('Administrator role required');
        expect(() => assertAdmin(admin)).not.toThrow();
    });
});
