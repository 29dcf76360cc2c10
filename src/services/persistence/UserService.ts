import bcrypt from 'bcryptjs';
import { Inject, Service } from 'typedi';
import { DataSource, Repository } from 'typeorm';
import { User } from '../../entities';
import { DATA_SOURCE } from '../../lib/container';
import { ConflictError, NotFoundError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { AuthUser, UserRole } from '../../types/domain.types';
import type { UpdateUserInput } from '../../validation/auth.schemas';

const log = logger.child('Users');

const BCRYPT_ROUNDS = 10;

export interface PublicUser {
    id: number;
    username: string;
    name: string;
    role: UserRole;
    is_active: boolean;
    has_password: boolean;
    created_at: Date;
    updated_at: Date;
}

export interface NewUser {
    username: string;
    name: string;
    password?: string | null;
    role?: UserRole;
}

export function toPublicUser(user: User): PublicUser {
    return {
        id: user.id,
        username: user.username,
        name: user.name,
        role: user.role,
        is_active: user.is_active,
        has_password: !!user.password_hash,
        created_at: user.created_at,
        updated_at: user.updated_at
    };
}

export function toAuthUser(user: User): AuthUser {
    return { id: user.id, username: user.username, name: user.name, role: user.role };
}

/** An empty or missing password yields a passwordless account */
export async function hashPassword(password: string | null | undefined): Promise<string | null> {
    return password ? bcrypt.hash(password, BCRYPT_ROUNDS) : null;
}

@Service()
export class UserService {
    private readonly users: Repository<User>;

    constructor(@Inject(DATA_SOURCE) dataSource: DataSource) {
        this.users = dataSource.getRepository(User);
    }

    async getUser(id: number): Promise<User | null> {
        return this.users.findOneBy({ id });
    }

    async findByUsername(username: string): Promise<User | null> {
        return this.users.findOneBy({ username });
    }

    async countUsers(): Promise<number> {
        return this.users.count();
    }

    async listUsers(): Promise<PublicUser[]> {
        const users = await this.users.find({ order: { id: 'ASC' } });
        return users.map(toPublicUser);
    }

    async createUser(input: NewUser): Promise<User> {
        if (await this.findByUsername(input.username)) {
            throw new ConflictError(`Username already exists: ${input.username}`);
        }

        const user = this.users.create({
            username: input.username,
            name: input.name,
            password_hash: await hashPassword(input.password),
            role: input.role ?? 'user',
            is_active: true
        });
        const saved = await this.users.save(user);
        log.info('Created user', { userId: saved.id, username: saved.username, role: saved.role });
        return saved;
    }

    async updateUser(id: number, updates: UpdateUserInput): Promise<PublicUser> {
        const user = await this.getUser(id);
        if (!user) throw new NotFoundError(`User not found: ${id}`);

        if (updates.name !== undefined) user.name = updates.name;
        if (updates.role !== undefined) user.role = updates.role;
        if (updates.is_active !== undefined) user.is_active = updates.is_active;
        if (updates.password !== undefined) user.password_hash = await hashPassword(updates.password);

        const saved = await this.users.save(user);
        log.info('Updated user', { userId: id, fields: Object.keys(updates) });
        return toPublicUser(saved);
    }
}
