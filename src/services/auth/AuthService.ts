import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { Inject, Service } from 'typedi';
import type { AppConfig } from '../../config';
import type { User } from '../../entities';
import { APP_CONFIG } from '../../lib/container';
import { UnauthorizedError } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { AuthUser } from '../../types/domain.types';
import type { LoginInput, RegisterInput } from '../../validation/auth.schemas';
import { PublicUser, toAuthUser, toPublicUser, UserService } from '../persistence/UserService';

const log = logger.child('Auth');

export interface LoginResult {
    access_token: string;
    token_type: 'bearer';
    expires_in: number;
    user: PublicUser;
}

@Service()
export class AuthService {
    constructor(
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        private readonly users: UserService
    ) { }

    /**
     * Accounts without a stored password accept any submitted password.
     */
    async login(input: LoginInput): Promise<LoginResult> {
        const user = await this.users.findByUsername(input.username);
        if (!user || !user.is_active) {
            throw new UnauthorizedError('Incorrect username or password');
        }

        if (user.password_hash) {
            const matches = await bcrypt.compare(input.password ?? '', user.password_hash);
            if (!matches) {
                throw new UnauthorizedError('Incorrect username or password');
            }
        } else {
            log.warn('Passwordless login accepted', undefined, { username: user.username });
        }

        log.info('User logged in', { userId: user.id });
        return {
            access_token: this.issueToken(user),
            token_type: 'bearer',
            expires_in: this.config.tokenTtlSeconds,
            user: toPublicUser(user)
        };
    }

    async register(input: RegisterInput): Promise<PublicUser> {
        const user = await this.users.createUser({
            username: input.username,
            name: input.name,
            password: input.password,
            role: 'user'
        });
        return toPublicUser(user);
    }

    issueToken(user: Pick<User, 'id' | 'username'>): string {
        return jwt.sign({ username: user.username }, this.config.jwtSecret, {
            algorithm: 'HS256',
            subject: String(user.id),
            expiresIn: this.config.tokenTtlSeconds
        });
    }

    /**
     * Resolves a bearer token to a live, active account.
     */
    async verifyToken(token: string): Promise<AuthUser> {
        let subject: string | undefined;
        try {
            const payload = jwt.verify(token, this.config.jwtSecret, { algorithms: ['HS256'] });
            subject = typeof payload === 'string' ? undefined : payload.sub;
        } catch (error) {
            log.debug('Rejected token', { reason: error instanceof Error ? error.message : String(error) });
            throw new UnauthorizedError('Invalid or expired token');
        }

        const userId = Number(subject);
        if (!Number.isInteger(userId) || userId <= 0) {
            throw new UnauthorizedError('Invalid or expired token');
        }

        const user = await this.users.getUser(userId);
        if (!user || !user.is_active) {
            throw new UnauthorizedError('User not found or inactive');
        }
        return toAuthUser(user);
    }
}
