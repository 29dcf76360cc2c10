import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import Container from 'typedi';
import type { DataSource } from 'typeorm';
import { createApp, initializeContext } from '../../src/app';
import { AppConfig, loadConfig } from '../../src/config';
import type { User } from '../../src/entities';
import { AuthService } from '../../src/services/auth/AuthService';
import { UserService } from '../../src/services/persistence/UserService';
import type { UserRole } from '../../src/types/domain.types';

export interface TestServer {
    baseUrl: string;
    config: AppConfig;
    dataSource: DataSource;
    /** Client without credentials */
    anonymous: AxiosInstance;
    client(token: string): AxiosInstance;
    close(): Promise<void>;
}

export interface TestUser {
    user: User;
    token: string;
    api: AxiosInstance;
}

function httpClient(baseURL: string, token?: string): AxiosInstance {
    return axios.create({
        baseURL,
        headers: token ? { Authorization: `Bearer ${token}` } : {},
        // Tests assert on status codes themselves
        validateStatus: () => true
    });
}

/**
 * Runs the app on an ephemeral port against in-memory SQLite and a
 * throwaway upload directory.
 */
export async function startTestServer(env: Record<string, string> = {}): Promise<TestServer> {
    const uploadDir = await fs.mkdtemp(path.join(os.tmpdir(), 'interface-docs-'));
    const config = loadConfig({
        NODE_ENV: 'test',
        DATABASE_PATH: ':memory:',
        UPLOAD_DIR: uploadDir,
        JWT_SECRET: 'test-secret',
        ...env
    });

    const context = await initializeContext(config);
    const server: Server = await new Promise(resolve => {
        const listening = createApp(context).listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
        throw new Error('Test server did not bind a TCP port');
    }
    const baseUrl = `http://127.0.0.1:${address.port}`;

    return {
        baseUrl,
        config,
        dataSource: context.dataSource,
        anonymous: httpClient(baseUrl),
        client: token => httpClient(baseUrl, token),
        close: async () => {
            await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
            await context.dataSource.destroy();
            await fs.rm(uploadDir, { recursive: true, force: true });
        }
    };
}

export async function createTestUser(
    server: TestServer,
    username: string,
    role: UserRole = 'user',
    password?: string
): Promise<TestUser> {
    const user = await Container.get(UserService).createUser({ username, name: username, role, password });
    const token = Container.get(AuthService).issueToken(user);
    return { user, token, api: server.client(token) };
}

export function pdfBytes(size = 1024): Buffer {
    const buffer = Buffer.alloc(size, 0x20);
    buffer.write('%PDF-1.4\n', 0, 'latin1');
    return buffer;
}

export function pngBytes(): Buffer {
    return Buffer.from('89504e470d0a1a0a0000000d49484452', 'hex');
}

export function fileForm(field: string, filename: string, bytes: Buffer, mimeType: string, fields: Record<string, string> = {}): FormData {
    const form = new FormData();
    for (const [key, value] of Object.entries(fields)) {
        form.append(key, value);
    }
    form.append(field, new Blob([new Uint8Array(bytes)], { type: mimeType }), filename);
    return form;
}
