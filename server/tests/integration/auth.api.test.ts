import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TestServer, readJson, startTestServer } from '../helpers/testServer.js';
import { ApiError, AuthToken, UserProfile } from '../../../shared/types/common.js';

describe('auth API', () => {
    let server: TestServer;

    const post = (path: string, body: unknown): Promise<Response> =>
        fetch(`${server.baseUrl}${path}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
        });

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        server = await startTestServer();
    });

    afterEach(async () => {
        await server.close();
        vi.restoreAllMocks();
    });

    it('registers a user and returns a bearer token', async () => {
        const res = await post('/api/auth/register', {
            email: 'Listener@Example.com',
            password: 'password123',
        });
        expect(res.status).toBe(201);
        const body = await readJson<AuthToken>(res);
        expect(body.token_type).toBe('bearer');
        expect(typeof body.token).toBe('string');

        const user = await server.db.getUserByEmail('listener@example.com');
        expect(user?.email).toBe('listener@example.com');
        expect(user?.passwordHash).not.toBe('password123');
    });

    it('refuses a duplicate email', async () => {
        await post('/api/auth/register', {
            email: 'dup@example.com',
            password: 'password123',
        });
        const res = await post('/api/auth/register', {
            email: 'DUP@example.com',
            password: 'password456',
        });
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({
            error: 'email_taken',
            message: 'Email is already registered.',
        });
    });

    it('validates email and password', async () => {
        const badEmail = await post('/api/auth/register', {
            email: 'no-at-sign',
            password: 'password123',
        });
        expect(badEmail.status).toBe(400);
        expect((await readJson<ApiError>(badEmail)).message).toBe('A valid email is required.');

        const shortPassword = await post('/api/auth/register', {
            email: 'short@example.com',
            password: 'short',
        });
        expect(shortPassword.status).toBe(400);
        expect((await readJson<ApiError>(shortPassword)).message).toBe(
            'Password must be at least 8 characters.',
        );
    });

    it('logs in with the right password only', async () => {
        await post('/api/auth/register', {
            email: 'login@example.com',
            password: 'password123',
        });

        const ok = await post('/api/auth/login', {
            email: 'login@example.com',
            password: 'password123',
        });
        expect(ok.status).toBe(200);
        expect((await readJson<AuthToken>(ok)).token_type).toBe('bearer');

        const wrong = await post('/api/auth/login', {
            email: 'login@example.com',
            password: 'wrong-password',
        });
        expect(wrong.status).toBe(401);
        expect(await wrong.json()).toEqual({
            error: 'unauthorized',
            message: 'Invalid email or password.',
        });

        const unknown = await post('/api/auth/login', {
            email: 'ghost@example.com',
            password: 'password123',
        });
        expect(unknown.status).toBe(401);
    });

    it('returns the profile for a valid token', async () => {
        const res = await post('/api/auth/register', {
            email: 'me@example.com',
            password: 'password123',
        });
        const { token } = await readJson<AuthToken>(res);

        const profile = await fetch(`${server.baseUrl}/api/auth/profile`, {
            headers: { Authorization: `Bearer ${token}` },
        });
        expect(profile.status).toBe(200);
        const { data } = await readJson<{ data: UserProfile }>(profile);
        expect(data.email).toBe('me@example.com');
        expect(Object.keys(data).sort()).toEqual(['createdAt', 'email', 'id']);
    });

    it('rejects the profile without a usable token', async () => {
        const none = await fetch(`${server.baseUrl}/api/auth/profile`);
        expect(none.status).toBe(401);
        expect(await none.json()).toEqual({
            error: 'unauthorized',
            message: 'Not authenticated.',
        });

        const basic = await fetch(`${server.baseUrl}/api/auth/profile`, {
            headers: { Authorization: 'Basic dGVzdA==' },
        });
        expect(basic.status).toBe(401);

        const bogus = await fetch(`${server.baseUrl}/api/auth/profile`, {
            headers: { Authorization: 'Bearer bogus' },
        });
        expect(await bogus.json()).toEqual({
            error: 'unauthorized',
            message: 'Invalid or expired token.',
        });
    });

    it('answers malformed JSON with 400', async () => {
        const res = await fetch(`${server.baseUrl}/api/auth/login`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: '{"email":',
        });
        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({
            error: 'bad_request',
            message: 'Malformed JSON body.',
        });
    });
});

describe('app shell', () => {
    let server: TestServer;

    beforeEach(async () => {
        server = await startTestServer();
    });

    afterEach(async () => {
        await server.close();
    });

    it('answers the health check', async () => {
        const res = await fetch(`${server.baseUrl}/`);
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'ok' });
    });

    it('reports unknown routes as JSON 404s', async () => {
        const res = await fetch(`${server.baseUrl}/api/nothing`);
        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({
            error: 'not_found',
            message: 'Route GET /api/nothing not found.',
        });
    });
});
