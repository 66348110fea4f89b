import { RequestHandler } from 'express';
import bcrypt from 'bcrypt';
import crypto from 'crypto';
import { DbClient } from '../utils/db.js';
import { badRequest, unauthorized } from '../utils/httpError.js';
import { TokenSettings, signAccessToken } from '../middlewares/auth.js';
import { AuthToken, UserProfile } from '../../../shared/types/common.js';

const SALT_ROUNDS = 10;
const MIN_PASSWORD_LENGTH = 8;

interface Credentials {
    email: string;
    password: string;
}

const stringField = (body: unknown, key: keyof Credentials): string => {
    if (typeof body !== 'object' || body === null) return '';
    const value: unknown = Reflect.get(body, key);
    return typeof value === 'string' ? value : '';
};

const readCredentials = (body: unknown): Credentials => ({
    email: stringField(body, 'email').trim().toLowerCase(),
    password: stringField(body, 'password'),
});

const isUniqueViolation = (error: unknown): boolean =>
    error instanceof Error && error.message.includes('UNIQUE constraint failed');

export class AuthController {
    constructor(
        private readonly db: DbClient,
        private readonly tokens: TokenSettings,
    ) {}

    private issueToken(user: { id: string; email: string }): AuthToken {
        return {
            token: signAccessToken(user, this.tokens),
            token_type: 'bearer',
        };
    }

    register: RequestHandler = async (req, res, next) => {
        try {
            const { email, password } = readCredentials(req.body);
            if (!email.includes('@')) {
                throw badRequest('A valid email is required.');
            }
            if (password.length < MIN_PASSWORD_LENGTH) {
                throw badRequest(
                    `Password must be at least ${MIN_PASSWORD_LENGTH} characters.`,
                );
            }

            const existing = await this.db.getUserByEmail(email);
            if (existing) {
                throw badRequest('Email is already registered.', 'email_taken');
            }

            const passwordHash = await bcrypt.hash(password, SALT_ROUNDS);
            const user = await this.db
                .createUser({
                    id: crypto.randomUUID(),
                    email,
                    passwordHash,
                    createdAt: new Date().toISOString(),
                })
                .catch((error: unknown) => {
                    // Lost a race with a concurrent registration
                    if (isUniqueViolation(error)) {
                        throw badRequest(
                            'Email is already registered.',
                            'email_taken',
                        );
                    }
                    throw error;
                });

            console.log('Created new user:', user.id);
            res.status(201).json(this.issueToken(user));
        } catch (error) {
            next(error);
        }
    };

    login: RequestHandler = async (req, res, next) => {
        try {
            const { email, password } = readCredentials(req.body);
            const user = email ? await this.db.getUserByEmail(email) : null;
            const valid =
                user !== null &&
                (await bcrypt.compare(password, user.passwordHash));
            if (!user || !valid) {
                throw unauthorized('Invalid email or password.');
            }

            res.json(this.issueToken(user));
        } catch (error) {
            next(error);
        }
    };

    getProfile: RequestHandler = (req, res, next) => {
        const user = req.user;
        if (!user) {
            next(unauthorized('Not authenticated.'));
            return;
        }
        const profile: UserProfile = {
            id: user.id,
            email: user.email,
            createdAt: user.createdAt,
        };
        res.json({ data: profile });
    };
}
