import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { DbClient } from '../utils/db.js';
import { unauthorized } from '../utils/httpError.js';

export interface AuthUser {
    id: string;
    email: string;
    createdAt: string;
}

export interface TokenSettings {
    jwtSecret?: string;
    jwtExpiresMinutes: number;
}

const JWT_ALGORITHM = 'HS256';

const requireSecret = (settings: TokenSettings): string => {
    if (!settings.jwtSecret) {
        throw new Error('JWT_SECRET is not defined');
    }
    return settings.jwtSecret;
};

export const signAccessToken = (
    user: { id: string; email: string },
    settings: TokenSettings,
): string =>
    jwt.sign({ sub: user.id, email: user.email }, requireSecret(settings), {
        algorithm: JWT_ALGORITHM,
        expiresIn: settings.jwtExpiresMinutes * 60,
    });

// Returns the user id carried by a valid token, or null
export const verifyAccessToken = (
    token: string,
    settings: TokenSettings,
): string | null => {
    const secret = requireSecret(settings);
    try {
        const decoded = jwt.verify(token, secret, {
            algorithms: [JWT_ALGORITHM],
        });
        if (typeof decoded === 'string' || !decoded.sub) return null;
        return decoded.sub;
    } catch (jwtError) {
        console.error('JWT verification failed:', jwtError);
        return null;
    }
};

const bearerToken = (req: Request): string | null => {
    const authHeader = req.headers.authorization;
    if (!authHeader) return null;
    const [scheme, token] = authHeader.split(' ');
    return scheme?.toLowerCase() === 'bearer' && token ? token : null;
};

/**
 * Authenticates requests carrying `Authorization: Bearer <token>`. With
 * `optional`, a request without the header passes through anonymously; a
 * header that is present but invalid is rejected either way.
 */
export const createAuthMiddleware = (
    db: DbClient,
    settings: TokenSettings,
    { optional = false }: { optional?: boolean } = {},
): RequestHandler => {
    return async (req: Request, _res: Response, next: NextFunction) => {
        try {
            if (!req.headers.authorization) {
                if (optional) {
                    next();
                    return;
                }
                next(unauthorized('Not authenticated.'));
                return;
            }

            const token = bearerToken(req);
            if (!token) {
                next(unauthorized('Not authenticated.'));
                return;
            }

            const userId = verifyAccessToken(token, settings);
            if (!userId) {
                next(unauthorized('Invalid or expired token.'));
                return;
            }

            const user = await db.getUserById(userId);
            if (!user) {
                next(unauthorized('User not found.'));
                return;
            }

            req.user = { id: user.id, email: user.email, createdAt: user.createdAt };
            next();
        } catch (error) {
            console.error('Auth middleware error:', error);
            next(error);
        }
    };
};
