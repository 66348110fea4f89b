import type { AuthUser } from '../middlewares/auth.js';

declare global {
    namespace Express {
        interface Request {
            user?: AuthUser;
        }
    }
}

export {};
