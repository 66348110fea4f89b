import { Router, RequestHandler } from 'express';
import { AuthController } from '../controllers/authController.js';

export const createAuthRouter = (
    authController: AuthController,
    requireAuth: RequestHandler,
): Router => {
    const router = Router();

    // Public routes - no auth required
    router.post('/register', authController.register);
    router.post('/login', authController.login);

    router.get('/profile', requireAuth, authController.getProfile);

    return router;
};
