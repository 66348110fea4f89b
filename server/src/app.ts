import express, { Express } from 'express';
import cors from 'cors';
import { AppConfig } from './utils/config.js';
import { DbClient } from './utils/db.js';
import { createAuthMiddleware } from './middlewares/auth.js';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler.js';
import { AuthController } from './controllers/authController.js';
import { SongController } from './controllers/songController.js';
import { createAuthRouter } from './routes/authRoutes.js';
import { createSongRouter } from './routes/songs.js';

export interface AppDeps {
    config: AppConfig;
    db: DbClient;
}

export const createApp = ({ config, db }: AppDeps): Express => {
    const app = express();

    // CORS configuration
    const corsOptions: cors.CorsOptions = {
        origin: config.corsOrigins,
        credentials: true,
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'Range'],
        exposedHeaders: [
            'Content-Range',
            'Accept-Ranges',
            'Content-Length',
            'Content-Disposition',
        ],
    };

    // Middleware setup
    app.use(cors(corsOptions));
    app.use(express.json());

    const tokens = {
        jwtSecret: config.jwtSecret,
        jwtExpiresMinutes: config.jwtExpiresMinutes,
    };
    const requireAuth = createAuthMiddleware(db, tokens);
    const optionalAuth = createAuthMiddleware(db, tokens, { optional: true });

    const songController = new SongController(db, {
        mediaRoot: config.mediaRoot,
        backendRoot: config.backendRoot,
        maxUploadBytes: config.maxUploadBytes,
        streamChunkBytes: config.streamChunkBytes,
    });

    // Health check
    app.get('/', (_req, res) => {
        res.json({ status: 'ok' });
    });

    // Routes
    app.use('/api/auth', createAuthRouter(new AuthController(db, tokens), requireAuth));
    app.use(
        '/api/songs',
        createSongRouter({
            controller: songController,
            requireAuth,
            optionalAuth,
            maxUploadBytes: config.maxUploadBytes,
        }),
    );

    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
};
