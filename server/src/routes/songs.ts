// server/src/routes/songs.ts
import { Router, RequestHandler } from 'express';
import multer from 'multer';
import { SongController } from '../controllers/songController.js';

export interface SongRouterDeps {
    controller: SongController;
    requireAuth: RequestHandler;
    optionalAuth: RequestHandler;
    maxUploadBytes: number;
}

export const createSongRouter = ({
    controller,
    requireAuth,
    optionalAuth,
    maxUploadBytes,
}: SongRouterDeps): Router => {
    const router = Router();

    // Uploads are validated in memory before anything is written under the media root
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxUploadBytes, files: 1 },
    });

    router.get('/', controller.listSongs);
    router.get('/mine', requireAuth, controller.getMySongs);
    router.post('/upload', optionalAuth, upload.single('file'), controller.uploadSong);

    router.get('/:id', controller.getSong);
    router.get('/:id/stream', controller.streamSong);
    router.delete('/:id', requireAuth, controller.deleteSong);

    return router;
};
