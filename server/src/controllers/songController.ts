import { Request, RequestHandler, Response } from 'express';
import path from 'path';
import crypto from 'crypto';
import * as fs from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { DbClient, SongRecord, toSongSummary } from '../utils/db.js';
import {
    HttpError,
    badRequest,
    forbidden,
    notFound,
    unauthorized,
} from '../utils/httpError.js';
import { MediaRoots, resolveMediaPath } from '../utils/mediaPath.js';
import { MediaStream, openMediaStream } from '../utils/rangeStream.js';
import { validateMp3Upload } from '../utils/upload.js';
import { SongUpload } from '../../../shared/types/common.js';

export interface SongControllerOptions extends MediaRoots {
    maxUploadBytes: number;
    streamChunkBytes: number;
}

const FILE_MISSING = 'File missing on server.';
const UNKNOWN_ARTIST = 'Unknown Artist';

const formField = (req: Request, key: string): string | undefined => {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null) return undefined;
    const value: unknown = Reflect.get(body, key);
    return typeof value === 'string' ? value : undefined;
};

// The client went away before the body was fully written
const isPrematureClose = (error: unknown): boolean =>
    error instanceof Error &&
    'code' in error &&
    error.code === 'ERR_STREAM_PREMATURE_CLOSE';

const streamSetupFailed = (): HttpError =>
    new HttpError(500, 'stream_setup_failed', 'Failed to resolve media path.');

export class SongController {
    constructor(
        private readonly db: DbClient,
        private readonly options: SongControllerOptions,
    ) {}

    private async findSong(id: string): Promise<SongRecord> {
        const song = await this.db.getSongById(id);
        if (!song) throw notFound('Song not found.');
        return song;
    }

    listSongs: RequestHandler = async (_req, res, next) => {
        try {
            const songs = await this.db.listSongs();
            res.json({ data: songs.map(toSongSummary) });
        } catch (error) {
            next(error);
        }
    };

    getMySongs: RequestHandler = async (req, res, next) => {
        try {
            if (!req.user) throw unauthorized('Not authenticated.');
            const songs = await this.db.listSongsByOwner(req.user.id);
            res.json({ data: songs.map(toSongSummary) });
        } catch (error) {
            next(error);
        }
    };

    getSong: RequestHandler = async (req, res, next) => {
        try {
            const song = await this.findSong(req.params.id);
            res.json({ data: toSongSummary(song) });
        } catch (error) {
            next(error);
        }
    };

    uploadSong: RequestHandler = async (req, res, next) => {
        try {
            const audioFile = req.file;
            if (!audioFile) {
                throw badRequest('No audio file provided.');
            }

            const { safeName, sizeBytes } = validateMp3Upload(
                audioFile,
                this.options.maxUploadBytes,
            );

            const title =
                (formField(req, 'title') || path.parse(safeName).name).trim() ||
                'Untitled';
            const artist =
                (formField(req, 'artist') || UNKNOWN_ARTIST).trim() ||
                UNKNOWN_ARTIST;

            const mediaRoot = this.options.mediaRoot;
            await fs.promises.mkdir(mediaRoot, { recursive: true });

            const songId = crypto.randomUUID();
            const storedFilename = `${songId}_${safeName}`;
            const storedPath = path.join(mediaRoot, storedFilename);
            try {
                await fs.promises.writeFile(storedPath, audioFile.buffer);
            } catch (error) {
                console.error('Error storing upload:', error);
                throw new HttpError(500, 'storage_failed', 'Failed to store file.');
            }

            let song: SongRecord;
            try {
                song = await this.db.createSong({
                    id: songId,
                    ownerId: req.user?.id ?? null,
                    title,
                    artist,
                    filename: storedFilename,
                    contentType: (audioFile.mimetype || 'audio/mpeg').toLowerCase(),
                    sizeBytes,
                    durationSeconds: null,
                    createdAt: new Date().toISOString(),
                });
            } catch (error) {
                // No row will ever point at the file
                await fs.promises.rm(storedPath, { force: true });
                throw error;
            }

            const upload: SongUpload = {
                ...toSongSummary(song),
                filename: song.filename,
                durationSeconds: song.durationSeconds,
                ownerId: song.ownerId,
            };
            res.status(201).json({ data: upload });
        } catch (error) {
            next(error);
        }
    };

    streamSong: RequestHandler = async (req, res, next) => {
        let song: SongRecord;
        try {
            song = await this.findSong(req.params.id);
        } catch (error) {
            next(error);
            return;
        }

        const rangeHeader = req.headers.range;
        let stream: MediaStream;
        try {
            const resolved = await resolveMediaPath(song.filename, this.options);
            if (resolved.kind === 'missing') {
                next(notFound(FILE_MISSING));
                return;
            }

            console.log('stream_song:', {
                songId: song.id,
                filename: song.filename,
                resolvedPath: resolved.path,
                range: rangeHeader,
            });

            stream = await openMediaStream(resolved.path, {
                rangeHeader,
                displayTitle: song.title,
                chunkSize: this.options.streamChunkBytes,
            });
        } catch (error) {
            console.error('stream_song_setup_error:', {
                songId: song.id,
                error,
            });
            next(streamSetupFailed());
            return;
        }

        if (stream.kind === 'missing') {
            if (stream.reason === 'empty') {
                console.warn('stream_song_empty_file:', { songId: song.id });
            }
            next(notFound(FILE_MISSING));
            return;
        }

        res.status(stream.status).set(stream.headers);
        if (req.method === 'HEAD') {
            await stream.chunks.return();
            res.end();
            return;
        }
        await this.pipeChunks(song, stream.chunks, res);
    };

    // A read failure after headers are out can only end the response
    private async pipeChunks(
        song: SongRecord,
        chunks: AsyncIterable<Buffer>,
        res: Response,
    ): Promise<void> {
        try {
            await pipeline(Readable.from(chunks), res);
        } catch (error) {
            if (isPrematureClose(error)) {
                console.log('stream_song_aborted:', { songId: song.id });
                return;
            }
            console.error('stream_song_read_failed:', { songId: song.id, error });
            res.destroy();
        }
    }

    deleteSong: RequestHandler = async (req, res, next) => {
        try {
            if (!req.user) throw unauthorized('Not authenticated.');
            const song = await this.findSong(req.params.id);
            if (song.ownerId !== req.user.id) {
                throw forbidden('Only the owner can delete a song.');
            }

            const deleted = await this.db.deleteSong(song.id, req.user.id);
            if (!deleted) throw notFound('Song not found.');

            const resolved = await resolveMediaPath(song.filename, this.options);
            if (resolved.kind === 'found') {
                await fs.promises.rm(resolved.path, { force: true });
            }

            res.json({ message: 'Song deleted successfully' });
        } catch (error) {
            next(error);
        }
    };
}
