import { ErrorRequestHandler, RequestHandler } from 'express';
import multer from 'multer';
import { HttpError, notFound } from '../utils/httpError.js';

const toHttpError = (error: unknown): HttpError | null => {
    if (error instanceof HttpError) return error;
    if (error instanceof multer.MulterError) {
        if (error.code === 'LIMIT_FILE_SIZE') {
            return new HttpError(413, 'payload_too_large', 'File too large.');
        }
        return new HttpError(400, 'bad_request', error.message);
    }
    // Malformed JSON bodies from express.json()
    if (error instanceof SyntaxError && 'body' in error) {
        return new HttpError(400, 'bad_request', 'Malformed JSON body.');
    }
    return null;
};

export const notFoundHandler: RequestHandler = (req, _res, next) => {
    next(notFound(`Route ${req.method} ${req.path} not found.`));
};

/**
 * Every error leaves as `{ error, message }`. Unexpected failures are logged
 * and reported generically so no internal detail reaches the client.
 */
export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
    if (res.headersSent) {
        next(error);
        return;
    }

    const httpError = toHttpError(error);
    if (httpError) {
        res.status(httpError.status).json(httpError.toJSON());
        return;
    }

    console.error(`Unhandled error on ${req.method} ${req.path}:`, error);
    res.status(500).json({
        error: 'internal_error',
        message: 'Internal server error.',
    });
};
