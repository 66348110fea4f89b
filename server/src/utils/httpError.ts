import { ApiError } from '../../../shared/types/common.js';

export class HttpError extends Error {
    constructor(
        public readonly status: number,
        public readonly code: string,
        message: string,
    ) {
        super(message);
        this.name = 'HttpError';
    }

    toJSON(): ApiError {
        return { error: this.code, message: this.message };
    }
}

export const notFound = (message: string): HttpError =>
    new HttpError(404, 'not_found', message);

export const badRequest = (message: string, code = 'bad_request'): HttpError =>
    new HttpError(400, code, message);

export const unauthorized = (message: string): HttpError =>
    new HttpError(401, 'unauthorized', message);

export const forbidden = (message: string): HttpError =>
    new HttpError(403, 'forbidden', message);
