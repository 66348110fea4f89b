import { DEFAULT_UPLOAD_NAME, sanitizeFilename } from './filename.js';
import { HttpError, badRequest } from './httpError.js';

export interface IncomingAudio {
    originalname?: string;
    mimetype?: string;
    buffer: Buffer;
}

export interface ValidatedAudio {
    safeName: string;
    sizeBytes: number;
}

const ACCEPTED_CONTENT_TYPES = ['audio/mpeg', 'application/octet-stream'];

// "ID3" tag header, or an MPEG audio frame sync (11 set bits)
export const looksLikeMp3 = (content: Buffer): boolean => {
    const isId3 = content.subarray(0, 3).toString('latin1') === 'ID3';
    const isMpegFrame =
        content.length >= 2 && content[0] === 0xff && (content[1] & 0xe0) === 0xe0;
    return isId3 || isMpegFrame;
};

/**
 * Checks an uploaded file before anything touches the disk. Browsers are
 * inconsistent about the type they send for mp3, so octet-stream passes too.
 */
export const validateMp3Upload = (
    file: IncomingAudio,
    maxBytes: number,
): ValidatedAudio => {
    const safeName = sanitizeFilename(file.originalname || DEFAULT_UPLOAD_NAME);

    if (!safeName.toLowerCase().endsWith('.mp3')) {
        throw badRequest('Only .mp3 files are supported.');
    }

    const contentType = (file.mimetype ?? '').toLowerCase();
    if (
        contentType &&
        !ACCEPTED_CONTENT_TYPES.some((accepted) => contentType.includes(accepted))
    ) {
        throw badRequest('Invalid content type; expected audio/mpeg.');
    }

    const content = file.buffer;
    if (content.length === 0) {
        throw badRequest('Empty file.');
    }
    if (content.length > maxBytes) {
        throw new HttpError(413, 'payload_too_large', 'File too large.');
    }
    if (!looksLikeMp3(content)) {
        throw badRequest('File does not look like a valid mp3.');
    }

    return { safeName, sizeBytes: content.length };
};
