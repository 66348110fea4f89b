import { describe, it, expect } from 'vitest';
import { looksLikeMp3, validateMp3Upload } from '../../src/utils/upload.js';
import { HttpError } from '../../src/utils/httpError.js';

const ID3_FILE = Buffer.from('ID3\u0004\u0000\u0000\u0000\u0000\u0000\u000a', 'latin1');
const MAX = 1024;

const thrownBy = (fn: () => unknown): unknown => {
    try {
        fn();
    } catch (error) {
        return error;
    }
    throw new Error('expected the call to throw');
};

describe('looksLikeMp3', () => {
    it('accepts an ID3 header', () => {
        expect(looksLikeMp3(ID3_FILE)).toBe(true);
    });

    it('accepts an MPEG frame sync', () => {
        expect(looksLikeMp3(Buffer.from([0xff, 0xfb, 0x90, 0x00]))).toBe(true);
    });

    it('rejects other content', () => {
        expect(looksLikeMp3(Buffer.from('RIFF....WAVE', 'latin1'))).toBe(false);
        expect(looksLikeMp3(Buffer.from([0xff]))).toBe(false);
    });
});

describe('validateMp3Upload', () => {
    it('returns the sanitized name and size', () => {
        const result = validateMp3Upload(
            { originalname: 'a b.mp3', mimetype: 'audio/mpeg', buffer: ID3_FILE },
            MAX,
        );
        expect(result).toEqual({ safeName: 'a_b.mp3', sizeBytes: 10 });
    });

    it('accepts octet-stream and a missing content type', () => {
        expect(
            validateMp3Upload(
                { originalname: 'x.MP3', mimetype: 'application/octet-stream', buffer: ID3_FILE },
                MAX,
            ).safeName,
        ).toBe('x.MP3');
        expect(
            validateMp3Upload({ originalname: 'x.mp3', mimetype: '', buffer: ID3_FILE }, MAX)
                .sizeBytes,
        ).toBe(10);
    });

    it('defaults the name when the client sent none', () => {
        expect(validateMp3Upload({ buffer: ID3_FILE }, MAX).safeName).toBe('upload.mp3');
    });

    it('rejects other extensions', () => {
        const error = thrownBy(() =>
            validateMp3Upload({ originalname: 'song.wav', buffer: ID3_FILE }, MAX),
        );
        expect(error).toBeInstanceOf(HttpError);
        expect(error).toMatchObject({
            status: 400,
            message: 'Only .mp3 files are supported.',
        });
    });

    it('rejects unexpected content types', () => {
        const error = thrownBy(() =>
            validateMp3Upload(
                { originalname: 'song.mp3', mimetype: 'text/plain', buffer: ID3_FILE },
                MAX,
            ),
        );
        expect(error).toMatchObject({
            status: 400,
            message: 'Invalid content type; expected audio/mpeg.',
        });
    });

    it('rejects an empty file', () => {
        const error = thrownBy(() =>
            validateMp3Upload({ originalname: 'song.mp3', buffer: Buffer.alloc(0) }, MAX),
        );
        expect(error).toMatchObject({ status: 400, message: 'Empty file.' });
    });

    it('rejects files over the limit with 413', () => {
        const error = thrownBy(() =>
            validateMp3Upload({ originalname: 'song.mp3', buffer: ID3_FILE }, 9),
        );
        expect(error).toMatchObject({ status: 413, code: 'payload_too_large' });
    });

    it('rejects content without an mp3 signature', () => {
        const error = thrownBy(() =>
            validateMp3Upload(
                { originalname: 'song.mp3', buffer: Buffer.from('not audio at all') },
                MAX,
            ),
        );
        expect(error).toMatchObject({
            status: 400,
            message: 'File does not look like a valid mp3.',
        });
    });
});
