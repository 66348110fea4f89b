import { describe, it, expect } from 'vitest';
import { DEFAULT_UPLOAD_NAME, sanitizeFilename } from '../../src/utils/filename.js';

describe('sanitizeFilename', () => {
    it('replaces spaces with underscores', () => {
        expect(sanitizeFilename('a b.mp3')).toBe('a_b.mp3');
    });

    it('trims surrounding whitespace first', () => {
        expect(sanitizeFilename('  song.mp3 \n')).toBe('song.mp3');
    });

    it('turns path separators into underscores', () => {
        expect(sanitizeFilename('../secret/x.mp3')).toBe('.._secret_x.mp3');
        expect(sanitizeFilename('dir\\file.mp3')).toBe('dir_file.mp3');
    });

    it('collapses runs of disallowed characters into one underscore', () => {
        expect(sanitizeFilename('Hello, World!!.mp3')).toBe('Hello_World_.mp3');
    });

    it('keeps dots, dashes and underscores', () => {
        expect(sanitizeFilename('my-track_v2.final.mp3')).toBe('my-track_v2.final.mp3');
    });

    it('strips control characters and quotes', () => {
        expect(sanitizeFilename('a"\r\nb.mp3')).toBe('a_b.mp3');
    });

    it('falls back to the default name when nothing is left', () => {
        expect(sanitizeFilename('   ')).toBe(DEFAULT_UPLOAD_NAME);
        expect(sanitizeFilename('')).toBe('upload.mp3');
    });

    it('accepts a custom fallback', () => {
        expect(sanitizeFilename('', 'track')).toBe('track');
    });
});
