import * as fs from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { sanitizeFilename } from './filename.js';

/** Inclusive byte window, `0 <= start <= end <= fileSize - 1`. */
export interface ByteRange {
    start: number;
    end: number;
}

const BYTES_PREFIX = 'bytes=';
const DIGITS = /^\d+$/;

/**
 * Parse a single-range `Range` header against a file of `fileSize` bytes.
 *
 * Anything unsupported or malformed yields `null`, meaning the whole file is
 * served: multiple ranges, other units, non-numeric bounds, `end < start` and
 * a start at or past the end of the file.
 */
export const parseRange = (
    headerValue: string | undefined,
    fileSize: number,
): ByteRange | null => {
    if (!headerValue || fileSize <= 0) return null;
    if (!headerValue.startsWith(BYTES_PREFIX)) return null;

    const spec = headerValue.slice(BYTES_PREFIX.length).trim();
    if (spec.includes(',')) return null;

    // "bytes=5" reads as "bytes=5-"
    const dash = spec.indexOf('-');
    const startPart = (dash < 0 ? spec : spec.slice(0, dash)).trim();
    const endPart = dash < 0 ? '' : spec.slice(dash + 1).trim();

    if (!startPart && !endPart) return null;

    // Suffix form: the last N bytes
    if (!startPart) {
        if (!DIGITS.test(endPart)) return null;
        const suffixLength = parseInt(endPart, 10);
        if (suffixLength <= 0) return null;
        return { start: Math.max(fileSize - suffixLength, 0), end: fileSize - 1 };
    }

    if (!DIGITS.test(startPart)) return null;
    const start = parseInt(startPart, 10);

    let end = fileSize - 1;
    if (endPart) {
        if (!DIGITS.test(endPart)) return null;
        end = parseInt(endPart, 10);
    }

    if (end < start || start >= fileSize) return null;
    return { start, end: Math.min(end, fileSize - 1) };
};

/**
 * Pull-driven reader over `[start, end]` of a file.
 *
 * The handle is opened on the first `next()` and closed once the window is
 * covered, a read comes back empty (the file shrank), a read fails, or the
 * consumer stops early through `return()`. It cannot be restarted.
 */
export class FileChunkSequence implements AsyncIterableIterator<Buffer> {
    private handle: FileHandle | null = null;
    private position: number;
    private remaining: number;
    private finished = false;

    constructor(
        private readonly filePath: string,
        range: ByteRange,
        private readonly chunkSize: number,
    ) {
        if (chunkSize < 1) {
            throw new RangeError(`chunkSize must be at least 1, got ${chunkSize}`);
        }
        this.position = range.start;
        this.remaining = range.end - range.start + 1;
    }

    get isOpen(): boolean {
        return this.handle !== null;
    }

    [Symbol.asyncIterator](): this {
        return this;
    }

    async next(): Promise<IteratorResult<Buffer>> {
        if (this.finished || this.remaining <= 0) return this.finish();

        try {
            let handle = this.handle;
            if (!handle) {
                handle = await fs.promises.open(this.filePath, 'r');
                // return() ran while the open was pending
                if (this.finished) {
                    await handle.close();
                    return { done: true, value: undefined };
                }
                this.handle = handle;
            }

            const size = Math.min(this.chunkSize, this.remaining);
            const buffer = Buffer.alloc(size);
            const { bytesRead } = await handle.read(
                buffer,
                0,
                size,
                this.position,
            );
            if (bytesRead === 0) return this.finish();

            this.position += bytesRead;
            this.remaining -= bytesRead;
            if (this.remaining <= 0) await this.release();

            const chunk =
                bytesRead < size ? buffer.subarray(0, bytesRead) : buffer;
            return { done: false, value: chunk };
        } catch (error) {
            await this.finish();
            throw error;
        }
    }

    async return(): Promise<IteratorResult<Buffer>> {
        return this.finish();
    }

    private async finish(): Promise<IteratorResult<Buffer>> {
        this.finished = true;
        await this.release();
        return { done: true, value: undefined };
    }

    private async release(): Promise<void> {
        const handle = this.handle;
        this.handle = null;
        if (handle) await handle.close();
    }
}

export type MissingReason = 'absent' | 'not_file' | 'empty';

export type MediaStream =
    | { kind: 'missing'; reason: MissingReason }
    | {
          kind: 'ready';
          status: 200 | 206;
          headers: Record<string, string>;
          range: ByteRange;
          fileSize: number;
          chunks: FileChunkSequence;
      };

export interface MediaStreamOptions {
    rangeHeader?: string;
    displayTitle: string;
    chunkSize: number;
}

// Errors from stat that mean "nothing usable there"
const ABSENT_CODES = new Set(['ENOENT', 'ENOTDIR']);

const isAbsentError = (error: unknown): boolean =>
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    ABSENT_CODES.has(error.code);

export const AUDIO_CONTENT_TYPE = 'audio/mpeg';
const DEFAULT_DISPOSITION_NAME = 'track';

export const contentDisposition = (displayTitle: string): string =>
    `inline; filename="${sanitizeFilename(displayTitle, DEFAULT_DISPOSITION_NAME)}.mp3"`;

/**
 * Work out status, headers and the chunk sequence for a response serving
 * `filePath`. A file that is gone, is not a regular file or has no bytes is
 * reported as missing rather than streamed. Any other stat failure is thrown.
 */
export const openMediaStream = async (
    filePath: string,
    { rangeHeader, displayTitle, chunkSize }: MediaStreamOptions,
): Promise<MediaStream> => {
    let stats: fs.Stats;
    try {
        stats = await fs.promises.stat(filePath);
    } catch (error) {
        if (isAbsentError(error)) return { kind: 'missing', reason: 'absent' };
        throw error;
    }
    if (!stats.isFile()) return { kind: 'missing', reason: 'not_file' };

    const fileSize = stats.size;
    if (fileSize <= 0) return { kind: 'missing', reason: 'empty' };

    const headers: Record<string, string> = {
        'Accept-Ranges': 'bytes',
        'Content-Type': AUDIO_CONTENT_TYPE,
        'Content-Disposition': contentDisposition(displayTitle),
    };

    const requested = parseRange(rangeHeader, fileSize);
    const range = requested ?? { start: 0, end: fileSize - 1 };
    headers['Content-Length'] = String(range.end - range.start + 1);
    if (requested) {
        headers['Content-Range'] = `bytes ${range.start}-${range.end}/${fileSize}`;
    }

    return {
        kind: 'ready',
        status: requested ? 206 : 200,
        headers,
        range,
        fileSize,
        chunks: new FileChunkSequence(filePath, range, chunkSize),
    };
};
