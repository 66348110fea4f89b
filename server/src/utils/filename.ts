export const DEFAULT_UPLOAD_NAME = 'upload.mp3';

/**
 * Reduce a client-supplied name to `[A-Za-z0-9._-]`. The result never holds a
 * path separator or control character, so it is safe both on disk and inside a
 * quoted Content-Disposition filename.
 */
export const sanitizeFilename = (
    name: string,
    fallback: string = DEFAULT_UPLOAD_NAME,
): string => {
    const cleaned = name
        .trim()
        .replace(/[\\/]/g, '_')
        .replace(/[^A-Za-z0-9._-]+/g, '_');
    return cleaned || fallback;
};
