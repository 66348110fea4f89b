import path from 'path';
import * as fs from 'node:fs';

export type MediaPathResult =
    | { kind: 'found'; path: string }
    | { kind: 'missing' };

export interface MediaRoots {
    mediaRoot: string;
    backendRoot: string;
}

const MISSING: MediaPathResult = { kind: 'missing' };

// True when `candidate` is `root` itself or lies somewhere beneath it
export const isWithin = (root: string, candidate: string): boolean => {
    const relative = path.relative(root, candidate);
    return (
        relative === '' ||
        (relative !== '..' &&
            !relative.startsWith(`..${path.sep}`) &&
            !path.isAbsolute(relative))
    );
};

const isRegularFile = async (filePath: string): Promise<boolean> => {
    try {
        const stats = await fs.promises.stat(filePath);
        return stats.isFile();
    } catch {
        return false;
    }
};

/**
 * Map a stored media reference to an absolute path.
 *
 * Relative references are joined onto the media root and must stay inside it;
 * anything escaping is reported as `missing`, identical to an absent file. If
 * the primary location has no file, a couple of locations under the backend
 * root are tried for files written by older layouts. When nothing exists the
 * primary location is still returned: deciding that a path is absent is the
 * caller's job.
 */
export const resolveMediaPath = async (
    storedReference: string,
    { mediaRoot, backendRoot }: MediaRoots,
): Promise<MediaPathResult> => {
    if (!storedReference) return MISSING;

    // Written by the upload handler itself, so trusted as-is
    if (path.isAbsolute(storedReference)) {
        return { kind: 'found', path: storedReference };
    }

    const root = path.resolve(mediaRoot);
    const candidate = path.resolve(root, storedReference);
    if (!isWithin(root, candidate)) return MISSING;

    if (await isRegularFile(candidate)) {
        return { kind: 'found', path: candidate };
    }

    const base = path.resolve(backendRoot);
    const fallbacks = [
        path.resolve(base, 'media', storedReference),
        path.resolve(base, storedReference),
    ];

    for (const fallback of fallbacks) {
        if (!isWithin(base, fallback)) continue;
        if (await isRegularFile(fallback)) {
            console.warn('media_path_fallback_hit:', {
                storedReference,
                resolvedTo: fallback,
                mediaRoot: root,
                backendRoot: base,
            });
            return { kind: 'found', path: fallback };
        }
    }

    return { kind: 'found', path: candidate };
};
