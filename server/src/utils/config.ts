import path from 'path';
import * as fs from 'node:fs';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Nearest directory at or above `start` holding a package.json
export const findProjectRoot = (start: string): string | null => {
    let dir = path.resolve(start);
    for (;;) {
        if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
        const parent = path.dirname(dir);
        if (parent === dir) return null;
        dir = parent;
    }
};

/**
 * The server/ directory of the project, the same whether this module runs
 * from server/src or from the compiled copy under dist/.
 */
export const locateBackendRoot = (moduleDir: string): string => {
    const projectRoot = findProjectRoot(moduleDir);
    return projectRoot
        ? path.join(projectRoot, 'server')
        : path.resolve(moduleDir, '../..');
};

// Paths are anchored here, never to process.cwd()
export const BACKEND_ROOT = locateBackendRoot(__dirname);

const DEFAULT_PORT = 3000;
const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;
const DEFAULT_STREAM_CHUNK_BYTES = 1024 * 1024;
const DEFAULT_JWT_EXPIRES_MINUTES = 4320; // 3 days

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://127.0.0.1:3000'];

export type Env = Record<string, string | undefined>;

export interface AppConfig {
    port: number;
    nodeEnv: string;
    backendRoot: string;
    mediaRoot: string;
    databasePath: string;
    maxUploadBytes: number;
    streamChunkBytes: number;
    jwtSecret?: string;
    jwtExpiresMinutes: number;
    corsOrigins: string[];
}

const positiveInt = (raw: string | undefined, fallback: number): number => {
    if (!raw || !/^\d+$/.test(raw.trim())) return fallback;
    const value = parseInt(raw, 10);
    return value > 0 ? value : fallback;
};

/**
 * Directory holding uploaded media. MEDIA_ROOT may be absolute; a relative
 * value (or the default `media`) is resolved against the backend root.
 */
export const resolveMediaRoot = (
    env: Env = process.env,
    backendRoot: string = BACKEND_ROOT,
): string => {
    const configured = (env.MEDIA_ROOT ?? '').trim() || 'media';
    return path.isAbsolute(configured)
        ? path.resolve(configured)
        : path.resolve(backendRoot, configured);
};

const resolveDatabasePath = (env: Env, backendRoot: string): string => {
    const configured = (env.DATABASE_PATH ?? '').trim() || 'music.db';
    if (configured === ':memory:') return configured;
    return path.resolve(backendRoot, configured);
};

const corsOrigins = (env: Env): string[] => {
    const raw = env.CORS_ALLOW_ORIGINS || env.ALLOWED_ORIGINS || '';
    const extra = raw
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean);
    return [...DEFAULT_CORS_ORIGINS, ...extra];
};

export const loadConfig = (
    env: Env = process.env,
    backendRoot: string = BACKEND_ROOT,
): AppConfig => ({
    port: positiveInt(env.API_PORT, DEFAULT_PORT),
    nodeEnv: env.NODE_ENV || 'development',
    backendRoot,
    mediaRoot: resolveMediaRoot(env, backendRoot),
    databasePath: resolveDatabasePath(env, backendRoot),
    maxUploadBytes: positiveInt(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    streamChunkBytes: positiveInt(
        env.STREAM_CHUNK_BYTES,
        DEFAULT_STREAM_CHUNK_BYTES,
    ),
    jwtSecret: env.JWT_SECRET || undefined,
    jwtExpiresMinutes: positiveInt(
        env.JWT_EXPIRES_MINUTES,
        DEFAULT_JWT_EXPIRES_MINUTES,
    ),
    corsOrigins: corsOrigins(env),
});

// Load environment variables from server/.env before anything reads them
export const loadEnv = (): void => {
    dotenv.config({ path: path.join(BACKEND_ROOT, '.env') });
};
