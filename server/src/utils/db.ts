import sqlite3 from 'sqlite3';
import type { Database } from 'sqlite3';
import { SongSummary } from '../../../shared/types/common.js';

export interface SongRecord {
    id: string;
    ownerId: string | null;
    title: string;
    artist: string;
    filename: string;
    contentType: string;
    sizeBytes: number;
    durationSeconds: number | null;
    createdAt: string;
}

export interface UserRecord {
    id: string;
    email: string;
    passwordHash: string;
    createdAt: string;
}

// Database row types (what we get from SQLite)
interface SongRow {
    id: string;
    user_id: string | null;
    title: string;
    artist: string;
    filename: string;
    content_type: string;
    size_bytes: number;
    duration_seconds: number | null;
    created_at: string;
}

interface UserRow {
    id: string;
    email: string;
    password_hash: string;
    created_at: string;
}

const convertSongRow = (row: SongRow): SongRecord => ({
    id: row.id,
    ownerId: row.user_id,
    title: row.title,
    artist: row.artist,
    filename: row.filename,
    contentType: row.content_type,
    sizeBytes: row.size_bytes,
    durationSeconds: row.duration_seconds,
    createdAt: row.created_at,
});

const convertUserRow = (row: UserRow): UserRecord => ({
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
});

export const toSongSummary = (song: SongRecord): SongSummary => ({
    id: song.id,
    title: song.title,
    artist: song.artist,
    createdAt: song.createdAt,
    sizeBytes: song.sizeBytes,
    contentType: song.contentType,
});

const SCHEMA = [
    `CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        email TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        created_at TEXT NOT NULL
    )`,
    `CREATE TABLE IF NOT EXISTS songs (
        id TEXT PRIMARY KEY,
        user_id TEXT REFERENCES users(id) ON DELETE CASCADE,
        title TEXT NOT NULL,
        artist TEXT NOT NULL,
        filename TEXT NOT NULL,
        content_type TEXT NOT NULL,
        size_bytes INTEGER NOT NULL,
        duration_seconds INTEGER,
        created_at TEXT NOT NULL
    )`,
    'CREATE INDEX IF NOT EXISTS idx_songs_user_id ON songs(user_id)',
];

/**
 * Promise wrapper over a sqlite3 connection. One instance is opened at startup
 * and handed to the controllers; nothing in the module holds a connection.
 */
export class DbClient {
    private constructor(private readonly db: Database) {}

    static async open(filename: string): Promise<DbClient> {
        const db = await new Promise<Database>((resolve, reject) => {
            const connection: Database = new sqlite3.Database(
                filename,
                (err: Error | null) => {
                    if (err) reject(err);
                    else resolve(connection);
                },
            );
        });
        const client = new DbClient(db);
        await client.exec('PRAGMA foreign_keys = ON');
        for (const statement of SCHEMA) {
            await client.exec(statement);
        }
        return client;
    }

    private exec(sql: string, params: unknown[] = []): Promise<number> {
        return new Promise((resolve, reject) => {
            this.db.run(sql, params, function (err: Error | null) {
                if (err) {
                    reject(err);
                    return;
                }
                resolve(this.changes);
            });
        });
    }

    private get<T>(sql: string, params: unknown[]): Promise<T | undefined> {
        return new Promise((resolve, reject) => {
            this.db.get<T | undefined>(sql, params, (err, row) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve(row);
            });
        });
    }

    private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
        return new Promise((resolve, reject) => {
            this.db.all<T>(sql, params, (err, rows) => {
                if (err) {
                    reject(err);
                    return;
                }
                resolve(rows);
            });
        });
    }

    async createUser(user: UserRecord): Promise<UserRecord> {
        await this.exec(
            'INSERT INTO users (id, email, password_hash, created_at) VALUES (?, ?, ?, ?)',
            [user.id, user.email, user.passwordHash, user.createdAt],
        );
        return user;
    }

    async getUserByEmail(email: string): Promise<UserRecord | null> {
        const row = await this.get<UserRow>(
            'SELECT * FROM users WHERE email = ?',
            [email],
        );
        return row ? convertUserRow(row) : null;
    }

    async getUserById(id: string): Promise<UserRecord | null> {
        const row = await this.get<UserRow>('SELECT * FROM users WHERE id = ?', [
            id,
        ]);
        return row ? convertUserRow(row) : null;
    }

    async createSong(song: SongRecord): Promise<SongRecord> {
        await this.exec(
            `INSERT INTO songs (
                id, user_id, title, artist, filename, content_type,
                size_bytes, duration_seconds, created_at
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                song.id,
                song.ownerId,
                song.title,
                song.artist,
                song.filename,
                song.contentType,
                song.sizeBytes,
                song.durationSeconds,
                song.createdAt,
            ],
        );
        return song;
    }

    async getSongById(id: string): Promise<SongRecord | null> {
        const row = await this.get<SongRow>('SELECT * FROM songs WHERE id = ?', [
            id,
        ]);
        return row ? convertSongRow(row) : null;
    }

    // Newest first; rowid breaks ties between songs created in the same millisecond
    async listSongs(): Promise<SongRecord[]> {
        const rows = await this.all<SongRow>(
            'SELECT * FROM songs ORDER BY created_at DESC, rowid DESC',
        );
        return rows.map(convertSongRow);
    }

    async listSongsByOwner(ownerId: string): Promise<SongRecord[]> {
        const rows = await this.all<SongRow>(
            'SELECT * FROM songs WHERE user_id = ? ORDER BY created_at DESC, rowid DESC',
            [ownerId],
        );
        return rows.map(convertSongRow);
    }

    async deleteSong(id: string, ownerId: string): Promise<boolean> {
        const changes = await this.exec(
            'DELETE FROM songs WHERE id = ? AND user_id = ?',
            [id, ownerId],
        );
        return changes > 0;
    }

    close(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.db.close((err: Error | null) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }
}
