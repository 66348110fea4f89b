export interface SongSummary {
    id: string;
    title: string;
    artist: string;
    createdAt: string;
    sizeBytes: number;
    contentType: string;
}

export interface SongUpload extends SongSummary {
    filename: string;
    durationSeconds: number | null;
    ownerId: string | null;
}

export interface AuthToken {
    token: string;
    token_type: 'bearer';
}

export interface UserProfile {
    id: string;
    email: string;
    createdAt: string;
}

// Every non-2xx response carries this body
export interface ApiError {
    error: string;
    message: string;
}
