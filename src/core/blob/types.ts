/**
 * Inline blob content
 */
export type BlobData = string | Uint8Array;

export interface BlobInit {
    data?: BlobData | undefined;
    path?: string | undefined;
    mimeType?: string | undefined;
    /** Encoding used by asString() for byte content (default: utf-8) */
    encoding?: BufferEncoding | undefined;
    metadata?: Record<string, unknown> | undefined;
}

export interface FromPathOptions {
    encoding?: BufferEncoding | undefined;
    /** Explicit MIME type; wins over guessing */
    mimeType?: string | undefined;
    /** Guess the MIME type from the file extension (default: true) */
    guessType?: boolean | undefined;
    metadata?: Record<string, unknown> | undefined;
}

export interface FromDataOptions {
    encoding?: BufferEncoding | undefined;
    mimeType?: string | undefined;
    /** Path the data is associated with, if any */
    path?: string | undefined;
    metadata?: Record<string, unknown> | undefined;
}

/**
 * Produces a blob for a matched path. The filesystem loader calls this once
 * per file it yields.
 */
export type BlobFactory<TBlob> = (path: string) => TBlob;
