/**
 * Base class for every error raised by blobwalk.
 * Carries a stable `code` so callers can branch without parsing messages.
 */
export abstract class BlobwalkError extends Error {
    abstract readonly code: string;

    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    /**
     * Plain-object form for logging and `--json` output
     */
    abstract toJSON(): Record<string, unknown>;
}
