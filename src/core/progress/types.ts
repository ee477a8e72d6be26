/**
 * Receives progress for one enumeration. Opened with the total by a
 * ProgressSinkFactory and closed exactly once when the enumeration ends.
 */
export interface ProgressSink {
    /** One more item handed to the consumer */
    increment(): void;
    close(): void;
}

export type ProgressSinkFactory = (total: number) => ProgressSink;
