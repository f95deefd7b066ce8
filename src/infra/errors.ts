export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every error the ingestion pipeline raises on purpose.
 * `details` is logged as key=value pairs; `originalError` keeps the cause.
 */
export class FeedError extends Error {
    readonly details?: ErrorDetails;
    readonly originalError?: unknown;

    constructor(message: string, details?: ErrorDetails, originalError?: unknown) {
        super(message);
        this.name = 'FeedError';
        this.details = details;
        this.originalError = originalError;
    }
}

/** Connection refused, timeout, non-success HTTP status. Retried, never fatal. */
export class TransportError extends FeedError {
    constructor(message: string, details?: ErrorDetails, originalError?: unknown) {
        super(message, details, originalError);
        this.name = 'TransportError';
    }
}

/** Malformed payload. The message or response is discarded. */
export class ParseError extends FeedError {
    constructor(message: string, details?: ErrorDetails, originalError?: unknown) {
        super(message, details, originalError);
        this.name = 'ParseError';
    }
}

/** Store write/read failure. The update for that instrument is lost for this cycle. */
export class StoreError extends FeedError {
    constructor(message: string, details?: ErrorDetails, originalError?: unknown) {
        super(message, details, originalError);
        this.name = 'StoreError';
    }
}

/** Missing or invalid setting. Fatal at start-up only. */
export class ConfigError extends FeedError {
    constructor(message: string, details?: ErrorDetails, originalError?: unknown) {
        super(message, details, originalError);
        this.name = 'ConfigError';
    }
}

export const toErrorMessage = (err: unknown): string => {
    if (!err) return 'unknown error';
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    try {
        return JSON.stringify(err);
    } catch {
        return String(err);
    }
};

export function formatErrorDetails(err: unknown): string | undefined {
    if (!(err instanceof FeedError) || !err.details) return undefined;
    const parts: string[] = [];
    for (const [key, value] of Object.entries(err.details)) {
        if (value === undefined || value === null) continue;
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            parts.push(`${key}=${value}`);
            continue;
        }
        parts.push(`${key}=${JSON.stringify(value)}`);
    }
    return parts.length ? `details=${parts.join(' ')}` : undefined;
}

export function isAbortError(err: unknown): boolean {
    if (err instanceof FeedError) {
        const original = err.originalError;
        if (original instanceof Error && original.name === 'AbortError') return true;
    }
    return err instanceof Error && err.name === 'AbortError';
}
