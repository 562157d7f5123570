import type { PublicationHint, SourceName } from '../types/index.js';

/**
 * No source produced a valid record for a hint.
 * Non-fatal: the pipeline skips the seed or candidate.
 */
export class NotFoundError extends Error {
    constructor(
        public readonly hint: PublicationHint,
        message = `No valid publication found for ${describeHint(hint)}`
    ) {
        super(message);
        this.name = 'NotFoundError';
    }
}

/**
 * A source returned a record without any citation signal.
 * Triggers fallback to the next source.
 */
export class IncompleteDataError extends Error {
    constructor(
        public readonly source: SourceName,
        public readonly id: string
    ) {
        super(`${source} returned no references, citations or counts for ${id}`);
        this.name = 'IncompleteDataError';
    }
}

/**
 * Network, auth or rate-limit failure of a specific source.
 */
export class SourceUnavailableError extends Error {
    constructor(
        public readonly source: SourceName,
        cause: unknown
    ) {
        super(`${source} unavailable: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'SourceUnavailableError';
    }
}

/**
 * A stored record failed to parse or violates the record invariants.
 * Read as a cache miss.
 */
export class CacheCorruptionError extends Error {
    constructor(
        public readonly id: string,
        public readonly reason: string
    ) {
        super(`Corrupt cache entry ${id}: ${reason}`);
        this.name = 'CacheCorruptionError';
    }
}

/**
 * Render a hint for log and error messages.
 */
export function describeHint(hint: PublicationHint): string {
    const parts = Object.entries(hint)
        .filter(([, value]) => typeof value === 'string' && value.length > 0)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return parts.length > 0 ? parts.join(' ') : '(empty hint)';
}
