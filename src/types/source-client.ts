import type { IdKind, RawRecord, SourceName } from './publication.js';

/**
 * Capability interface for bibliographic source clients (Crossref, Scopus, DBLP).
 * Every operation is optional; `supportedIds` lists the id kinds `fetchById` accepts.
 * A `null` result means the source does not know the publication.
 */
export interface SourceClient {
    /** Human-readable source name */
    readonly name: string;

    /** Source identifier used in config and provenance */
    readonly sourceId: SourceName;

    /** Id kinds accepted by `fetchById` */
    readonly supportedIds: ReadonlySet<IdKind>;

    /**
     * Fetch a single publication, with its references and citations.
     */
    fetchById?(kind: IdKind, value: string): Promise<RawRecord | null>;

    /**
     * Find the publication whose title best matches `title` and fetch it.
     */
    searchByTitle?(title: string): Promise<RawRecord | null>;

    /**
     * List publications by an author. Hits carry metadata only.
     */
    searchByAuthor?(author: string, limit?: number): Promise<RawRecord[]>;
}

/**
 * Options for source client initialization.
 */
export interface SourceClientOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email for polite pools (Crossref) */
    email?: string;

    /** Minimum normalized-title similarity for a title search hit */
    minTitleSimilarity?: number;

    /** Cap on citing works fetched per publication */
    maxCitations?: number;
}
