/**
 * Identifier families a publication can be looked up by.
 */
export type IdKind = 'doi' | 'eid' | 'dblp';

export const ID_KINDS: readonly IdKind[] = ['doi', 'eid', 'dblp'];

/**
 * Source clients known to the resolver.
 */
export type SourceName = 'crossref' | 'scopus' | 'dblp';

/**
 * Alternate identifiers known for a publication.
 */
export type PublicationIds = Partial<Record<IdKind, string>>;

/**
 * PublicationRecord: the canonical unit stored in the record cache.
 * Normalized from any source into this common shape.
 */
export interface PublicationRecord {
    /** Namespaced identifier, e.g. `doi:10.1000/xyz`, `eid:0012345678`, `dblp:conf/icse/X20` */
    canonical_id: string;

    /** Every identifier known for this publication (registered as cache aliases) */
    ids: PublicationIds;

    title: string;

    year: number | null;

    abstract: string | null;

    /** Author names in byline order */
    authors: string[];

    venue: string | null;

    /** Canonical ids of the works this publication cites */
    references: string[];

    /** Canonical ids of the works citing this publication */
    citations: string[];

    /** Citation count reported by the source (may exceed `citations.length`) */
    citation_count: number;

    /** Reference count reported by the source */
    reference_count: number;

    /** Publication year of linked works, as seen by the source, keyed by canonical id */
    linked_years: Record<string, number>;

    /** Client that produced or last enriched this record */
    source: SourceName;

    /** ISO timestamp of the last cache write */
    updated_at?: string;
}

/**
 * Partial identity used to resolve a publication.
 */
export interface PublicationHint {
    title?: string;
    doi?: string;
    eid?: string;
    dblp?: string;
}

/**
 * A link (reference or citation) as reported by a source.
 */
export interface RawLink {
    kind: IdKind;
    value: string;
    year?: number | null;
}

/**
 * Source-native data before normalization.
 * `id` is the identifier the source keys its citation links by.
 */
export interface RawRecord {
    id: { kind: IdKind; value: string };
    ids?: PublicationIds;
    title?: string | null;
    year?: number | null;
    abstract?: string | null;
    authors?: string[];
    venue?: string | null;
    references?: RawLink[];
    citations?: RawLink[];
    citation_count?: number;
    reference_count?: number;
}
