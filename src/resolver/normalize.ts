import type { PublicationIds, PublicationRecord, RawLink, RawRecord, SourceName } from '../types/index.js';
import { ID_KINDS } from '../types/index.js';
import { canonicalIdsOf, normalizeId, toCanonicalId } from './identifiers.js';

/**
 * A record is valid only if it carries some citation signal.
 * Isolated records are treated as not found.
 */
export function isValidRecord(record: Pick<PublicationRecord, 'references' | 'citations' | 'citation_count' | 'reference_count'>): boolean {
    return (
        record.references.length > 0 ||
        record.citations.length > 0 ||
        record.citation_count > 0 ||
        record.reference_count > 0
    );
}

/**
 * Every id that names this record: its canonical id plus its aliases.
 */
export function selfIds(record: Pick<PublicationRecord, 'canonical_id' | 'ids'>): Set<string> {
    return new Set([record.canonical_id, ...canonicalIdsOf(record.ids)]);
}

/**
 * Describe the first invariant a stored record violates, or null if it holds them all.
 */
export function findInvariantViolation(record: PublicationRecord): string | null {
    const own = selfIds(record);

    for (const [field, links] of [['references', record.references], ['citations', record.citations]] as const) {
        if (new Set(links).size !== links.length) return `duplicate ${field}`;
        for (const id of links) {
            if (own.has(id)) return `self-reference in ${field}`;
        }
    }

    if (!isValidRecord(record)) return 'no citation signal';
    return null;
}

/**
 * Normalize source-native data into a PublicationRecord.
 * Link ids are canonicalized and deduplicated; malformed ids and links back
 * to the record itself are dropped.
 */
export function normalizeRecord(raw: RawRecord, source: SourceName): PublicationRecord | null {
    const canonicalId = toCanonicalId(raw.id.kind, raw.id.value);
    if (!canonicalId) return null;

    const ids: PublicationIds = {};
    for (const kind of ID_KINDS) {
        const value = raw.ids?.[kind] ?? (raw.id.kind === kind ? raw.id.value : undefined);
        const normalized = value ? normalizeId(kind, value) : null;
        if (normalized) ids[kind] = normalized;
    }

    const own = selfIds({ canonical_id: canonicalId, ids });
    const linkedYears: Record<string, number> = {};
    const references = canonicalLinks(raw.references, own, linkedYears);
    const citations = canonicalLinks(raw.citations, own, linkedYears);

    return {
        canonical_id: canonicalId,
        ids,
        title: raw.title?.trim() ?? '',
        year: raw.year ?? null,
        abstract: raw.abstract?.trim() || null,
        authors: (raw.authors ?? []).map((a) => a.trim()).filter((a) => a.length > 0),
        venue: raw.venue?.trim() || null,
        references,
        citations,
        citation_count: Math.max(raw.citation_count ?? 0, citations.length),
        reference_count: Math.max(raw.reference_count ?? 0, references.length),
        linked_years: linkedYears,
        source,
    };
}

function canonicalLinks(
    links: RawLink[] | undefined,
    own: ReadonlySet<string>,
    linkedYears: Record<string, number>
): string[] {
    const out = new Set<string>();
    for (const link of links ?? []) {
        const id = toCanonicalId(link.kind, link.value);
        if (!id || own.has(id)) continue;
        out.add(id);
        if (typeof link.year === 'number') {
            linkedYears[id] = link.year;
        }
    }
    return [...out];
}
