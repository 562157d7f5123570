import type { PublicationRecord, ScoringOptions } from '../types/index.js';
import { selfIds } from '../resolver/normalize.js';

/**
 * Strong relationships of one seed, by kind.
 * The same id may appear under several kinds; `all` is their union after the year filter.
 */
export interface RelationshipBreakdown {
    references: Set<string>;
    citations: Set<string>;
    coCiting: Set<string>;
    coCited: Set<string>;
    all: Set<string>;
}

type ScoredRecord = Pick<PublicationRecord, 'canonical_id' | 'ids' | 'references' | 'citations' | 'year'>;

/**
 * Strong citation relationships of `seed` within `pool`:
 * direct references, direct citations, and pool members whose reference
 * (co-citing) or citation (co-cited) overlap with the seed reaches
 * `sharedThreshold` of the seed's own list.
 */
export function strongRelated(
    seed: ScoredRecord & Pick<PublicationRecord, 'linked_years'>,
    pool: Iterable<ScoredRecord>,
    options: ScoringOptions
): Set<string> {
    return scoreRelationships(seed, pool, options).all;
}

export function scoreRelationships(
    seed: ScoredRecord & Pick<PublicationRecord, 'linked_years'>,
    pool: Iterable<ScoredRecord>,
    options: ScoringOptions
): RelationshipBreakdown {
    const byId = new Map<string, ScoredRecord>();
    for (const record of pool) {
        for (const id of selfIds(record)) {
            if (!byId.has(id)) byId.set(id, record);
        }
    }

    // A pool member is known by its canonical id, whichever id a link uses.
    const canonical = (id: string): string => byId.get(id)?.canonical_id ?? id;
    const canonicalAll = (ids: readonly string[]): string[] => ids.map(canonical);

    const seedRefs = new Set(canonicalAll(seed.references));
    const seedCites = new Set(canonicalAll(seed.citations));
    const own = selfIds(seed);

    const coCiting = new Set<string>();
    const coCited = new Set<string>();
    for (const candidate of new Set(byId.values())) {
        if (own.has(candidate.canonical_id)) continue;

        if (meetsThreshold(canonicalAll(candidate.references), seedRefs, options.sharedThreshold)) {
            coCiting.add(candidate.canonical_id);
        }
        if (meetsThreshold(canonicalAll(candidate.citations), seedCites, options.sharedThreshold)) {
            coCited.add(candidate.canonical_id);
        }
    }

    const yearOf = (id: string): number | null => byId.get(id)?.year ?? linkedYear(seed, id, byId.get(id));
    const keep = (id: string): boolean => !own.has(id) && inYearRange(yearOf(id), options);

    const references = filterSet(seedRefs, keep);
    const citations = filterSet(seedCites, keep);
    const strongCoCiting = filterSet(coCiting, keep);
    const strongCoCited = filterSet(coCited, keep);

    return {
        references,
        citations,
        coCiting: strongCoCiting,
        coCited: strongCoCited,
        all: new Set([...references, ...citations, ...strongCoCiting, ...strongCoCited]),
    };
}

/**
 * `|candidate ∩ seed| / |seed| >= threshold`; never true for an empty seed list.
 */
export function meetsThreshold(candidate: readonly string[], seed: ReadonlySet<string>, threshold: number): boolean {
    if (seed.size === 0) return false;
    return overlapCount(candidate, seed) / seed.size >= threshold;
}

export function overlapCount(candidate: readonly string[], seed: ReadonlySet<string>): number {
    let shared = 0;
    for (const id of new Set(candidate)) {
        if (seed.has(id)) shared++;
    }
    return shared;
}

/**
 * Inclusive year bounds. Without bounds everything passes, unknown years included.
 */
export function inYearRange(
    year: number | null,
    options: Pick<ScoringOptions, 'minYear' | 'maxYear' | 'includeUnknownYear'>
): boolean {
    if (options.minYear === undefined && options.maxYear === undefined) return true;
    if (year === null) return options.includeUnknownYear;
    if (options.minYear !== undefined && year < options.minYear) return false;
    if (options.maxYear !== undefined && year > options.maxYear) return false;
    return true;
}

/**
 * Year the seed's source reported for a link, under any id of the linked record.
 */
function linkedYear(
    seed: Pick<PublicationRecord, 'linked_years'>,
    id: string,
    record: ScoredRecord | undefined
): number | null {
    for (const alias of record ? selfIds(record) : [id]) {
        const year = seed.linked_years[alias];
        if (year !== undefined) return year;
    }
    return null;
}

function filterSet(ids: Iterable<string>, keep: (id: string) => boolean): Set<string> {
    const out = new Set<string>();
    for (const id of ids) {
        if (keep(id)) out.add(id);
    }
    return out;
}
