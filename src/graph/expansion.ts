import type { PublicationRecord } from '../types/index.js';
import type { RecordIndex } from '../cache/record-cache.js';
import { selfIds } from '../resolver/normalize.js';

export interface ExpansionResult {
    /** Union of every found seed's references and citations, seeds excluded */
    related: Set<string>;

    /** Related ids of each found seed, keyed by its canonical id */
    bySeed: Map<string, Set<string>>;

    /** Seed ids with no record in the index */
    missingSeeds: string[];

    /** Records of the seeds that were found, in input order */
    seedRecords: PublicationRecord[];
}

/**
 * Related set of a group of seeds: the union of `references ∪ citations`
 * over all seeds, minus the seeds themselves.
 * Seeds must already be resolved; unknown seeds contribute nothing.
 */
export function expand(seedIds: Iterable<string>, index: RecordIndex): Set<string> {
    return expandNetwork(seedIds, index).related;
}

/**
 * `expand`, also reporting which seeds were missing from the index.
 * A seed is excluded under its given id and under every id of its record.
 * A link to a publication the index knows is reported under its canonical id,
 * so one publication linked by different ids counts once.
 */
export function expandNetwork(seedIds: Iterable<string>, index: RecordIndex): ExpansionResult {
    const excluded = new Set<string>();
    const seedRecords: PublicationRecord[] = [];
    const missingSeeds: string[] = [];

    for (const id of new Set(seedIds)) {
        excluded.add(id);
        const record = index.get(id);
        if (!record) {
            missingSeeds.push(id);
            continue;
        }
        if (seedRecords.some((seen) => seen.canonical_id === record.canonical_id)) continue;
        seedRecords.push(record);
        for (const own of selfIds(record)) excluded.add(own);
    }

    const related = new Set<string>();
    const bySeed = new Map<string, Set<string>>();
    for (const record of seedRecords) {
        const own = new Set<string>();
        for (const link of directLinks(record)) {
            const id = index.canonicalIdOf(link) ?? link;
            if (excluded.has(link) || excluded.has(id)) continue;
            own.add(id);
            related.add(id);
        }
        bySeed.set(record.canonical_id, own);
    }

    return { related, bySeed, missingSeeds, seedRecords };
}

/**
 * `references ∪ citations` of a single record.
 */
export function directLinks(record: Pick<PublicationRecord, 'references' | 'citations'>): Set<string> {
    return new Set([...record.references, ...record.citations]);
}
