import { z } from 'zod';
import type { PublicationIds, PublicationRecord } from '../types/index.js';
import type { RecordStore } from '../storage/database.js';
import { canonicalIdsOf } from '../resolver/identifiers.js';
import { findInvariantViolation, selfIds } from '../resolver/normalize.js';
import { CacheCorruptionError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

const storedRecordSchema = z.object({
    canonical_id: z.string().min(1),
    ids: z.object({ doi: z.string(), eid: z.string(), dblp: z.string() }).partial(),
    title: z.string(),
    year: z.number().int().nullable(),
    abstract: z.string().nullable(),
    authors: z.array(z.string()),
    venue: z.string().nullable(),
    references: z.array(z.string()),
    citations: z.array(z.string()),
    citation_count: z.number().int().nonnegative(),
    reference_count: z.number().int().nonnegative(),
    linked_years: z.record(z.number().int()),
    source: z.enum(['crossref', 'scopus', 'dblp']),
    updated_at: z.string().optional(),
});

/**
 * Read-only view of cached records, keyed by canonical id or alias.
 * The graph builder and scorer depend on this, never on the network.
 */
export interface RecordIndex {
    get(id: string): PublicationRecord | undefined;
    /** Canonical id of the stored record an identifier belongs to */
    canonicalIdOf(id: string): string | undefined;
}

/**
 * Persistent record cache with monotone merge-on-write.
 *
 * - `get` follows aliases, and reports corrupt entries as misses.
 * - `put` merges into the existing entry: empty values never overwrite
 *   non-empty ones, link sets are unioned, and the stored canonical id is kept.
 * - No TTL: entries live until deleted.
 */
export class RecordCache implements RecordIndex {
    private hits = 0;
    private misses = 0;

    constructor(private readonly store: RecordStore) {}

    /**
     * Look up a record by canonical id or any alias.
     */
    get(id: string): PublicationRecord | undefined {
        const canonicalId = this.store.resolveAlias(id) ?? id;
        const row = this.store.readRecord(canonicalId);
        if (!row) {
            this.misses++;
            return undefined;
        }

        try {
            const record = this.parse(canonicalId, row.data_json);
            this.hits++;
            logger.debug({ id, canonicalId }, 'Cache hit');
            return record;
        } catch (error) {
            if (!(error instanceof CacheCorruptionError)) throw error;
            this.misses++;
            logger.warn({ id: error.id, reason: error.reason }, 'Ignoring corrupt cache entry');
            return undefined;
        }
    }

    /**
     * Canonical id the cache knows an identifier by, without parsing the record.
     */
    canonicalIdOf(id: string): string | undefined {
        return this.store.resolveAlias(id);
    }

    /**
     * Merge a record into the cache and return what is now stored.
     * If any of the record's identifiers already belongs to a stored record,
     * the incoming data is merged into that one.
     * `extraAliases` are registered on top of the record's own identifiers.
     */
    put(record: PublicationRecord, extraAliases: readonly string[] = []): PublicationRecord {
        return this.store.transaction(() => {
            const targetId = this.findTarget(record);
            const existing = this.readForMerge(targetId);
            const merged = existing
                ? mergeRecords(existing, record)
                : { ...record, canonical_id: targetId };

            merged.updated_at = new Date().toISOString();

            this.store.writeRecord(
                {
                    canonical_id: merged.canonical_id,
                    source: merged.source,
                    data_json: JSON.stringify(merged),
                    updated_at: merged.updated_at,
                },
                [...selfIds(merged), record.canonical_id, ...extraAliases]
            );

            logger.debug({ canonicalId: merged.canonical_id, source: record.source, merged: existing !== undefined }, 'Cache write');
            return merged;
        });
    }

    /**
     * Remove a record (by canonical id or alias) so the next resolve re-fetches it.
     */
    delete(id: string): boolean {
        const canonicalId = this.store.resolveAlias(id) ?? id;
        return this.store.deleteRecord(canonicalId);
    }

    ids(): string[] {
        return this.store.listCanonicalIds();
    }

    stats(): { hits: number; misses: number } {
        return { hits: this.hits, misses: this.misses };
    }

    private findTarget(record: PublicationRecord): string {
        for (const id of [record.canonical_id, ...canonicalIdsOf(record.ids)]) {
            const existing = this.store.resolveAlias(id);
            if (existing) return existing;
        }
        return record.canonical_id;
    }

    /**
     * Existing entry to merge into. A corrupt entry is overwritten, not merged.
     */
    private readForMerge(canonicalId: string): PublicationRecord | undefined {
        const row = this.store.readRecord(canonicalId);
        if (!row) return undefined;
        try {
            return this.parse(canonicalId, row.data_json);
        } catch (error) {
            if (!(error instanceof CacheCorruptionError)) throw error;
            logger.warn({ id: canonicalId, reason: error.reason }, 'Overwriting corrupt cache entry');
            return undefined;
        }
    }

    private parse(canonicalId: string, json: string): PublicationRecord {
        let raw: unknown;
        try {
            raw = JSON.parse(json);
        } catch {
            throw new CacheCorruptionError(canonicalId, 'unparseable JSON');
        }

        const result = storedRecordSchema.safeParse(raw);
        if (!result.success) {
            throw new CacheCorruptionError(canonicalId, result.error.issues[0]?.message ?? 'schema mismatch');
        }

        const record: PublicationRecord = result.data;
        if (record.canonical_id !== canonicalId) {
            throw new CacheCorruptionError(canonicalId, `stored under ${record.canonical_id}`);
        }

        const violation = findInvariantViolation(record);
        if (violation) {
            throw new CacheCorruptionError(canonicalId, violation);
        }

        return record;
    }
}

/**
 * Monotone merge of `incoming` into `existing`.
 * Scalars: last non-empty writer wins. Link sets: union. The existing canonical id is kept.
 */
export function mergeRecords(existing: PublicationRecord, incoming: PublicationRecord): PublicationRecord {
    const ids: PublicationIds = { ...existing.ids };
    for (const [kind, value] of Object.entries(incoming.ids)) {
        if (value && (kind === 'doi' || kind === 'eid' || kind === 'dblp')) {
            ids[kind] = ids[kind] ?? value;
        }
    }

    const own = new Set([...selfIds({ canonical_id: existing.canonical_id, ids }), ...selfIds(incoming)]);
    const union = (a: string[], b: string[]) => [...new Set([...a, ...b])].filter((id) => !own.has(id));

    const linkedYears = { ...existing.linked_years };
    for (const [id, year] of Object.entries(incoming.linked_years)) {
        linkedYears[id] = year;
    }

    return {
        canonical_id: existing.canonical_id,
        ids,
        title: incoming.title || existing.title,
        year: incoming.year ?? existing.year,
        abstract: incoming.abstract || existing.abstract,
        authors: incoming.authors.length > 0 ? incoming.authors : existing.authors,
        venue: incoming.venue || existing.venue,
        references: union(existing.references, incoming.references),
        citations: union(existing.citations, incoming.citations),
        citation_count: incoming.citation_count > 0 ? incoming.citation_count : existing.citation_count,
        reference_count: incoming.reference_count > 0 ? incoming.reference_count : existing.reference_count,
        linked_years: linkedYears,
        source: incoming.source,
        updated_at: existing.updated_at,
    };
}
