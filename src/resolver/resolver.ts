import type { IdKind, PublicationHint, PublicationRecord, RawRecord, SourceClient } from '../types/index.js';
import { ID_KINDS } from '../types/index.js';
import type { RecordCache } from '../cache/record-cache.js';
import { IncompleteDataError, NotFoundError, SourceUnavailableError, describeHint } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { canonicalIdsOf, isUsableHint, normalizeId, titleAlias } from './identifiers.js';
import { isValidRecord, normalizeRecord } from './normalize.js';

const logger = getLogger();

/**
 * One source call the resolver may make for a hint.
 */
interface Attempt {
    source: SourceClient;
    operation: 'fetchById' | 'searchByTitle';
    input: string;
    run: () => Promise<RawRecord | null>;
}

/**
 * Publication resolver. Turns a partial identity into a cached, validated record.
 *
 * Order of attempts:
 * 1. cache lookup for every identifier in the hint, then for the title
 *    of an earlier title search (no network)
 * 2. DOI lookup, then EID lookup, then DBLP key lookup, each across the
 *    sources in priority order
 * 3. title search across the sources in priority order
 *
 * The first valid record is written to the cache once and returned.
 */
export class PublicationResolver {
    constructor(
        private readonly cache: RecordCache,
        private readonly sources: readonly SourceClient[]
    ) {}

    async resolve(hint: PublicationHint): Promise<PublicationRecord> {
        if (!isUsableHint(hint)) {
            throw new NotFoundError(hint, 'Cannot resolve an empty hint');
        }

        const cached = this.fromCache(hint);
        if (cached) return cached;

        const attempted = new Set<string>();
        for (const attempt of this.planAttempts(hint)) {
            const key = `${attempt.source.sourceId}:${attempt.operation}:${attempt.input}`;
            if (attempted.has(key)) continue;
            attempted.add(key);

            const record = await this.tryAttempt(attempt);
            if (record) {
                const alias = attempt.operation === 'searchByTitle' ? titleAlias(attempt.input) : null;
                const stored = this.cache.put(record, alias ? [alias] : []);
                logger.info(
                    { id: stored.canonical_id, source: attempt.source.sourceId, via: attempt.operation },
                    'Resolved publication'
                );
                return stored;
            }
        }

        logger.warn({ hint: describeHint(hint) }, 'No source produced a valid record');
        throw new NotFoundError(hint);
    }

    /**
     * Cached record for the hint's identifiers, else for its title. A record
     * found by title is only taken when none of its ids contradicts the hint.
     */
    private fromCache(hint: PublicationHint): PublicationRecord | undefined {
        for (const id of canonicalIdsOf(hint)) {
            const cached = this.cache.get(id);
            if (cached && isValidRecord(cached)) return cached;
        }

        const alias = hint.title ? titleAlias(hint.title) : null;
        if (!alias || this.cache.canonicalIdOf(alias) === undefined) return undefined;

        const cached = this.cache.get(alias);
        if (!cached || !isValidRecord(cached)) return undefined;

        const conflicts = ID_KINDS.some((kind) => {
            const raw = hint[kind];
            const wanted = raw ? normalizeId(kind, raw) : null;
            const known = cached.ids[kind];
            return wanted !== null && known !== undefined && known !== wanted;
        });
        return conflicts ? undefined : cached;
    }

    private planAttempts(hint: PublicationHint): Attempt[] {
        const attempts: Attempt[] = [];

        for (const kind of ID_KINDS) {
            const raw = hint[kind];
            const value = raw ? normalizeId(kind, raw) : null;
            if (!value) continue;

            for (const source of this.sources) {
                const fetchById = source.fetchById?.bind(source);
                if (!fetchById || !source.supportedIds.has(kind)) continue;
                attempts.push({
                    source,
                    operation: 'fetchById',
                    input: `${kind}:${value}`,
                    run: () => fetchById(kind, value),
                });
            }
        }

        const title = hint.title?.trim();
        if (title) {
            for (const source of this.sources) {
                const searchByTitle = source.searchByTitle?.bind(source);
                if (!searchByTitle) continue;
                attempts.push({
                    source,
                    operation: 'searchByTitle',
                    input: title,
                    run: () => searchByTitle(title),
                });
            }
        }

        return attempts;
    }

    /**
     * Run one attempt. Transport failures and incomplete records are logged
     * and reported as null so the caller moves on to the next attempt.
     */
    private async tryAttempt(attempt: Attempt): Promise<PublicationRecord | null> {
        const source = attempt.source.sourceId;

        let raw: RawRecord | null;
        try {
            raw = await attempt.run();
        } catch (error) {
            const unavailable = new SourceUnavailableError(source, error);
            logger.warn({ source, input: attempt.input, error: unavailable.message }, 'Source failed, falling back');
            return null;
        }

        if (!raw) {
            logger.debug({ source, input: attempt.input }, 'Not found in source');
            return null;
        }

        const record = normalizeRecord(raw, source);
        if (!record || !isValidRecord(record)) {
            const incomplete = new IncompleteDataError(source, record?.canonical_id ?? `${raw.id.kind}:${raw.id.value}`);
            logger.warn({ source, input: attempt.input, error: incomplete.message }, 'Incomplete record, falling back');
            return null;
        }

        return record;
    }
}

/**
 * Identifier kinds a list of sources can look up, for diagnostics.
 */
export function supportedIdKinds(sources: readonly SourceClient[]): Set<IdKind> {
    const kinds = new Set<IdKind>();
    for (const source of sources) {
        if (!source.fetchById) continue;
        for (const kind of source.supportedIds) kinds.add(kind);
    }
    return kinds;
}
