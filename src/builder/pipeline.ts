import type { CitenetConfig, PublicationHint, PublicationRecord, RunRecord } from '../types/index.js';
import { scoringOptionsFrom } from '../types/index.js';
import type { RecordCache } from '../cache/record-cache.js';
import type { PublicationResolver } from '../resolver/resolver.js';
import { describeHint, NotFoundError } from '../utils/errors.js';
import { hintFromId } from '../resolver/identifiers.js';
import { expandNetwork } from '../graph/expansion.js';
import { scoreRelationships, type RelationshipBreakdown } from '../graph/scoring.js';
import { getLogger } from '../utils/logger.js';
import { CITENET_VERSION } from '../version.js';

const logger = getLogger();

/**
 * Collaborators of a pipeline run. `runs` and `requests` are optional so the
 * pipeline can run against an in-memory cache in tests.
 */
export interface PipelineDeps {
    cache: RecordCache;
    resolver: Pick<PublicationResolver, 'resolve'>;
    runs?: { insertRun(run: Omit<RunRecord, 'run_id'>): number };
    requests?: { getAllRequestCounts(): Record<string, number> };
}

export interface SeedResult {
    hint: PublicationHint;
    record: PublicationRecord | null;
    /** `references ∪ citations` of this seed, other seeds excluded */
    related: Set<string>;
    strong: RelationshipBreakdown | null;
    error?: string;
}

export interface PipelineSummary {
    seeds: number;
    resolved: number;
    skipped: number;
    related: number;
    strongRelated: number;
    relatedResolved: number;
    relatedUnresolved: number;
    requests: Record<string, number>;
    elapsedMs: number;
}

export interface PipelineResult {
    seeds: SeedResult[];
    related: Set<string>;
    strongRelated: Set<string>;
    /** Seed records followed by every related record available for scoring */
    records: PublicationRecord[];
    summary: PipelineSummary;
    runId?: number;
}

/**
 * Main pipeline, strictly sequential:
 *
 * 1. Resolve every seed (a failed seed is logged and skipped)
 * 2. Expand the resolved seeds into the related set
 * 3. Collect a scoring pool: cached related records, plus freshly resolved
 *    ones when `resolveRelated` is set
 * 4. Score each seed against the pool
 * 5. Record the run
 */
export async function runPipeline(
    seeds: readonly PublicationHint[],
    deps: PipelineDeps,
    config: CitenetConfig
): Promise<PipelineResult> {
    const startTime = Date.now();
    const requestsBefore = deps.requests?.getAllRequestCounts() ?? {};

    logger.info(
        { seeds: seeds.length, sources: config.sources, sharedThreshold: config.sharedThreshold, resolveRelated: config.resolveRelated },
        'Starting pipeline'
    );

    // ──────────────────────────────────────────────────
    // Step 1: Seeds
    // ──────────────────────────────────────────────────
    const seedResults: SeedResult[] = [];
    for (const [i, hint] of seeds.entries()) {
        logger.info({ seed: i + 1, of: seeds.length, hint: describeHint(hint) }, 'Resolving seed');
        try {
            const record = await deps.resolver.resolve(hint);
            seedResults.push({ hint, record, related: new Set(), strong: null });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            if (error instanceof NotFoundError) {
                logger.warn({ hint: describeHint(hint) }, 'Seed not found, skipping');
            } else {
                logger.error({ hint: describeHint(hint), error: message }, 'Seed failed, skipping');
            }
            seedResults.push({ hint, record: null, related: new Set(), strong: null, error: message });
        }
    }

    const resolvedSeeds = seedResults.flatMap((s) => (s.record ? [s.record] : []));

    // ──────────────────────────────────────────────────
    // Step 2: Expansion
    // ──────────────────────────────────────────────────
    const seedIds = resolvedSeeds.map((r) => r.canonical_id);
    let related = expandInto(seedResults, seedIds, deps.cache);
    logger.info({ seeds: resolvedSeeds.length, related: related.size }, 'Related set expanded');

    // ──────────────────────────────────────────────────
    // Step 3: Scoring pool
    // ──────────────────────────────────────────────────
    const pool = new Map<string, PublicationRecord | null>();
    let relatedResolved = 0;
    let relatedUnresolved = 0;

    for (const result of seedResults) {
        if (!result.record) continue;
        const candidates = [...result.related].slice(0, config.resolveRelated ? config.maxRelatedPerSeed : undefined);

        for (const id of candidates) {
            if (pool.has(id)) continue;
            const record = config.resolveRelated
                ? await resolveQuietly(id, deps)
                : deps.cache.get(id) ?? null;
            pool.set(id, record);
            if (record) relatedResolved++;
            else relatedUnresolved++;
        }
    }

    if (config.resolveRelated) {
        // Newly cached records can show that two link ids name one publication.
        related = expandInto(seedResults, seedIds, deps.cache);
    }

    const poolRecords = uniqueRecords(pool.values());
    logger.info({ pool: poolRecords.length, unresolved: relatedUnresolved }, 'Scoring pool ready');

    // ──────────────────────────────────────────────────
    // Step 4: Scoring
    // ──────────────────────────────────────────────────
    const options = scoringOptionsFrom(config);
    const strongRelated = new Set<string>();
    for (const result of seedResults) {
        if (!result.record) continue;
        result.strong = scoreRelationships(result.record, poolRecords, options);
        for (const id of result.strong.all) strongRelated.add(id);
        logger.info(
            {
                id: result.record.canonical_id,
                references: result.strong.references.size,
                citations: result.strong.citations.size,
                coCiting: result.strong.coCiting.size,
                coCited: result.strong.coCited.size,
            },
            'Seed scored'
        );
    }

    // ──────────────────────────────────────────────────
    // Step 5: Summary + run metadata
    // ──────────────────────────────────────────────────
    const summary: PipelineSummary = {
        seeds: seeds.length,
        resolved: resolvedSeeds.length,
        skipped: seeds.length - resolvedSeeds.length,
        related: related.size,
        strongRelated: strongRelated.size,
        relatedResolved,
        relatedUnresolved,
        requests: requestDelta(requestsBefore, deps.requests?.getAllRequestCounts() ?? {}),
        elapsedMs: Date.now() - startTime,
    };

    const runId = deps.runs?.insertRun({
        created_at: new Date().toISOString(),
        citenet_version: CITENET_VERSION,
        config_json: JSON.stringify(config),
        seed_count: seeds.length,
        stats_json: JSON.stringify(summary),
    });

    logger.info(
        { resolved: summary.resolved, skipped: summary.skipped, related: summary.related, strongRelated: summary.strongRelated, elapsed: `${(summary.elapsedMs / 1000).toFixed(1)}s` },
        'Pipeline complete'
    );

    return {
        seeds: seedResults,
        related,
        strongRelated,
        records: uniqueRecords([...resolvedSeeds, ...poolRecords]),
        summary,
        runId,
    };
}

// ─── Internal helpers ─────────────────────────────────

/**
 * Expand the seeds against the cache and set each seed's own related ids.
 */
function expandInto(seedResults: SeedResult[], seedIds: readonly string[], cache: RecordCache): Set<string> {
    const { related, bySeed } = expandNetwork(seedIds, cache);
    for (const result of seedResults) {
        if (!result.record) continue;
        result.related = bySeed.get(result.record.canonical_id) ?? new Set();
    }
    return related;
}

/**
 * Resolve a discovered id; a miss is expected for many links and only logged at debug.
 * Any other failure is logged and the id left unresolved, so one bad link never ends the run.
 */
async function resolveQuietly(id: string, deps: PipelineDeps): Promise<PublicationRecord | null> {
    const cached = deps.cache.get(id);
    if (cached) return cached;

    const hint = hintFromId(id);
    if (!hint) {
        logger.debug({ id }, 'Unrecognized related id');
        return null;
    }

    try {
        return await deps.resolver.resolve(hint);
    } catch (error) {
        if (error instanceof NotFoundError) {
            logger.debug({ id }, 'Related publication not resolved');
        } else {
            logger.error({ id, error: error instanceof Error ? error.message : String(error) }, 'Related publication failed');
        }
        return null;
    }
}

function uniqueRecords(records: Iterable<PublicationRecord | null>): PublicationRecord[] {
    const byId = new Map<string, PublicationRecord>();
    for (const record of records) {
        if (record && !byId.has(record.canonical_id)) byId.set(record.canonical_id, record);
    }
    return [...byId.values()];
}

function requestDelta(before: Record<string, number>, after: Record<string, number>): Record<string, number> {
    const delta: Record<string, number> = {};
    for (const [source, count] of Object.entries(after)) {
        const made = count - (before[source] ?? 0);
        if (made > 0) delta[source] = made;
    }
    return delta;
}
