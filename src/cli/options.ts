import type { PublicationHint } from '../types/index.js';
import { parseFileConfig, type FileConfig } from '../utils/config.js';

/**
 * Raw commander options shared by the commands that take configuration.
 * Values stay strings until validated; an absent flag is undefined.
 */
export interface ConfigOptions {
    shared?: string;
    minYear?: string;
    maxYear?: string;
    includeUnknownYear?: boolean;
    resolveRelated?: boolean;
    maxRelated?: string;
    maxCitations?: string;
    minSimilarity?: string;
    sources?: string;
    delay?: string;
    timeout?: string;
    mailto?: string;
    cache?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

export interface SeedOptions {
    doi?: string[];
    eid?: string[];
    dblp?: string[];
    title?: string[];
}

/**
 * Turn the flags the user actually passed into config overrides, validated
 * with the same schema as citenet.config.json.
 */
export function configFlagsFrom(opts: ConfigOptions): FileConfig {
    const raw: Record<string, unknown> = {};
    const num = (value: string | undefined) => (value === undefined ? undefined : Number(value));

    const entries: Array<[string, unknown]> = [
        ['sharedThreshold', num(opts.shared)],
        ['minYear', num(opts.minYear)],
        ['maxYear', num(opts.maxYear)],
        ['includeUnknownYear', opts.includeUnknownYear],
        ['resolveRelated', opts.resolveRelated],
        ['maxRelatedPerSeed', num(opts.maxRelated)],
        ['maxCitations', num(opts.maxCitations)],
        ['minTitleSimilarity', num(opts.minSimilarity)],
        ['sources', opts.sources?.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean)],
        ['rateLimitDelayMs', num(opts.delay)],
        ['requestTimeoutMs', num(opts.timeout)],
        ['mailto', opts.mailto],
        ['cache', opts.cache],
        ['logLevel', opts.logLevel],
        ['jsonLogs', opts.jsonLogs],
    ];

    for (const [key, value] of entries) {
        if (value !== undefined) raw[key] = value;
    }

    return parseFileConfig(raw);
}

/**
 * One hint per identifier or title given on the command line.
 */
export function hintsFromOptions(opts: SeedOptions): PublicationHint[] {
    return [
        ...(opts.doi ?? []).map((doi): PublicationHint => ({ doi })),
        ...(opts.eid ?? []).map((eid): PublicationHint => ({ eid })),
        ...(opts.dblp ?? []).map((dblp): PublicationHint => ({ dblp })),
        ...(opts.title ?? []).map((title): PublicationHint => ({ title })),
    ];
}
