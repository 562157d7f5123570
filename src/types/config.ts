import type { SourceName } from './publication.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Year window applied by the relationship scorer. Either bound may be absent.
 */
export interface YearRange {
    minYear?: number;
    maxYear?: number;
}

/**
 * Options for strong-relationship scoring.
 * `includeUnknownYear` decides whether a member without a known year survives
 * an active year filter.
 */
export interface ScoringOptions extends YearRange {
    sharedThreshold: number;
    includeUnknownYear: boolean;
}

/**
 * Full citenet configuration merged from CLI flags and config file.
 */
export interface CitenetConfig {
    // Scoring
    sharedThreshold: number;
    minYear?: number;
    maxYear?: number;
    includeUnknownYear: boolean;

    // Resolution
    sources: SourceName[];
    minTitleSimilarity: number;
    resolveRelated: boolean;
    maxRelatedPerSeed: number;
    maxCitations: number;

    // Network
    rateLimitDelayMs: number;
    requestTimeoutMs: number;
    mailto?: string;

    // Cache
    cache: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: CitenetConfig = {
    sharedThreshold: 0.1,
    includeUnknownYear: false,
    sources: ['crossref', 'scopus', 'dblp'],
    minTitleSimilarity: 0.9,
    resolveRelated: false,
    maxRelatedPerSeed: 200,
    maxCitations: 2000,
    rateLimitDelayMs: 1000,
    requestTimeoutMs: 30000,
    cache: './citenet.db',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    citenet_version: string;
    config_json: string;
    seed_count: number;
    stats_json: string;
}

/**
 * Extract the scoring options from a configuration value.
 */
export function scoringOptionsFrom(config: CitenetConfig): ScoringOptions {
    return {
        sharedThreshold: config.sharedThreshold,
        minYear: config.minYear,
        maxYear: config.maxYear,
        includeUnknownYear: config.includeUnknownYear,
    };
}
