/**
 * Barrel export for all shared types.
 */
export { ID_KINDS } from './publication.js';
export type {
    IdKind,
    SourceName,
    PublicationIds,
    PublicationRecord,
    PublicationHint,
    RawLink,
    RawRecord,
} from './publication.js';
export { DEFAULT_CONFIG, scoringOptionsFrom } from './config.js';
export type { CitenetConfig, LogLevel, YearRange, ScoringOptions, RunRecord } from './config.js';
export type { SourceClient, SourceClientOptions } from './source-client.js';
