import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CitenetConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Shape accepted in citenet.config.json. Every key is optional.
 */
const fileConfigSchema = z
    .object({
        sharedThreshold: z.number().min(0).max(1),
        minYear: z.number().int(),
        maxYear: z.number().int(),
        includeUnknownYear: z.boolean(),
        sources: z.array(z.enum(['crossref', 'scopus', 'dblp'])).min(1),
        minTitleSimilarity: z.number().min(0).max(1),
        resolveRelated: z.boolean(),
        maxRelatedPerSeed: z.number().int().positive(),
        maxCitations: z.number().int().positive(),
        rateLimitDelayMs: z.number().int().nonnegative(),
        requestTimeoutMs: z.number().int().positive(),
        mailto: z.string().email(),
        cache: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Validate a parsed config file. Throws a ZodError listing every bad key.
 */
export function parseFileConfig(raw: unknown): FileConfig {
    return fileConfigSchema.parse(raw);
}

/**
 * Load configuration from citenet.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('citenet', {
        searchPlaces: ['citenet.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (result && !result.isEmpty) {
        getLogger().debug({ path: result.filepath }, 'Loaded config file');
        return parseFileConfig(result.config);
    }

    return null;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 * `cliFlags` must only carry keys the user actually set.
 */
export async function resolveConfig(
    cliFlags: Partial<CitenetConfig>,
    searchFrom?: string
): Promise<CitenetConfig> {
    const fileConfig = await loadConfigFile(searchFrom);

    const merged: CitenetConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...cliFlags,
    };

    if (merged.minYear !== undefined && merged.maxYear !== undefined && merged.minYear > merged.maxYear) {
        throw new Error(`minYear (${merged.minYear}) is after maxYear (${merged.maxYear})`);
    }

    return merged;
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name] || undefined;
}
