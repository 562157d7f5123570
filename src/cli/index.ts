#!/usr/bin/env node
import { Command, Option } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { CitenetDatabase } from '../storage/database.js';
import { RecordCache } from '../cache/record-cache.js';
import { PublicationResolver, supportedIdKinds } from '../resolver/resolver.js';
import { createSources } from '../sources/index.js';
import { runPipeline } from '../builder/pipeline.js';
import { readSeedFile } from '../io/seeds.js';
import { exportCache, writeRunOutputs, EXPORT_FORMATS, type ExportFormat } from '../exporters/export.js';
import { configFlagsFrom, hintsFromOptions, type ConfigOptions, type SeedOptions } from './options.js';
import type { CitenetConfig, SourceClient } from '../types/index.js';
import { CITENET_VERSION } from '../version.js';

const program = new Command();

program
    .name('citenet')
    .description('Resolve seed publications, expand their citation network, and find strongly related work.')
    .version(CITENET_VERSION);

// ─── Shared setup ─────────────────────────────────────────

interface Runtime {
    config: CitenetConfig;
    db: CitenetDatabase;
    cache: RecordCache;
    httpClient: HttpClient;
    sources: SourceClient[];
    resolver: PublicationResolver;
}

async function setup(opts: ConfigOptions): Promise<Runtime> {
    const config = await resolveConfig(configFlagsFrom(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const httpClient = getHttpClient({
        timeout: config.requestTimeoutMs,
        delayMs: config.rateLimitDelayMs,
        version: CITENET_VERSION,
        email: config.mailto,
    });
    const db = new CitenetDatabase(config.cache);
    const cache = new RecordCache(db);
    const sources = createSources(config, httpClient);
    getLogger().debug(
        { sources: sources.map((s) => s.sourceId), idKinds: [...supportedIdKinds(sources)] },
        'Sources ready'
    );

    return { config, db, cache, httpClient, sources, resolver: new PublicationResolver(cache, sources) };
}

function withConfigOptions(command: Command): Command {
    return command
        .option('--sources <list>', 'Source priority, comma-separated: crossref,scopus,dblp')
        .option('--delay <ms>', 'Delay between network calls in ms')
        .option('--timeout <ms>', 'Request timeout in ms')
        .option('--mailto <email>', 'Contact email for the Crossref polite pool')
        .option('--min-similarity <fraction>', 'Minimum title similarity for title search hits')
        .option('--max-citations <n>', 'Cap on citing works fetched per publication')
        .option('--cache <path>', 'Record cache database path')
        .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
        .option('--json-logs', 'Output JSON logs');
}

function fail(message: string, error?: unknown): never {
    const detail = error instanceof Error ? error.message : error === undefined ? '' : String(error);
    getLogger().error({ error: detail || undefined }, message);
    console.error(detail ? `${message}: ${detail}` : message);
    process.exit(1);
}

// ─── RUN command ──────────────────────────────────────────

withConfigOptions(
    program
        .command('run')
        .description('Resolve seeds, expand the citation network, and score strong relationships')
        .option('--seeds <csv>', 'Seed CSV file (columns: title,id or doi,eid,dblp)')
        .option('--doi <dois...>', 'Seed DOIs')
        .option('--eid <eids...>', 'Seed Scopus EIDs')
        .option('--dblp <keys...>', 'Seed DBLP keys')
        .option('--title <titles...>', 'Seed titles')
        .option('--shared <fraction>', 'Shared threshold for co-citing / co-cited (0..1)')
        .option('--min-year <year>', 'Earliest publication year (inclusive)')
        .option('--max-year <year>', 'Latest publication year (inclusive)')
        .option('--include-unknown-year', 'Keep related works with unknown year when a year range is set')
        .option('--resolve-related', 'Resolve discovered works to score co-citing / co-cited relationships')
        .option('--max-related <n>', 'Cap on related works resolved per seed')
        .option('-o, --out <dir>', 'Output directory', './citenet-output')
).action(async (opts: ConfigOptions & SeedOptions & { seeds?: string; out: string }) => {
    const hints = hintsFromOptions(opts);
    let runtime: Runtime | undefined;

    try {
        if (opts.seeds) hints.push(...readSeedFile(opts.seeds).hints);
        if (hints.length === 0) fail('No seeds given: use --seeds, --doi, --eid, --dblp or --title');

        runtime = await setup(opts);
        const { cache, resolver, db, httpClient, config } = runtime;
        const result = await runPipeline(hints, { cache, resolver, runs: db, requests: httpClient }, config);
        const files = writeRunOutputs(result, opts.out, (id) => cache.canonicalIdOf(id) ?? id);

        const s = result.summary;
        console.log(`\nSeeds: ${s.resolved}/${s.seeds} resolved (${s.skipped} skipped)`);
        console.log(`Related: ${s.related}   Strongly related: ${s.strongRelated}`);
        if (config.resolveRelated) {
            console.log(`Related resolved: ${s.relatedResolved}, unresolved: ${s.relatedUnresolved}`);
        }
        const lookups = cache.stats();
        console.log(`Cache: ${lookups.hits} hits, ${lookups.misses} misses`);
        for (const file of files) console.log(`  wrote ${file}`);
    } catch (error) {
        fail('Run failed', error);
    } finally {
        runtime?.db.close();
    }
});

// ─── RESOLVE command ──────────────────────────────────────

withConfigOptions(
    program
        .command('resolve')
        .description('Resolve one publication and print its record as JSON')
        .option('--doi <doi>', 'DOI')
        .option('--eid <eid>', 'Scopus EID')
        .option('--dblp <key>', 'DBLP key')
        .option('--title <title>', 'Title')
).action(async (opts: ConfigOptions & { doi?: string; eid?: string; dblp?: string; title?: string }) => {
    const runtime = await setup(opts);
    try {
        const record = await runtime.resolver.resolve({
            doi: opts.doi,
            eid: opts.eid,
            dblp: opts.dblp,
            title: opts.title,
        });
        console.log(JSON.stringify(record, null, 2));
    } catch (error) {
        fail('Resolve failed', error);
    } finally {
        runtime.db.close();
    }
});

// ─── SEARCH command ───────────────────────────────────────

withConfigOptions(
    program
        .command('search')
        .description('Search sources by title or author (results are not cached)')
        .option('--title <title>', 'Title to look up')
        .option('--author <name>', 'Author to list publications for')
        .option('-n, --limit <n>', 'Maximum hits per source for author search', '10')
).action(async (opts: ConfigOptions & { title?: string; author?: string; limit: string }) => {
    if (!opts.title && !opts.author) fail('Give --title or --author');

    const runtime = await setup(opts);
    try {
        for (const source of runtime.sources) {
            if (opts.title && source.searchByTitle) {
                const hit = await source.searchByTitle(opts.title);
                console.log(hit
                    ? `${source.name}\t${hit.id.kind}:${hit.id.value}\t${hit.year ?? ''}\t${hit.title ?? ''}`
                    : `${source.name}\t(no match)`);
            }
            if (opts.author && source.searchByAuthor) {
                const hits = await source.searchByAuthor(opts.author, parseInt(opts.limit, 10));
                for (const hit of hits) {
                    console.log(`${source.name}\t${hit.id.kind}:${hit.id.value}\t${hit.year ?? ''}\t${hit.title ?? ''}`);
                }
            }
        }
    } catch (error) {
        fail('Search failed', error);
    } finally {
        runtime.db.close();
    }
});

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export cached records to JSON, CSV, GraphML, or an id list')
    .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('--cache <path>', 'Record cache database path')
    .option('-o, --out <path>', 'Output file path')
    .action(async (opts: { format: string; cache?: string; out?: string }) => {
        const format = EXPORT_FORMATS.find((f) => f === opts.format.toLowerCase());
        if (!format) {
            fail(`Invalid format: ${opts.format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
        }

        const config = await resolveConfig(configFlagsFrom({ cache: opts.cache }));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        const extensions: Record<ExportFormat, string> = {
            json: '.json', csv: '.csv', graphml: '.graphml', ids: '.txt',
        };
        const outputPath = opts.out ?? config.cache.replace(/\.db$/, '') + extensions[format];

        try {
            const count = exportCache(config.cache, outputPath, format);
            console.log(`Exported ${count} records to ${outputPath}`);
        } catch (error) {
            fail('Export failed', error);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show record cache statistics and past runs')
    .option('--cache <path>', 'Record cache database path')
    .action(async (opts: { cache?: string }) => {
        const config = await resolveConfig(configFlagsFrom({ cache: opts.cache }));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        try {
            const db = new CitenetDatabase(config.cache);
            const stats = db.getStats();
            const lastRun = db.getRuns().at(-1);
            db.close();

            console.log('\ncitenet record cache\n');
            console.log(`  Records: ${stats.records}`);
            console.log(`  Aliases: ${stats.aliases}`);
            console.log(`  Runs:    ${stats.runs}`);

            if (Object.keys(stats.recordsBySource).length > 0) {
                console.log('\n  Records by source:');
                for (const [source, count] of Object.entries(stats.recordsBySource)) {
                    console.log(`    ${source}: ${count}`);
                }
            }

            if (lastRun) {
                console.log(`\n  Last run: ${lastRun.created_at} (${lastRun.seed_count} seeds)`);
                console.log(`    ${lastRun.stats_json}`);
            }

            console.log('');
        } catch (error) {
            fail('Inspect failed', error);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the record cache')
    .argument('<action>', 'Action: delete | clear | stats')
    .argument('[id]', 'Record id or alias (for delete)')
    .option('--cache <path>', 'Record cache database path')
    .action(async (action: string, id: string | undefined, opts: { cache?: string }) => {
        const config = await resolveConfig(configFlagsFrom({ cache: opts.cache }));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        const db = new CitenetDatabase(config.cache);
        try {
            switch (action) {
                case 'delete': {
                    if (!id) fail('Usage: citenet cache delete <id>');
                    const deleted = new RecordCache(db).delete(id);
                    console.log(deleted ? `Deleted ${id}.` : `No cached record for ${id}.`);
                    break;
                }
                case 'clear': {
                    const removed = db.clearRecords();
                    console.log(`Cache cleared (${removed} records).`);
                    break;
                }
                case 'stats': {
                    const stats = db.getStats();
                    console.log(`Cache: ${stats.records} records, ${stats.aliases} aliases`);
                    break;
                }
                default:
                    fail(`Unknown action: ${action}. Valid: delete, clear, stats`);
            }
        } finally {
            db.close();
        }
    });

await program.parseAsync(process.argv);
