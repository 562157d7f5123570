import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { PublicationRecord } from '../types/index.js';
import { CitenetDatabase } from '../storage/database.js';
import { RecordCache } from '../cache/record-cache.js';
import { buildCitationGraph, graphStats, type CitationGraph } from '../graph/citation-graph.js';
import type { PipelineResult } from '../builder/pipeline.js';
import { getLogger } from '../utils/logger.js';
import { CITENET_VERSION } from '../version.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'csv' | 'graphml' | 'ids';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv', 'graphml', 'ids'];

// ─── Cache Export ────────────────────────────────────────

/**
 * Export every cached record from a citenet database to a specified format.
 */
export function exportCache(
    dbPath: string,
    outputPath: string,
    format: ExportFormat
): number {
    const db = new CitenetDatabase(dbPath);

    try {
        const cache = new RecordCache(db);
        const records = cache
            .ids()
            .map((id) => cache.get(id))
            .filter((record): record is PublicationRecord => record !== undefined);

        let content: string;
        switch (format) {
            case 'json':
                content = exportJson(records);
                break;
            case 'csv':
                content = exportCsv(records);
                break;
            case 'graphml':
                content = exportGraphML(buildCitationGraph(records, [], (id) => cache.canonicalIdOf(id) ?? id));
                break;
            case 'ids':
                content = exportIds(records.map((r) => r.canonical_id));
                break;
            default:
                throw new Error(`Unsupported export format: ${String(format)}`);
        }

        writeFileSync(outputPath, content, 'utf-8');
        logger.info({ format, outputPath, records: records.length }, 'Cache exported');
        return records.length;
    } finally {
        db.close();
    }
}

// ─── Run Outputs ────────────────────────────────────────

/**
 * Files written after a pipeline run:
 * related_ids.txt, strong_related_ids.txt, records.json, citation_graph.graphml.
 */
export function writeRunOutputs(
    result: PipelineResult,
    outDir: string,
    canonicalOf: (id: string) => string = (id) => id
): string[] {
    mkdirSync(outDir, { recursive: true });

    const seedIds = result.seeds.flatMap((s) => (s.record ? [s.record.canonical_id] : []));
    const graph = buildCitationGraph(result.records, seedIds, canonicalOf);
    const files: Array<[string, string]> = [
        ['related_ids.txt', exportIds(result.related)],
        ['strong_related_ids.txt', exportIds(result.strongRelated)],
        ['records.json', exportJson(result.records)],
        ['citation_graph.graphml', exportGraphML(graph)],
    ];

    const written: string[] = [];
    for (const [name, content] of files) {
        const path = join(outDir, name);
        writeFileSync(path, content, 'utf-8');
        written.push(path);
    }

    logger.info({ outDir, files: written.length, ...graphStats(graph) }, 'Run outputs written');
    return written;
}

// ─── Format Implementations ─────────────────────────────

/**
 * One id per line, sorted, newline-terminated.
 */
export function exportIds(ids: Iterable<string>): string {
    const sorted = [...new Set(ids)].sort();
    return sorted.length > 0 ? `${sorted.join('\n')}\n` : '';
}

export function exportJson(records: readonly PublicationRecord[]): string {
    return JSON.stringify({
        citenet: {
            version: CITENET_VERSION,
            exported_at: new Date().toISOString(),
        },
        records: records.map((r) => ({
            id: r.canonical_id,
            ids: r.ids,
            source: r.source,
            title: r.title,
            year: r.year,
            venue: r.venue,
            authors: r.authors,
            abstract: r.abstract,
            citation_count: r.citation_count,
            reference_count: r.reference_count,
            references: r.references,
            citations: r.citations,
        })),
    }, null, 2);
}

const CSV_COLUMNS = [
    'canonical_id', 'doi', 'eid', 'dblp', 'title', 'year', 'venue', 'authors',
    'citation_count', 'reference_count', 'references', 'citations', 'source',
] as const;

export function exportCsv(records: readonly PublicationRecord[]): string {
    const quote = (s: string | null | undefined) => `"${(s ?? '').replace(/"/g, '""')}"`;

    let csv = `${CSV_COLUMNS.join(',')}\n`;
    for (const r of records) {
        csv += [
            quote(r.canonical_id),
            quote(r.ids.doi),
            quote(r.ids.eid),
            quote(r.ids.dblp),
            quote(r.title),
            r.year ?? '',
            quote(r.venue),
            quote(r.authors.join('; ')),
            r.citation_count,
            r.reference_count,
            r.references.length,
            r.citations.length,
            r.source,
        ].join(',') + '\n';
    }

    return csv;
}

export function exportGraphML(graph: CitationGraph): string {
    const esc = (s: string | null | undefined) =>
        (s ?? '').replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="title" for="node" attr.name="title" attr.type="string"/>
  <key id="year" for="node" attr.name="year" attr.type="int"/>
  <key id="resolved" for="node" attr.name="resolved" attr.type="boolean"/>
  <key id="seed" for="node" attr.name="seed" attr.type="boolean"/>
  <key id="kind" for="edge" attr.name="kind" attr.type="string"/>
  <graph id="citenet" edgedefault="directed">
`;

    graph.forEachNode((node, attributes) => {
        xml += `    <node id="${esc(node)}">\n`;
        if (attributes.title) xml += `      <data key="title">${esc(attributes.title)}</data>\n`;
        if (attributes.year !== null) xml += `      <data key="year">${attributes.year}</data>\n`;
        xml += `      <data key="resolved">${attributes.resolved}</data>
      <data key="seed">${attributes.seed}</data>
    </node>
`;
    });

    graph.forEachEdge((edge, attributes, source, target) => {
        xml += `    <edge id="${esc(edge)}" source="${esc(source)}" target="${esc(target)}">
      <data key="kind">${attributes.kind}</data>
    </edge>
`;
    });

    xml += `  </graph>
</graphml>
`;

    return xml;
}
