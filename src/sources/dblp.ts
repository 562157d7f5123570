import { XMLParser } from 'fast-xml-parser';
import type { IdKind, RawRecord, SourceClient, SourceClientOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { OpenCitationsClient } from './opencitations.js';
import { isNotFound, pickBestTitleMatch, stripDoiPrefix, stripMarkup, toArray } from './utils.js';

const logger = getLogger();

const DBLP_BASE = 'https://dblp.org';

/** Element names a DBLP record can be wrapped in */
const RECORD_TYPES = [
    'article', 'inproceedings', 'proceedings', 'book', 'incollection',
    'phdthesis', 'mastersthesis', 'www',
] as const;

/**
 * DBLP search API types (JSON format).
 */
interface DblpAuthor {
    '@pid'?: string;
    text?: string;
}

interface DblpHitInfo {
    key?: string;
    title?: string;
    year?: string;
    venue?: string | string[];
    doi?: string;
    ee?: string | string[];
    authors?: { author?: DblpAuthor | DblpAuthor[] };
}

interface DblpSearchResponse {
    result?: {
        hits?: {
            '@total'?: string;
            hit?: Array<{ info?: DblpHitInfo }>;
        };
    };
}

/**
 * Fields read from a record XML (`/rec/<key>.xml`).
 */
interface DblpRecordXml {
    key: string;
    title: string | null;
    year: number | null;
    authors: string[];
    venue: string | null;
    doi: string | null;
}

/**
 * DBLP source client.
 * DBLP has bibliographic data only; when a record has a DOI its links are
 * taken from OpenCitations and the record is keyed by DOI.
 *
 * @see https://dblp.org/faq/How+to+use+the+dblp+search+API.html
 */
export class DblpClient implements SourceClient {
    readonly name = 'DBLP';
    readonly sourceId = 'dblp' as const;
    readonly supportedIds: ReadonlySet<IdKind> = new Set<IdKind>(['dblp']);
    private httpClient: HttpClient;
    private readonly minTitleSimilarity: number;
    private readonly openCitations: OpenCitationsClient;
    private readonly parser = new XMLParser({
        ignoreAttributes: false,
        stopNodes: ['*.title'],
        isArray: (name) => name === 'author' || name === 'ee' || name === 'editor',
    });

    constructor(options?: SourceClientOptions & { openCitationsKey?: string }) {
        this.minTitleSimilarity = options?.minTitleSimilarity ?? 0.9;
        this.openCitations = new OpenCitationsClient(
            options?.openCitationsKey ?? process.env['OPENCITATIONS_API_KEY'],
            options?.maxCitations
        );
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
        this.openCitations.setHttpClient(client);
    }

    async fetchById(kind: IdKind, value: string): Promise<RawRecord | null> {
        if (kind !== 'dblp') return null;

        const url = `${DBLP_BASE}/rec/${value}.xml`;
        logger.debug({ url }, 'DBLP fetch record');

        let xml: string;
        try {
            const response = await this.httpClient.get<unknown>(url, { source: this.sourceId });
            if (typeof response.data !== 'string') return null;
            xml = response.data;
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }

        const rec = this.parseRecord(xml);
        if (!rec) {
            logger.debug({ key: value }, 'DBLP record XML has no publication element');
            return null;
        }

        const base: RawRecord = {
            id: rec.doi ? { kind: 'doi', value: rec.doi } : { kind: 'dblp', value: rec.key },
            ids: rec.doi ? { dblp: rec.key, doi: rec.doi } : { dblp: rec.key },
            title: rec.title,
            year: rec.year,
            authors: rec.authors,
            venue: rec.venue,
        };

        if (!rec.doi) return base;

        const links = await this.openCitations.fetchLinks(rec.doi, this.sourceId);
        return { ...base, references: links.references, citations: links.citations };
    }

    async searchByTitle(title: string): Promise<RawRecord | null> {
        const hits = await this.search(title, 10);
        const best = pickBestTitleMatch(title, hits, (hit) => hit.title, this.minTitleSimilarity);
        if (!best?.key) {
            logger.debug({ title, hits: hits.length }, 'No DBLP title match');
            return null;
        }
        return this.fetchById('dblp', best.key);
    }

    async searchByAuthor(author: string, limit = 10): Promise<RawRecord[]> {
        const hits = await this.search(`author:${author}`, limit);
        const records: RawRecord[] = [];
        for (const hit of hits) {
            if (!hit.key) continue;
            const doi = stripDoiPrefix(hit.doi);
            const venue = toArray(hit.venue)[0] ?? null;
            records.push({
                id: { kind: 'dblp', value: hit.key },
                ids: doi ? { dblp: hit.key, doi } : { dblp: hit.key },
                title: stripMarkup(hit.title),
                year: hit.year ? parseInt(hit.year, 10) : null,
                authors: toArray(hit.authors?.author).map((a) => a.text ?? '').filter((name) => name.length > 0),
                venue,
            });
        }
        return records;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async search(query: string, limit: number): Promise<DblpHitInfo[]> {
        const params = new URLSearchParams({ q: query, format: 'json', h: String(Math.min(limit, 1000)) });
        const url = `${DBLP_BASE}/search/publ/api?${params.toString()}`;
        logger.debug({ url }, 'DBLP search');

        const response = await this.httpClient.get<DblpSearchResponse>(url, { source: this.sourceId });
        const hits = response.data.result?.hits?.hit ?? [];
        return hits.flatMap((hit) => (hit.info ? [hit.info] : []));
    }

    /**
     * Read the first publication element of a DBLP record document.
     */
    parseRecord(xml: string): DblpRecordXml | null {
        const parsed: unknown = this.parser.parse(xml);
        const root = asObject(asObject(parsed)?.['dblp']);
        if (!root) return null;

        for (const type of RECORD_TYPES) {
            const element = asObject(root[type]);
            const key = textOf(element?.['@_key']);
            if (!element || !key) continue;

            const year = textOf(element['year']);
            const doi = toArray(element['ee'])
                .map(textOf)
                .map((ee) => (ee && /doi\.org\//i.test(ee) ? stripDoiPrefix(ee) : null))
                .find((value): value is string => value !== null) ?? null;

            return {
                key,
                title: stripMarkup(textOf(element['title'])),
                year: year && /^\d{4}$/.test(year) ? parseInt(year, 10) : null,
                authors: toArray(element['author'])
                    .map(textOf)
                    .filter((name): name is string => name !== null),
                venue: textOf(element['journal']) ?? textOf(element['booktitle']),
                doi,
            };
        }

        return null;
    }
}

function asObject(value: unknown): Record<string, unknown> | null {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
    return Object.fromEntries(Object.entries(value));
}

/**
 * Text of a parsed XML node: a bare value, or `#text` when the element has attributes.
 */
function textOf(value: unknown): string | null {
    if (typeof value === 'string') return value.trim() || null;
    if (typeof value === 'number') return String(value);
    const node = asObject(value);
    return node ? textOf(node['#text']) : null;
}
