import type { IdKind, RawLink, RawRecord, SourceClient, SourceClientOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { isNotFound, pickBestTitleMatch, stripDoiPrefix, stripMarkup, toArray, yearFromDate } from './utils.js';

const logger = getLogger();

const SCOPUS_BASE = 'https://api.elsevier.com/content';

/** Scopus search pages are capped at 200 entries */
const PAGE_SIZE = 200;

/**
 * Scopus API response types (subset of relevant fields).
 * Single-element lists may arrive as bare objects.
 */
interface ScopusCoredata {
    eid?: string;
    'dc:title'?: string;
    'dc:description'?: string;
    'prism:coverDate'?: string;
    'prism:publicationName'?: string;
    'prism:doi'?: string;
    'citedby-count'?: string;
    'dc:creator'?: { author?: ScopusAuthor | ScopusAuthor[] };
}

interface ScopusAuthor {
    'ce:indexed-name'?: string;
    'preferred-name'?: { 'ce:indexed-name'?: string };
}

interface ScopusReference {
    'scopus-eid'?: string;
    'scopus-id'?: string;
    title?: string;
    'prism:coverDate'?: string;
}

interface ScopusAbstractResponse {
    'abstracts-retrieval-response'?: {
        coredata?: ScopusCoredata;
        authors?: { author?: ScopusAuthor | ScopusAuthor[] };
        references?: {
            '@total-references'?: string;
            reference?: ScopusReference | ScopusReference[];
        };
    };
}

interface ScopusSearchEntry {
    eid?: string;
    'dc:title'?: string;
    'prism:coverDate'?: string;
    'prism:doi'?: string;
    'prism:publicationName'?: string;
    'dc:creator'?: string;
    'citedby-count'?: string;
    error?: string;
}

interface ScopusSearchResponse {
    'search-results'?: {
        'opensearch:totalResults'?: string;
        entry?: ScopusSearchEntry[];
    };
}

/**
 * Scopus source client (Elsevier APIs).
 * References come from the abstract retrieval REF view, citations from a
 * paginated `REFEID()` search. Requires an API key.
 *
 * @see https://dev.elsevier.com/
 */
export class ScopusClient implements SourceClient {
    readonly name = 'Scopus';
    readonly sourceId = 'scopus' as const;
    readonly supportedIds: ReadonlySet<IdKind> = new Set<IdKind>(['eid']);
    private httpClient: HttpClient;
    private readonly apiKey: string;
    private readonly minTitleSimilarity: number;
    private readonly maxCitations: number;

    constructor(options: SourceClientOptions & { apiKey: string }) {
        this.apiKey = options.apiKey;
        this.minTitleSimilarity = options.minTitleSimilarity ?? 0.9;
        this.maxCitations = options.maxCitations ?? 2000;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async fetchById(kind: IdKind, value: string): Promise<RawRecord | null> {
        if (kind !== 'eid') return null;

        const metadata = await this.fetchAbstract(value, 'META_ABS');
        if (!metadata) return null;

        const refView = await this.fetchAbstract(value, 'REF');
        const references: RawLink[] = [];
        for (const ref of toArray(refView?.references?.reference)) {
            const eid = ref['scopus-eid'] ?? ref['scopus-id'];
            if (eid) references.push({ kind: 'eid', value: eid, year: yearFromDate(ref['prism:coverDate']) });
        }

        const citations = await this.fetchCitations(value);
        const coredata = metadata.coredata ?? {};
        const doi = stripDoiPrefix(coredata['prism:doi']);
        const authors = toArray(metadata.authors?.author ?? coredata['dc:creator']?.author)
            .map((a) => a['ce:indexed-name'] ?? a['preferred-name']?.['ce:indexed-name'] ?? '')
            .filter((name) => name.length > 0);

        return {
            id: { kind: 'eid', value },
            ids: doi ? { eid: value, doi } : { eid: value },
            title: stripMarkup(coredata['dc:title']),
            year: yearFromDate(coredata['prism:coverDate']),
            abstract: stripMarkup(coredata['dc:description']),
            authors,
            venue: coredata['prism:publicationName'] ?? null,
            references,
            citations,
            citation_count: parseCount(coredata['citedby-count']),
            reference_count: parseCount(refView?.references?.['@total-references']),
        };
    }

    async searchByTitle(title: string): Promise<RawRecord | null> {
        const entries = await this.search(`TITLE("${title.replace(/"/g, '')}")`, 0, 10);
        const best = pickBestTitleMatch(title, entries, (entry) => stripMarkup(entry['dc:title']), this.minTitleSimilarity);
        if (!best?.eid) {
            logger.debug({ title, hits: entries.length }, 'No Scopus title match');
            return null;
        }
        return this.fetchById('eid', best.eid.replace(/^2-s2\.0-/, ''));
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchAbstract(
        eid: string,
        view: 'META_ABS' | 'REF'
    ): Promise<NonNullable<ScopusAbstractResponse['abstracts-retrieval-response']> | null> {
        const url = `${SCOPUS_BASE}/abstract/eid/2-s2.0-${eid}?view=${view}`;
        logger.debug({ url }, 'Scopus abstract retrieval');

        try {
            const response = await this.httpClient.get<ScopusAbstractResponse>(url, {
                headers: this.headers(),
                source: this.sourceId,
            });
            return response.data['abstracts-retrieval-response'] ?? null;
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
    }

    /**
     * Page through `REFEID()` results until the total or `maxCitations` is reached.
     */
    private async fetchCitations(eid: string): Promise<RawLink[]> {
        const citations: RawLink[] = [];
        let start = 0;

        while (citations.length < this.maxCitations) {
            const count = Math.min(PAGE_SIZE, this.maxCitations - citations.length);
            const { entries, total } = await this.searchPage(`REFEID(2-s2.0-${eid})`, start, count);

            for (const entry of entries) {
                if (!entry.eid) continue;
                citations.push({ kind: 'eid', value: entry.eid, year: yearFromDate(entry['prism:coverDate']) });
            }

            start += PAGE_SIZE;
            if (entries.length === 0 || start >= total) break;
        }

        logger.debug({ eid, citations: citations.length }, 'Scopus citations fetched');
        return citations.slice(0, this.maxCitations);
    }

    private async search(query: string, start: number, count: number): Promise<ScopusSearchEntry[]> {
        return (await this.searchPage(query, start, count)).entries;
    }

    private async searchPage(
        query: string,
        start: number,
        count: number
    ): Promise<{ entries: ScopusSearchEntry[]; total: number }> {
        const params = new URLSearchParams({ query, start: String(start), count: String(count) });
        const url = `${SCOPUS_BASE}/search/scopus?${params.toString()}`;
        logger.debug({ url }, 'Scopus search');

        const response = await this.httpClient.get<ScopusSearchResponse>(url, {
            headers: this.headers(),
            source: this.sourceId,
        });
        const results = response.data['search-results'];

        // An empty result set comes back as a single entry carrying `error`
        const entries = (results?.entry ?? []).filter((entry) => !entry.error);
        return { entries, total: parseCount(results?.['opensearch:totalResults']) };
    }

    private headers(): Record<string, string> {
        return { 'X-ELS-APIKey': this.apiKey, Accept: 'application/json' };
    }
}

function parseCount(value: string | undefined): number {
    const parsed = value ? parseInt(value, 10) : 0;
    return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}
