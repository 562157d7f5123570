import type { IdKind, RawRecord, SourceClient, SourceClientOptions } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { OpenCitationsClient } from './opencitations.js';
import { isNotFound, pickBestTitleMatch, stripDoiPrefix, stripMarkup, yearFromDateParts } from './utils.js';

const logger = getLogger();

const CROSSREF_BASE = 'https://api.crossref.org';

type CrossrefDate = { 'date-parts'?: Array<Array<number | null>> } | null;

/**
 * Crossref works API types (subset of relevant fields).
 */
interface CrossrefWork {
    DOI?: string;
    title?: string[];
    abstract?: string;
    author?: Array<{ given?: string; family?: string; name?: string }>;
    'container-title'?: string[];
    'published-print'?: CrossrefDate;
    published?: CrossrefDate;
    issued?: CrossrefDate;
    created?: CrossrefDate;
    'is-referenced-by-count'?: number;
    'reference-count'?: number;
}

interface CrossrefWorkResponse {
    status: string;
    message: CrossrefWork;
}

interface CrossrefSearchResponse {
    status: string;
    message: { 'total-results'?: number; items?: CrossrefWork[] };
}

/**
 * Crossref source client.
 * Metadata comes from Crossref; references and citations from OpenCitations,
 * since Crossref's cited-by data needs membership.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefClient implements SourceClient {
    readonly name = 'Crossref';
    readonly sourceId = 'crossref' as const;
    readonly supportedIds: ReadonlySet<IdKind> = new Set<IdKind>(['doi']);
    private httpClient: HttpClient;
    private readonly email?: string;
    private readonly minTitleSimilarity: number;
    private readonly openCitations: OpenCitationsClient;

    constructor(options?: SourceClientOptions & { openCitationsKey?: string }) {
        this.email = options?.email ?? process.env['CROSSREF_MAILTO'];
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
        if (kind !== 'doi') return null;

        const work = await this.fetchWork(value);
        if (!work) return null;

        const doi = stripDoiPrefix(work.DOI) ?? value;
        const links = await this.openCitations.fetchLinks(doi, this.sourceId);

        return {
            ...this.normalizeWork(work, doi),
            references: links.references,
            citations: links.citations,
        };
    }

    async searchByTitle(title: string): Promise<RawRecord | null> {
        const params = this.params({ 'query.title': title, rows: '10' });
        const url = `${CROSSREF_BASE}/works?${params.toString()}`;
        logger.debug({ url }, 'Crossref title search');

        const response = await this.httpClient.get<CrossrefSearchResponse>(url, { source: this.sourceId });
        const items = response.data.message.items ?? [];

        const best = pickBestTitleMatch(title, items, (item) => item.title?.[0], this.minTitleSimilarity);
        const doi = stripDoiPrefix(best?.DOI);
        if (!doi) {
            logger.debug({ title, hits: items.length }, 'No Crossref title match');
            return null;
        }

        return this.fetchById('doi', doi);
    }

    async searchByAuthor(author: string, limit = 10): Promise<RawRecord[]> {
        const params = this.params({ 'query.author': author, rows: String(Math.min(limit, 100)) });
        const url = `${CROSSREF_BASE}/works?${params.toString()}`;
        logger.debug({ url }, 'Crossref author search');

        const response = await this.httpClient.get<CrossrefSearchResponse>(url, { source: this.sourceId });
        const records: RawRecord[] = [];
        for (const item of response.data.message.items ?? []) {
            const doi = stripDoiPrefix(item.DOI);
            if (doi) records.push(this.normalizeWork(item, doi));
        }
        return records;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchWork(doi: string): Promise<CrossrefWork | null> {
        const url = `${CROSSREF_BASE}/works/${encodeURIComponent(doi)}?${this.params({}).toString()}`;
        logger.debug({ url }, 'Crossref fetch work');

        try {
            const response = await this.httpClient.get<CrossrefWorkResponse>(url, { source: this.sourceId });
            return response.data.message;
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }
    }

    private normalizeWork(work: CrossrefWork, doi: string): RawRecord {
        const authors = (work.author ?? [])
            .map((a) => a.name ?? [a.given, a.family].filter(Boolean).join(' '))
            .filter((name) => name.length > 0);

        return {
            id: { kind: 'doi', value: doi },
            ids: { doi },
            title: stripMarkup(work.title?.[0]),
            year:
                yearFromDateParts(work['published-print']) ??
                yearFromDateParts(work.published) ??
                yearFromDateParts(work.issued) ??
                yearFromDateParts(work.created),
            abstract: stripMarkup(work.abstract),
            authors,
            venue: work['container-title']?.[0] ?? null,
            citation_count: work['is-referenced-by-count'] ?? 0,
            reference_count: work['reference-count'] ?? 0,
        };
    }

    private params(values: Record<string, string>): URLSearchParams {
        const params = new URLSearchParams(values);
        if (this.email) {
            params.set('mailto', this.email);
        }
        return params;
    }
}
