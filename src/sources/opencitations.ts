import type { RawLink } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { extractDoi, isNotFound, yearFromDate } from './utils.js';

const logger = getLogger();

const OPENCITATIONS_BASE = 'https://api.opencitations.net/index/v2';

/**
 * One citation from the OpenCitations index. `citing` and `cited` are
 * space-separated id lists, e.g. "omid:br/061 doi:10.1108/jd-12-2013-0166".
 * `creation` is the publication date of the citing work.
 */
interface OpenCitationsCitation {
    oci?: string;
    citing?: string;
    cited?: string;
    creation?: string;
}

export interface CitationLinks {
    references: RawLink[];
    citations: RawLink[];
}

/**
 * OpenCitations index v2: DOI-keyed references and citations.
 * Used by the Crossref and DBLP clients, which carry no link data themselves.
 *
 * @see https://api.opencitations.net/index/v2
 */
export class OpenCitationsClient {
    private httpClient: HttpClient;

    constructor(
        private readonly apiKey?: string,
        private readonly maxCitations = Infinity
    ) {
        this.httpClient = getHttpClient();
    }

    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async fetchLinks(doi: string, source: string): Promise<CitationLinks> {
        const references = await this.fetchList('references', doi, source);
        const citations = await this.fetchList('citations', doi, source);

        return {
            // `creation` on a reference row dates the citing work (this one), not the reference
            references: this.toLinks(references, 'cited', false),
            citations: this.toLinks(citations, 'citing', true).slice(0, this.maxCitations),
        };
    }

    private async fetchList(
        operation: 'references' | 'citations',
        doi: string,
        source: string
    ): Promise<OpenCitationsCitation[]> {
        const url = `${OPENCITATIONS_BASE}/${operation}/doi:${doi}?format=json`;
        logger.debug({ url }, `OpenCitations ${operation}`);

        const headers: Record<string, string> = {};
        if (this.apiKey) headers['authorization'] = this.apiKey;

        try {
            const response = await this.httpClient.get<unknown>(url, { headers, source });
            if (!Array.isArray(response.data)) {
                logger.warn({ doi, operation }, 'OpenCitations did not return a list');
                return [];
            }
            return response.data.filter(isCitation);
        } catch (error) {
            if (isNotFound(error)) return [];
            throw error;
        }
    }

    private toLinks(rows: OpenCitationsCitation[], field: 'citing' | 'cited', dated: boolean): RawLink[] {
        const links: RawLink[] = [];
        for (const row of rows) {
            const doi = extractDoi(row[field]);
            if (!doi) continue;
            links.push({ kind: 'doi', value: doi, year: dated ? yearFromDate(row.creation) : null });
        }
        return links;
    }
}

const CITATION_FIELDS = new Set(['oci', 'citing', 'cited', 'creation']);

function isCitation(value: unknown): value is OpenCitationsCitation {
    if (typeof value !== 'object' || value === null) return false;
    return Object.entries(value).every(([key, field]) => !CITATION_FIELDS.has(key) || typeof field === 'string');
}
