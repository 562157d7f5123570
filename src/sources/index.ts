import type { CitenetConfig, SourceClient, SourceName } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { CrossrefClient } from './crossref.js';
import { DblpClient } from './dblp.js';
import { ScopusClient } from './scopus.js';

export { CrossrefClient } from './crossref.js';
export { DblpClient } from './dblp.js';
export { ScopusClient } from './scopus.js';
export { OpenCitationsClient } from './opencitations.js';

/**
 * Build the source clients named in `config.sources`, in that priority order.
 * Scopus is skipped without SCOPUS_API_KEY.
 */
export function createSources(config: CitenetConfig, httpClient?: HttpClient): SourceClient[] {
    const logger = getLogger();
    const openCitationsKey = getApiKey('OPENCITATIONS_API_KEY');
    const shared = {
        email: config.mailto,
        minTitleSimilarity: config.minTitleSimilarity,
        maxCitations: config.maxCitations,
        openCitationsKey,
    };

    const sources: SourceClient[] = [];
    const seen = new Set<SourceName>();

    for (const name of config.sources) {
        if (seen.has(name)) continue;
        seen.add(name);

        switch (name) {
            case 'crossref': {
                const client = new CrossrefClient(shared);
                if (httpClient) client.setHttpClient(httpClient);
                sources.push(client);
                break;
            }
            case 'scopus': {
                const apiKey = getApiKey('SCOPUS_API_KEY');
                if (!apiKey) {
                    logger.warn('SCOPUS_API_KEY not set, skipping Scopus');
                    break;
                }
                const client = new ScopusClient({ ...shared, apiKey });
                if (httpClient) client.setHttpClient(httpClient);
                sources.push(client);
                break;
            }
            case 'dblp': {
                const client = new DblpClient(shared);
                if (httpClient) client.setHttpClient(httpClient);
                sources.push(client);
                break;
            }
        }
    }

    if (!openCitationsKey && sources.some((s) => s.sourceId !== 'scopus')) {
        logger.debug('OPENCITATIONS_API_KEY not set, using anonymous OpenCitations access');
    }

    return sources;
}
