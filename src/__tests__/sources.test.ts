import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CrossrefClient } from '../sources/crossref.js';
import { ScopusClient } from '../sources/scopus.js';
import { DblpClient } from '../sources/dblp.js';
import { createSources } from '../sources/index.js';
import { pickBestTitleMatch, titleSimilarity } from '../sources/utils.js';
import { createHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { DEFAULT_CONFIG } from '../types/index.js';

type Route = (url: URL) => Response | undefined;

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function xml(body: string): Response {
    return new Response(body, { status: 200, headers: { 'content-type': 'application/xml' } });
}

/**
 * Stub global fetch with an ordered list of routes; unmatched URLs get a 404.
 */
function stubFetch(...routes: Route[]) {
    const mockFetch = vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
        const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
        for (const route of routes) {
            const response = route(url);
            if (response) return response;
        }
        return json({ message: 'not found' }, 404);
    });
    vi.stubGlobal('fetch', mockFetch);
    return mockFetch;
}

function calledUrls(mockFetch: ReturnType<typeof stubFetch>): string[] {
    return mockFetch.mock.calls.map(([input]) => String(input));
}

const openCitations: Route = (url) => {
    if (url.hostname !== 'api.opencitations.net') return undefined;
    if (url.pathname.includes('/references/')) {
        return json([{ oci: '1', citing: 'omid:br/1 doi:10.1000/seed', cited: 'omid:br/2 doi:10.1000/a', creation: '2019-05' }]);
    }
    if (url.pathname.includes('/citations/')) {
        return json([{ oci: '2', citing: 'doi:10.1000/c pmid:99', cited: 'doi:10.1000/seed', creation: '2021-03-01' }]);
    }
    return undefined;
};

describe('source clients', () => {
    let http: HttpClient;

    beforeEach(() => {
        http = createHttpClient({ delayMs: 0 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('CrossrefClient', () => {
        const work: Route = (url) =>
            url.hostname === 'api.crossref.org' && url.pathname === '/works/10.1000%2Fseed'
                ? json({
                    status: 'ok',
                    message: {
                        DOI: '10.1000/SEED',
                        title: ['Graph <i>Methods</i>'],
                        author: [{ given: 'Ada', family: 'Lovelace' }, { name: 'The Test Consortium' }],
                        'container-title': ['Journal of Tests'],
                        'published-print': { 'date-parts': [[2019, 5]] },
                        issued: { 'date-parts': [[2018]] },
                        'is-referenced-by-count': 5,
                        'reference-count': 12,
                    },
                })
                : undefined;

        function client(): CrossrefClient {
            const crossref = new CrossrefClient({ email: 'test@example.com', openCitationsKey: 'test-secret' });
            crossref.setHttpClient(http);
            return crossref;
        }

        it('should combine Crossref metadata with OpenCitations links', async () => {
            const mockFetch = stubFetch(work, openCitations);

            const record = await client().fetchById('doi', '10.1000/seed');

            expect(record).toEqual({
                id: { kind: 'doi', value: '10.1000/SEED' },
                ids: { doi: '10.1000/SEED' },
                title: 'Graph Methods',
                year: 2019,
                abstract: null,
                authors: ['Ada Lovelace', 'The Test Consortium'],
                venue: 'Journal of Tests',
                citation_count: 5,
                reference_count: 12,
                references: [{ kind: 'doi', value: '10.1000/a', year: null }],
                citations: [{ kind: 'doi', value: '10.1000/c', year: 2021 }],
            });
            expect(calledUrls(mockFetch)).toEqual([
                'https://api.crossref.org/works/10.1000%2Fseed?mailto=test%40example.com',
                'https://api.opencitations.net/index/v2/references/doi:10.1000/SEED?format=json',
                'https://api.opencitations.net/index/v2/citations/doi:10.1000/SEED?format=json',
            ]);
            expect(mockFetch.mock.calls[1]?.[1]?.headers).toMatchObject({ authorization: 'test-secret' });
        });

        it('should return null for an unknown DOI without asking OpenCitations', async () => {
            const mockFetch = stubFetch();

            await expect(client().fetchById('doi', '10.1000/missing')).resolves.toBeNull();
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should ignore id kinds it does not support', async () => {
            const mockFetch = stubFetch(work);

            await expect(client().fetchById('eid', '0000000042')).resolves.toBeNull();
            expect(mockFetch).not.toHaveBeenCalled();
        });

        it('should propagate server errors', async () => {
            stubFetch(() => json({}, 500));

            await expect(client().fetchById('doi', '10.1000/seed')).rejects.toBeInstanceOf(HttpError);
        });

        it('should fetch the best title match', async () => {
            const search: Route = (url) =>
                url.pathname === '/works' && url.searchParams.get('query.title') === 'Graph Methods'
                    ? json({
                        status: 'ok',
                        message: {
                            items: [
                                { DOI: '10.1000/other', title: ['Unrelated Work on Sorting'] },
                                { DOI: '10.1000/seed', title: ['Graph methods'] },
                            ],
                        },
                    })
                    : undefined;
            stubFetch(search, work, openCitations);

            const record = await client().searchByTitle('Graph Methods');
            expect(record?.id).toEqual({ kind: 'doi', value: '10.1000/SEED' });
        });

        it('should return null when no title is close enough', async () => {
            stubFetch((url) =>
                url.pathname === '/works' ? json({ status: 'ok', message: { items: [{ DOI: '10.1000/x', title: ['Something Else'] }] } }) : undefined
            );

            await expect(client().searchByTitle('Graph Methods')).resolves.toBeNull();
        });

        it('should list author hits as metadata only', async () => {
            stubFetch((url) =>
                url.pathname === '/works' && url.searchParams.get('query.author') === 'Lovelace'
                    ? json({ status: 'ok', message: { items: [{ DOI: '10.1000/seed', title: ['Graph Methods'] }, { title: ['No DOI'] }] } })
                    : undefined
            );

            const hits = await client().searchByAuthor('Lovelace', 5);
            expect(hits).toHaveLength(1);
            expect(hits[0]?.id).toEqual({ kind: 'doi', value: '10.1000/seed' });
            expect(hits[0]?.references).toBeUndefined();
        });
    });

    describe('ScopusClient', () => {
        const abstracts: Route = (url) => {
            if (url.pathname !== '/content/abstract/eid/2-s2.0-0000000042') return undefined;
            if (url.searchParams.get('view') === 'META_ABS') {
                return json({
                    'abstracts-retrieval-response': {
                        coredata: {
                            'dc:title': 'Graph Methods',
                            'dc:description': 'An <inf>abstract</inf>.',
                            'prism:coverDate': '2019-05-01',
                            'prism:publicationName': 'Journal of Tests',
                            'prism:doi': '10.1000/seed',
                            'citedby-count': '7',
                        },
                        authors: { author: { 'ce:indexed-name': 'Lovelace A.' } },
                    },
                });
            }
            return json({
                'abstracts-retrieval-response': {
                    references: {
                        '@total-references': '2',
                        reference: [
                            { 'scopus-eid': '2-s2.0-0000000100', 'prism:coverDate': '2015-01-01' },
                            { 'scopus-id': '101' },
                        ],
                    },
                },
            });
        };

        const citedBy = (total: number): Route => (url) => {
            const query = url.searchParams.get('query') ?? '';
            if (url.pathname !== '/content/search/scopus' || !query.startsWith('REFEID')) return undefined;
            const start = Number(url.searchParams.get('start'));
            const count = Math.min(Number(url.searchParams.get('count')), total - start);
            const entry = Array.from({ length: count }, (_, i) => ({
                eid: `2-s2.0-${String(1000 + start + i).padStart(10, '0')}`,
                'prism:coverDate': '2021-02-02',
            }));
            return json({ 'search-results': { 'opensearch:totalResults': String(total), entry } });
        };

        function client(maxCitations?: number): ScopusClient {
            const scopus = new ScopusClient({ apiKey: 'test-secret', maxCitations });
            scopus.setHttpClient(http);
            return scopus;
        }

        it('should build a record from the abstract, reference and citing-work calls', async () => {
            const mockFetch = stubFetch(abstracts, citedBy(1));

            const record = await client().fetchById('eid', '0000000042');

            expect(record).toEqual({
                id: { kind: 'eid', value: '0000000042' },
                ids: { eid: '0000000042', doi: '10.1000/seed' },
                title: 'Graph Methods',
                year: 2019,
                abstract: 'An abstract .',
                authors: ['Lovelace A.'],
                venue: 'Journal of Tests',
                references: [
                    { kind: 'eid', value: '2-s2.0-0000000100', year: 2015 },
                    { kind: 'eid', value: '101', year: null },
                ],
                citations: [{ kind: 'eid', value: '2-s2.0-0000001000', year: 2021 }],
                citation_count: 7,
                reference_count: 2,
            });
            expect(mockFetch.mock.calls[0]?.[1]?.headers).toMatchObject({
                'X-ELS-APIKey': 'test-secret',
                Accept: 'application/json',
            });
        });

        it('should page through citing works up to the cap', async () => {
            const mockFetch = stubFetch(abstracts, citedBy(300));

            const record = await client(250).fetchById('eid', '0000000042');

            expect(record?.citations).toHaveLength(250);
            const searches = calledUrls(mockFetch).filter((u) => u.includes('/search/scopus'));
            expect(searches.map((u) => new URL(u).searchParams.get('start'))).toEqual(['0', '200']);
            expect(searches.map((u) => new URL(u).searchParams.get('count'))).toEqual(['200', '50']);
        });

        it('should treat the empty-result entry as no citations', async () => {
            stubFetch(abstracts, (url) =>
                url.pathname === '/content/search/scopus'
                    ? json({ 'search-results': { 'opensearch:totalResults': '0', entry: [{ error: 'Result set was empty' }] } })
                    : undefined
            );

            const record = await client().fetchById('eid', '0000000042');
            expect(record?.citations).toEqual([]);
        });

        it('should return null for an unknown EID', async () => {
            stubFetch();
            await expect(client().fetchById('eid', '0000000001')).resolves.toBeNull();
        });

        it('should search titles and fetch the best hit', async () => {
            const titleSearch: Route = (url) =>
                url.searchParams.get('query') === 'TITLE("Graph Methods")'
                    ? json({
                        'search-results': {
                            'opensearch:totalResults': '1',
                            entry: [{ eid: '2-s2.0-0000000042', 'dc:title': 'Graph Methods' }],
                        },
                    })
                    : undefined;
            stubFetch(titleSearch, abstracts, citedBy(0));

            const record = await client().searchByTitle('Graph "Methods"');
            expect(record?.id).toEqual({ kind: 'eid', value: '0000000042' });
        });
    });

    describe('DblpClient', () => {
        const recordXml = [
            '<?xml version="1.0" encoding="US-ASCII"?>',
            '<dblp>',
            '<article key="journals/tst/Lovelace19" mdate="2020-01-01">',
            '<author pid="12/3">Ada Lovelace</author>',
            '<author>Charles Babbage</author>',
            '<title>Graph <i>Methods</i> for Tests.</title>',
            '<year>2019</year>',
            '<journal>J. Tests</journal>',
            '<ee>https://example.org/paper.pdf</ee>',
            '<ee type="oa">https://doi.org/10.1000/SEED</ee>',
            '</article>',
            '</dblp>',
        ].join('\n');

        function client(): DblpClient {
            const dblp = new DblpClient({ openCitationsKey: 'test-secret' });
            dblp.setHttpClient(http);
            return dblp;
        }

        it('should parse a record document', () => {
            expect(client().parseRecord(recordXml)).toEqual({
                key: 'journals/tst/Lovelace19',
                title: 'Graph Methods for Tests.',
                year: 2019,
                authors: ['Ada Lovelace', 'Charles Babbage'],
                venue: 'J. Tests',
                doi: '10.1000/SEED',
            });
        });

        it('should return null for a document without a publication', () => {
            expect(client().parseRecord('<dblp></dblp>')).toBeNull();
        });

        it('should key a record with a DOI by that DOI and add its links', async () => {
            stubFetch(
                (url) => (url.pathname === '/rec/journals/tst/Lovelace19.xml' ? xml(recordXml) : undefined),
                openCitations
            );

            const record = await client().fetchById('dblp', 'journals/tst/Lovelace19');

            expect(record?.id).toEqual({ kind: 'doi', value: '10.1000/SEED' });
            expect(record?.ids).toEqual({ dblp: 'journals/tst/Lovelace19', doi: '10.1000/SEED' });
            expect(record?.references).toEqual([{ kind: 'doi', value: '10.1000/a', year: null }]);
        });

        it('should return metadata only for a record without a DOI', async () => {
            const noDoi = recordXml.replace('<ee type="oa">https://doi.org/10.1000/SEED</ee>', '');
            const mockFetch = stubFetch((url) => (url.hostname === 'dblp.org' ? xml(noDoi) : undefined));

            const record = await client().fetchById('dblp', 'journals/tst/Lovelace19');

            expect(record?.id).toEqual({ kind: 'dblp', value: 'journals/tst/Lovelace19' });
            expect(record?.references).toBeUndefined();
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should list author hits', async () => {
            stubFetch((url) =>
                url.pathname === '/search/publ/api' && url.searchParams.get('q') === 'author:Ada Lovelace'
                    ? json({
                        result: {
                            hits: {
                                '@total': '1',
                                hit: [{
                                    info: {
                                        key: 'journals/tst/Lovelace19',
                                        title: 'Graph Methods for Tests.',
                                        year: '2019',
                                        venue: 'J. Tests',
                                        doi: '10.1000/SEED',
                                        authors: { author: [{ text: 'Ada Lovelace' }, { text: 'Charles Babbage' }] },
                                    },
                                }],
                            },
                        },
                    })
                    : undefined
            );

            const hits = await client().searchByAuthor('Ada Lovelace');
            expect(hits).toEqual([{
                id: { kind: 'dblp', value: 'journals/tst/Lovelace19' },
                ids: { dblp: 'journals/tst/Lovelace19', doi: '10.1000/SEED' },
                title: 'Graph Methods for Tests.',
                year: 2019,
                authors: ['Ada Lovelace', 'Charles Babbage'],
                venue: 'J. Tests',
            }]);
        });
    });

    describe('createSources', () => {
        afterEach(() => {
            vi.unstubAllEnvs();
        });

        it('should follow the configured order, dropping duplicates and Scopus without a key', () => {
            vi.stubEnv('SCOPUS_API_KEY', '');
            const sources = createSources({ ...DEFAULT_CONFIG, sources: ['dblp', 'scopus', 'crossref', 'dblp'] }, http);
            expect(sources.map((s) => s.sourceId)).toEqual(['dblp', 'crossref']);
        });

        it('should include Scopus when a key is set', () => {
            vi.stubEnv('SCOPUS_API_KEY', 'test-secret');
            const sources = createSources(DEFAULT_CONFIG, http);
            expect(sources.map((s) => s.sourceId)).toEqual(['crossref', 'scopus', 'dblp']);
        });
    });
});

describe('title matching', () => {
    it('should score identical normalized titles as 1', () => {
        expect(titleSimilarity('Graph Methods!', 'graph   methods')).toBe(1);
    });

    it('should prefer the earliest of equally good hits', () => {
        const hits = [{ t: 'Graph Methods' }, { t: 'graph methods' }];
        expect(pickBestTitleMatch('Graph Methods', hits, (h) => h.t, 0.9)).toBe(hits[0]);
    });
});
