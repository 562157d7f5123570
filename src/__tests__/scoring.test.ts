import { describe, it, expect } from 'vitest';
import { inYearRange, meetsThreshold, scoreRelationships, strongRelated } from '../graph/scoring.js';
import type { PublicationRecord, ScoringOptions } from '../types/index.js';

function record(canonicalId: string, overrides: Partial<PublicationRecord> = {}): PublicationRecord {
    return {
        canonical_id: canonicalId,
        ids: {},
        title: canonicalId,
        year: null,
        abstract: null,
        authors: [],
        venue: null,
        references: [],
        citations: [],
        citation_count: 0,
        reference_count: 0,
        linked_years: {},
        source: 'crossref',
        ...overrides,
    };
}

const defaults: ScoringOptions = { sharedThreshold: 0.5, includeUnknownYear: false };

function sorted(ids: Set<string>): string[] {
    return [...ids].sort();
}

describe('strongRelated', () => {
    const seed = record('S', { references: ['X', 'Y'], citations: ['Z'] });

    it('should keep direct links and co-citing works above the threshold', () => {
        const q = record('Q', { references: ['X', 'Y', 'W'] });
        const p = record('P', { references: ['W'] });

        expect(sorted(strongRelated(seed, [q, p], defaults))).toEqual(['Q', 'X', 'Y', 'Z']);
    });

    it('should keep Q with the direct links at a 10% threshold', () => {
        const q = record('Q', { references: ['X', 'Y', 'W'] });
        const p = record('P', { references: ['W'] });

        const strong = strongRelated(seed, [q, p], { sharedThreshold: 0.1, includeUnknownYear: false });
        expect(sorted(strong)).toEqual(['Q', 'X', 'Y', 'Z']);
    });

    it('should name a pool member linked by another id once', () => {
        const linkingSeed = record('doi:10.1/s', { references: ['doi:10.1/x', 'doi:10.1/y'] });
        const known = record('eid:0000000001', {
            ids: { eid: '0000000001', doi: '10.1/x' },
            references: ['doi:10.1/y'],
        });

        const breakdown = scoreRelationships(linkingSeed, [known], { sharedThreshold: 0.1, includeUnknownYear: false });

        expect(sorted(breakdown.all)).toEqual(['doi:10.1/y', 'eid:0000000001']);
        expect(sorted(breakdown.references)).toEqual(['doi:10.1/y', 'eid:0000000001']);
        expect(sorted(breakdown.coCiting)).toEqual(['eid:0000000001']);
    });

    it('should use the year the seed reported under another id of a pool member', () => {
        const linkingSeed = record('doi:10.1/s', {
            references: ['doi:10.1/x'],
            linked_years: { 'doi:10.1/x': 2021 },
        });
        const known = record('eid:0000000001', { ids: { eid: '0000000001', doi: '10.1/x' }, references: ['doi:10.1/q'] });

        const strong = strongRelated(linkingSeed, [known], { ...defaults, minYear: 2020 });
        expect(sorted(strong)).toEqual(['eid:0000000001']);
    });

    it('should find co-cited works through shared citing works', () => {
        const seedWithCites = record('S', { citations: ['C1', 'C2'] });
        const k = record('K', { citations: ['C1'] });
        const l = record('L', { citations: ['C9'] });

        const breakdown = scoreRelationships(seedWithCites, [k, l], defaults);
        expect(sorted(breakdown.coCited)).toEqual(['K']);
        expect(breakdown.coCiting.size).toBe(0);
        expect(sorted(breakdown.all)).toEqual(['C1', 'C2', 'K']);
    });

    it('should keep the kinds apart in the breakdown', () => {
        const q = record('Q', { references: ['X'] });
        const breakdown = scoreRelationships(seed, [q], defaults);

        expect(sorted(breakdown.references)).toEqual(['X', 'Y']);
        expect(sorted(breakdown.citations)).toEqual(['Z']);
        expect(sorted(breakdown.coCiting)).toEqual(['Q']);
    });

    it('should shrink as the threshold grows', () => {
        const refs = Array.from({ length: 10 }, (_, i) => `R${i}`);
        const tenRefSeed = record('S', { references: refs });
        const pool = Array.from({ length: 10 }, (_, i) => record(`C${i + 1}`, { references: refs.slice(0, i + 1) }));

        const coCitingAt = (sharedThreshold: number) =>
            scoreRelationships(tenRefSeed, pool, { ...defaults, sharedThreshold }).coCiting;

        const low = coCitingAt(0.2);
        const mid = coCitingAt(0.5);
        const high = coCitingAt(0.8);

        expect(low.size).toBe(9);
        expect(mid.size).toBe(6);
        expect(sorted(high)).toEqual(['C10', 'C8', 'C9']);
        for (const id of high) expect(mid.has(id)).toBe(true);
        for (const id of mid) expect(low.has(id)).toBe(true);
    });

    it('should return nothing for a seed without links', () => {
        const empty = record('S');
        const q = record('Q', { references: ['X'], citations: ['Y'] });

        expect(strongRelated(empty, [q], { ...defaults, sharedThreshold: 0 }).size).toBe(0);
    });

    it('should never return the seed itself', () => {
        const aliased = record('doi:10.1000/s', {
            ids: { doi: '10.1000/s', eid: '0000000001' },
            references: ['X'],
        });
        const sameWork = record('eid:0000000001', { ids: { eid: '0000000001' }, references: ['X'] });
        const twin = record('doi:10.1000/s', { references: ['X'] });

        const result = strongRelated(aliased, [twin, sameWork], { ...defaults, sharedThreshold: 0.1 });
        expect(sorted(result)).toEqual(['X']);
    });

    describe('year range', () => {
        const yearSeed = record('S', {
            references: ['A', 'B', 'C', 'D', 'U'],
            citations: ['E'],
            linked_years: { E: 2021 },
        });
        const pool = [
            record('A', { year: 2019 }),
            record('B', { year: 2020 }),
            record('C', { year: 2022 }),
            record('D', { year: 2023 }),
        ];
        const range = { ...defaults, minYear: 2020, maxYear: 2022 };

        it('should keep inclusive bounds and drop unknown years by default', () => {
            expect(sorted(strongRelated(yearSeed, pool, range))).toEqual(['B', 'C', 'E']);
        });

        it('should keep unknown years when asked to', () => {
            expect(sorted(strongRelated(yearSeed, pool, { ...range, includeUnknownYear: true }))).toEqual(['B', 'C', 'E', 'U']);
        });

        it('should not filter without bounds', () => {
            expect(sorted(strongRelated(yearSeed, pool, defaults))).toEqual(['A', 'B', 'C', 'D', 'E', 'U']);
        });
    });
});

describe('meetsThreshold', () => {
    it('should compare the overlap fraction with >=', () => {
        const seed = new Set(['a', 'b', 'c', 'd']);
        expect(meetsThreshold(['a'], seed, 0.25)).toBe(true);
        expect(meetsThreshold(['a', 'a'], seed, 0.5)).toBe(false);
        expect(meetsThreshold(['a', 'b'], seed, 0.5)).toBe(true);
    });

    it('should be false for an empty seed list', () => {
        expect(meetsThreshold(['a'], new Set(), 0)).toBe(false);
    });
});

describe('inYearRange', () => {
    it('should honour one-sided bounds', () => {
        expect(inYearRange(2019, { minYear: 2020, includeUnknownYear: false })).toBe(false);
        expect(inYearRange(2030, { minYear: 2020, includeUnknownYear: false })).toBe(true);
        expect(inYearRange(2030, { maxYear: 2020, includeUnknownYear: false })).toBe(false);
        expect(inYearRange(null, { maxYear: 2020, includeUnknownYear: true })).toBe(true);
        expect(inYearRange(null, { includeUnknownYear: false })).toBe(true);
    });
});
