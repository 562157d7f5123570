/**
 * Shared utilities for source clients.
 */

import { HttpError } from '../utils/http-client.js';

/**
 * A 404 from a lookup endpoint means the source does not know the id.
 */
export function isNotFound(error: unknown): boolean {
    return error instanceof HttpError && error.status === 404;
}

/**
 * Some APIs collapse one-element lists into a bare object.
 */
export function toArray<T>(value: T | T[] | null | undefined): T[] {
    if (value === null || value === undefined) return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 * "doi:10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .trim()
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:/i, '')
        .trim() || null;
}

const DOI_PATTERN = /\b10\.\d{4,9}\/[-._;()/:A-Z0-9<>]+/i;

/**
 * Find a DOI inside a free-form string such as an OpenCitations id list
 * ("omid:br/0612 doi:10.1108/jd-12-2013-0166 pmid:123").
 */
export function extractDoi(text: string | null | undefined): string | null {
    if (!text) return null;
    const match = text.match(DOI_PATTERN);
    return match ? match[0] : null;
}

/**
 * Year from an ISO-ish date ("2019-05-01", "2019-05", "2019").
 */
export function yearFromDate(date: string | null | undefined): number | null {
    if (!date) return null;
    const match = /^(\d{4})/.exec(date.trim());
    return match?.[1] ? parseInt(match[1], 10) : null;
}

/**
 * Year from a Crossref `date-parts` structure: { "date-parts": [[2019, 5, 1]] }.
 */
export function yearFromDateParts(date: { 'date-parts'?: Array<Array<number | null>> } | null | undefined): number | null {
    const year = date?.['date-parts']?.[0]?.[0];
    return typeof year === 'number' ? year : null;
}

/**
 * Remove inline markup some sources leave in titles and abstracts
 * (<inf>, <sup>, JATS tags).
 */
export function stripMarkup(text: string | null | undefined): string | null {
    if (!text) return null;
    return text
        .replace(/<[^>]+>/g, ' ')
        .replace(/\s+/g, ' ')
        .trim() || null;
}

/**
 * Clean and normalize a paper title for comparison.
 */
export function normalizeTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\w\s]/g, ' ')  // Remove punctuation
        .replace(/\s+/g, ' ')      // Collapse whitespace
        .trim();
}

/**
 * Simple Levenshtein distance for title matching.
 * Two rolling rows instead of the full matrix.
 */
export function levenshteinDistance(a: string, b: string): number {
    if (a.length === 0) return b.length;
    if (b.length === 0) return a.length;

    let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

    for (let i = 1; i <= a.length; i++) {
        const current = [i];
        for (let j = 1; j <= b.length; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                (previous[j] ?? 0) + 1,        // deletion
                (current[j - 1] ?? 0) + 1,     // insertion
                (previous[j - 1] ?? 0) + cost  // substitution
            );
        }
        previous = current;
    }

    return previous[b.length] ?? 0;
}

/**
 * Compute normalized Levenshtein similarity (0.0 to 1.0).
 * 1.0 = identical, 0.0 = completely different.
 */
export function titleSimilarity(a: string, b: string): number {
    const normA = normalizeTitle(a);
    const normB = normalizeTitle(b);

    if (normA === normB) return 1.0;

    const maxLen = Math.max(normA.length, normB.length);
    if (maxLen === 0) return 1.0;

    const distance = levenshteinDistance(normA, normB);
    return 1.0 - distance / maxLen;
}

/**
 * Pick the search hit whose title is closest to `title`.
 * Returns null when no hit reaches `minSimilarity`; earlier hits win ties,
 * so the source's own ranking breaks them.
 */
export function pickBestTitleMatch<T>(
    title: string,
    hits: readonly T[],
    titleOf: (hit: T) => string | null | undefined,
    minSimilarity: number
): T | null {
    let best: T | null = null;
    let bestScore = -1;

    for (const hit of hits) {
        const hitTitle = titleOf(hit);
        if (!hitTitle) continue;
        const score = titleSimilarity(title, hitTitle);
        if (score > bestScore) {
            best = hit;
            bestScore = score;
        }
    }

    return bestScore >= minSimilarity ? best : null;
}
