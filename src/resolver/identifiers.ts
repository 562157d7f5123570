import { ID_KINDS, type IdKind, type PublicationHint, type PublicationIds } from '../types/index.js';
import { normalizeTitle, stripDoiPrefix } from '../sources/utils.js';

const EID_PATTERN = /^(?:2-s2\.0-)?(\d{1,12})$/;
const DOI_START = /^10\.\d{4,9}\//;
const DBLP_KEY_PATTERN = /^(?:conf|journals|books|phd|series|reference|tr|ms|www)\/\S+$/;

/**
 * Normalize an identifier of the given kind. Returns null if it is malformed.
 *
 * - DOIs lose any resolver prefix and are lower-cased (DOIs are case-insensitive).
 * - EIDs lose the `2-s2.0-` prefix and are left-padded to at least 10 digits.
 * - DBLP keys lose a `dblp.org/rec/` URL prefix and a `.xml`/`.html` suffix.
 */
export function normalizeId(kind: IdKind, value: string): string | null {
    const trimmed = value.trim();
    switch (kind) {
        case 'doi': {
            const doi = stripDoiPrefix(trimmed)?.toLowerCase() ?? null;
            return doi && DOI_START.test(doi) ? doi : null;
        }
        case 'eid': {
            const match = EID_PATTERN.exec(trimmed);
            return match?.[1] ? match[1].padStart(10, '0') : null;
        }
        case 'dblp': {
            const key = trimmed
                .replace(/^https?:\/\/dblp\.org\/rec\//i, '')
                .replace(/\.(xml|html)$/i, '');
            return DBLP_KEY_PATTERN.test(key) ? key : null;
        }
    }
}

/**
 * Build a namespaced canonical id, e.g. `doi:10.1000/xyz`.
 */
export function toCanonicalId(kind: IdKind, value: string): string | null {
    const normalized = normalizeId(kind, value);
    return normalized ? `${kind}:${normalized}` : null;
}

/**
 * Split a canonical id into kind and value.
 */
export function parseCanonicalId(id: string): { kind: IdKind; value: string } | null {
    const separator = id.indexOf(':');
    if (separator <= 0) return null;

    const prefix = id.slice(0, separator).toLowerCase();
    const kind = ID_KINDS.find((k) => k === prefix);
    if (!kind) return null;

    const value = normalizeId(kind, id.slice(separator + 1));
    return value ? { kind, value } : null;
}

/**
 * Guess the kind of a bare or namespaced identifier as found in a seed file.
 */
export function detectIdKind(value: string): IdKind | null {
    const parsed = parseCanonicalId(value.trim());
    if (parsed) return parsed.kind;

    for (const kind of ID_KINDS) {
        if (normalizeId(kind, value) !== null) return kind;
    }
    return null;
}

/**
 * Build a resolution hint from a canonical or bare identifier.
 */
export function hintFromId(id: string): PublicationHint | null {
    const parsed = parseCanonicalId(id);
    if (parsed) return hintOf(parsed.kind, parsed.value);

    const kind = detectIdKind(id);
    if (!kind) return null;
    const value = normalizeId(kind, id);
    return value ? hintOf(kind, value) : null;
}

function hintOf(kind: IdKind, value: string): PublicationHint {
    const hint: PublicationHint = {};
    hint[kind] = value;
    return hint;
}

/**
 * Canonical ids for every identifier carried by a hint or an id map,
 * in resolution priority order (DOI, EID, DBLP key).
 */
export function canonicalIdsOf(ids: PublicationIds | PublicationHint): string[] {
    const out: string[] = [];
    for (const kind of ID_KINDS) {
        const value = ids[kind];
        if (!value) continue;
        const canonical = toCanonicalId(kind, value);
        if (canonical) out.push(canonical);
    }
    return out;
}

/**
 * Cache alias a title search result is remembered under, so a title-only
 * hint can be answered without the network next time.
 */
export function titleAlias(title: string): string | null {
    const normalized = normalizeTitle(title);
    return normalized ? `title:${normalized}` : null;
}

/**
 * True when the hint names at least one identifier or a non-blank title.
 */
export function isUsableHint(hint: PublicationHint): boolean {
    return canonicalIdsOf(hint).length > 0 || (hint.title?.trim().length ?? 0) > 0;
}
