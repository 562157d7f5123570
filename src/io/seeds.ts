import { readFileSync } from 'node:fs';
import { csvParse } from 'd3-dsv';
import type { PublicationHint } from '../types/index.js';
import { ID_KINDS } from '../types/index.js';
import { detectIdKind, normalizeId, parseCanonicalId } from '../resolver/identifiers.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export interface SeedParseResult {
    hints: PublicationHint[];
    /** Row numbers of rows that named nothing usable */
    skippedRows: number[];
}

/**
 * Read seeds from CSV text with a header row.
 *
 * Recognized columns (case-insensitive): `title`, `id` (kind auto-detected),
 * `doi`, `eid`, `dblp`. Blank lines are ignored; rows carrying neither a valid
 * id nor a title are skipped and reported by row number (header is row 1).
 */
export function parseSeedCsv(text: string): SeedParseResult {
    const rows = csvParse(text.replace(/^\uFEFF/, ''));
    if (rows.columns.length === 0) return { hints: [], skippedRows: [] };

    const columns = new Map<string, string>();
    for (const column of rows.columns) {
        const name = column.trim().toLowerCase();
        if (!columns.has(name)) columns.set(name, column);
    }

    if (!['title', 'id', ...ID_KINDS].some((name) => columns.has(name))) {
        const found = rows.columns.map((column) => column.trim().toLowerCase());
        throw new Error(`Seed file needs a "title", "id", "doi", "eid" or "dblp" column (found: ${found.join(', ')})`);
    }

    const hints: PublicationHint[] = [];
    const skippedRows: number[] = [];

    rows.forEach((row, i) => {
        const cell = (name: string) => {
            const column = columns.get(name);
            return column === undefined ? '' : row[column]?.trim() ?? '';
        };
        if (Object.values(row).every((value) => !value?.trim())) return;

        const hint: PublicationHint = {};

        const title = cell('title');
        if (title) hint.title = title;

        const id = cell('id');
        if (id) addId(hint, id);

        for (const kind of ID_KINDS) {
            const value = cell(kind);
            const normalized = value ? normalizeId(kind, value) : null;
            if (normalized) hint[kind] = normalized;
        }

        if (Object.keys(hint).length === 0) {
            skippedRows.push(i + 2);
            return;
        }
        hints.push(hint);
    });

    if (skippedRows.length > 0) {
        logger.warn({ rows: skippedRows }, 'Skipped seed rows without a usable id or title');
    }

    return { hints, skippedRows };
}

export function readSeedFile(path: string): SeedParseResult {
    return parseSeedCsv(readFileSync(path, 'utf-8'));
}

function addId(hint: PublicationHint, id: string): void {
    const parsed = parseCanonicalId(id);
    if (parsed) {
        hint[parsed.kind] = parsed.value;
        return;
    }

    const kind = detectIdKind(id);
    const value = kind ? normalizeId(kind, id) : null;
    if (kind && value) {
        hint[kind] = value;
    } else {
        logger.warn({ id }, 'Unrecognized seed id');
    }
}
