import Database from 'better-sqlite3';
import type { RunRecord, SourceName } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 * Records are stored as JSON documents keyed by canonical id; every known
 * identifier (the canonical id included) has a row in `aliases`.
 */
const MIGRATION_V1 = `
-- Runs: pipeline session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  citenet_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  seed_count INTEGER NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Records: one normalized publication per canonical id
CREATE TABLE IF NOT EXISTS records (
  canonical_id TEXT PRIMARY KEY,
  source TEXT NOT NULL,
  data_json TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- Aliases: any identifier → canonical id
CREATE TABLE IF NOT EXISTS aliases (
  alias TEXT PRIMARY KEY,
  canonical_id TEXT NOT NULL REFERENCES records(canonical_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_aliases_canonical ON aliases(canonical_id);
CREATE INDEX IF NOT EXISTS idx_records_source ON records(source);
`;

/**
 * A stored record row before its JSON document is parsed.
 */
export interface RecordRow {
    canonical_id: string;
    source: string;
    data_json: string;
    updated_at: string;
}

/**
 * Durable key-value storage behind the record cache.
 */
export interface RecordStore {
    readRecord(canonicalId: string): RecordRow | undefined;
    resolveAlias(id: string): string | undefined;
    writeRecord(row: RecordRow, aliases: readonly string[]): void;
    deleteRecord(canonicalId: string): boolean;
    listCanonicalIds(): string[];
    transaction<T>(fn: () => T): T;
}

/**
 * citenet database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and record storage.
 */
export class CitenetDatabase implements RecordStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        logger.debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.debug('Database migrated to v1');
        }
    }

    // ─── Records ──────────────────────────────────────────────

    readRecord(canonicalId: string): RecordRow | undefined {
        return this.db
            .prepare<[string], RecordRow>('SELECT canonical_id, source, data_json, updated_at FROM records WHERE canonical_id = ?')
            .get(canonicalId);
    }

    /**
     * Canonical id an identifier is registered under, if any.
     */
    resolveAlias(id: string): string | undefined {
        const row = this.db
            .prepare<[string], { canonical_id: string }>('SELECT canonical_id FROM aliases WHERE alias = ?')
            .get(id);
        return row?.canonical_id;
    }

    /**
     * Upsert a record and register its aliases. An alias that already points to
     * another canonical id keeps pointing there; records are never re-keyed.
     */
    writeRecord(row: RecordRow, aliases: readonly string[]): void {
        const recordStmt = this.db.prepare<RecordRow>(`
      INSERT INTO records (canonical_id, source, data_json, updated_at)
      VALUES (@canonical_id, @source, @data_json, @updated_at)
      ON CONFLICT(canonical_id) DO UPDATE SET
        source = excluded.source,
        data_json = excluded.data_json,
        updated_at = excluded.updated_at
    `);
        const aliasStmt = this.db.prepare<[string, string]>(
            'INSERT OR IGNORE INTO aliases (alias, canonical_id) VALUES (?, ?)'
        );

        this.transaction(() => {
            recordStmt.run(row);
            aliasStmt.run(row.canonical_id, row.canonical_id);
            for (const alias of aliases) {
                aliasStmt.run(alias, row.canonical_id);
            }
        });
    }

    /**
     * Delete a record and its aliases. Returns false if nothing was stored.
     */
    deleteRecord(canonicalId: string): boolean {
        return this.transaction(() => {
            this.db.prepare<[string]>('DELETE FROM aliases WHERE canonical_id = ?').run(canonicalId);
            const result = this.db.prepare<[string]>('DELETE FROM records WHERE canonical_id = ?').run(canonicalId);
            return result.changes > 0;
        });
    }

    listCanonicalIds(): string[] {
        return this.db
            .prepare<[], { canonical_id: string }>('SELECT canonical_id FROM records ORDER BY canonical_id')
            .all()
            .map((row) => row.canonical_id);
    }

    /**
     * Remove every record and alias. Run history is kept.
     */
    clearRecords(): number {
        return this.transaction(() => {
            this.db.prepare('DELETE FROM aliases').run();
            return this.db.prepare('DELETE FROM records').run().changes;
        });
    }

    getRecordCount(): number {
        return this.count('records');
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare<Omit<RunRecord, 'run_id'>>(`
      INSERT INTO runs (created_at, citenet_version, config_json, seed_count, stats_json)
      VALUES (@created_at, @citenet_version, @config_json, @seed_count, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        records: number;
        aliases: number;
        runs: number;
        recordsBySource: Partial<Record<SourceName, number>>;
    } {
        const sourceRows = this.db
            .prepare<[], { source: string; count: number }>('SELECT source, COUNT(*) as count FROM records GROUP BY source')
            .all();
        const recordsBySource: Partial<Record<SourceName, number>> = {};
        for (const row of sourceRows) {
            if (row.source === 'crossref' || row.source === 'scopus' || row.source === 'dblp') {
                recordsBySource[row.source] = row.count;
            }
        }

        return {
            records: this.count('records'),
            aliases: this.count('aliases'),
            runs: this.count('runs'),
            recordsBySource,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger.debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    private count(table: 'records' | 'aliases' | 'runs'): number {
        const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get();
        return row?.count ?? 0;
    }
}
