/**
 * src/store/postgresStore.ts
 *
 * Ledger store backed by a single `job_ledger` table, partitioned by region.
 *
 * The "header" of a table is its schema: ensureHeader() runs the idempotent
 * CREATE TABLE / CREATE INDEX statements. Rows are keyed by (region, job_id)
 * and inserted with ON CONFLICT DO NOTHING, so a repeated insert is a no-op.
 * Newest-first ordering comes from inserted_at rather than a row position.
 */

import { log } from 'crawlee';
import { STORE_OK, rowToEntry, storeError, storeOk } from './types.js';
import type { LedgerStore, StoreResult } from './types.js';
import type { LedgerEntry } from '../utils/dedupeLedger.js';
import type { QueryFn } from '../utils/db.js';

// ─── Schema ───────────────────────────────────────────────────────────────────

export const CREATE_LEDGER_TABLE = `
CREATE TABLE IF NOT EXISTS job_ledger (
    region        TEXT        NOT NULL,
    job_id        TEXT        NOT NULL,
    job_url       TEXT        NOT NULL,
    title         TEXT        NOT NULL,
    company       TEXT        NOT NULL,
    location      TEXT        NOT NULL DEFAULT 'Unknown',
    category      TEXT        NOT NULL,
    country       TEXT        NOT NULL,
    scraped_at    TIMESTAMPTZ NOT NULL,
    inserted_at   TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (region, job_id)
);
`;

export const CREATE_LEDGER_INDEX = `
CREATE INDEX IF NOT EXISTS idx_job_ledger_region_inserted ON job_ledger(region, inserted_at DESC);
`;

const SELECT_ENTRIES_SQL = `
SELECT job_id, job_url FROM job_ledger WHERE region = $1 ORDER BY inserted_at DESC;
`;

const INSERT_ROW_SQL = `
INSERT INTO job_ledger
    (region, job_id, job_url, title, company, location, category, country, scraped_at)
VALUES
    ($1,     $2,     $3,      $4,    $5,      $6,       $7,       $8,      $9)
ON CONFLICT (region, job_id) DO NOTHING;
`;

const ROW_WIDTH = 8;

function cell(value: unknown): string {
    return typeof value === 'string' ? value : '';
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class PostgresLedgerStore implements LedgerStore {
    constructor(
        private readonly query: QueryFn,
        readonly region: string,
    ) {}

    async ensureHeader(): Promise<StoreResult> {
        try {
            await this.query(CREATE_LEDGER_TABLE);
            await this.query(CREATE_LEDGER_INDEX);
            return STORE_OK;
        } catch (err) {
            return storeError(err);
        }
    }

    async readEntries(): Promise<StoreResult<LedgerEntry[]>> {
        try {
            const { rows } = await this.query(SELECT_ENTRIES_SQL, [this.region]);
            const entries: LedgerEntry[] = [];
            for (const row of rows) {
                const entry = rowToEntry([cell(row.job_id), cell(row.job_url)]);
                if (entry) entries.push(entry);
            }
            return storeOk(entries);
        } catch (err) {
            return storeError(err);
        }
    }

    /** `position` is ignored: ordering is by insertion time. */
    async insertRow(values: readonly string[], _position?: number): Promise<StoreResult> {
        if (values.length < ROW_WIDTH) {
            return { ok: false, error: `Expected ${ROW_WIDTH} columns, got ${values.length}` };
        }
        try {
            const result = await this.query(INSERT_ROW_SQL, [this.region, ...values.slice(0, ROW_WIDTH)]);
            if (result.rowCount === 0) {
                log.debug(`[PostgresStore] Row ${values[0]} already present in "${this.region}".`);
            }
            return STORE_OK;
        } catch (err) {
            return storeError(err);
        }
    }
}
