/**
 * src/store/types.ts
 *
 * Row-oriented ledger store: one region (sheet tab, table partition, JSON
 * file) per category.
 *
 * LAYOUT
 * ──────
 *   row 1   header (LEDGER_HEADER)
 *   row 2…  data rows, newest first; new rows are inserted at row 2
 *
 * Every operation returns a StoreResult instead of throwing, so the
 * pipeline can log a failed write and keep going.
 */

import { canonicalizeUrl, extractJobId } from '../utils/jobId.js';
import type { LedgerEntry } from '../utils/dedupeLedger.js';
import type { JobPosting } from '../sources/types.js';

export const LEDGER_HEADER = [
    'Job ID',
    'Job URL',
    'Title',
    'Company',
    'Location',
    'Category',
    'Country',
    'Scraped-At',
] as const;

/** 1-based row index where new data rows go (directly below the header). */
export const FIRST_DATA_ROW = 2;

export type StoreResult<T = void> =
    | { ok: true; value: T }
    | { ok: false; error: string };

export interface LedgerStore {
    /** Region name, e.g. the sheet tab. */
    readonly region: string;
    /** Creates the region if needed and puts the expected header on row 1. */
    ensureHeader(): Promise<StoreResult>;
    readEntries(): Promise<StoreResult<LedgerEntry[]>>;
    /**
     * Inserts `values` so that they become row `position` (1-based).
     * Backends without row positions (Postgres) ignore `position` and
     * order rows by insertion time.
     */
    insertRow(values: readonly string[], position: number): Promise<StoreResult>;
}

export type LedgerStoreFactory = (region: string) => LedgerStore;

// ─── Helpers ──────────────────────────────────────────────────────────────────

export const STORE_OK: StoreResult = { ok: true, value: undefined };

export function storeOk<T>(value: T): StoreResult<T> {
    return { ok: true, value };
}

export function storeError(error: unknown): { ok: false; error: string } {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
}

export function postingToRow(posting: JobPosting): string[] {
    return [
        posting.id,
        posting.url,
        posting.title,
        posting.company,
        posting.location,
        posting.category,
        posting.country,
        posting.scrapedAt,
    ];
}

export function headerMatches(row: readonly string[] | undefined): boolean {
    if (!row || row.length < LEDGER_HEADER.length) return false;
    return LEDGER_HEADER.every((value, index) => (row[index] ?? '').trim() === value);
}

const HEADER_CELLS = new Set(['job id', 'job url']);

/**
 * Reads the identity of one stored row.
 *
 * Current rows carry [id, url, …]. Rows written by the older URL-only layout
 * carry [url, title, …]; their id is derived from the URL the same way a
 * fresh card's would be. Header rows and blanks give null.
 */
export function rowToEntry(row: readonly string[]): LedgerEntry | null {
    const first = (row[0] ?? '').trim();
    if (!first || HEADER_CELLS.has(first.toLowerCase())) return null;

    if (/^https?:\/\//i.test(first)) {
        return { id: extractJobId(first), url: canonicalizeUrl(first) };
    }

    const second = (row[1] ?? '').trim();
    return {
        id: first,
        url: /^https?:\/\//i.test(second) ? canonicalizeUrl(second) : '',
    };
}
