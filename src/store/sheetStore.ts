/**
 * src/store/sheetStore.ts
 *
 * Ledger store backed by one spreadsheet tab per category.
 *
 * The store speaks to the spreadsheet through a narrow SheetGateway so the
 * row logic (header repair, insert-below-header) can be exercised against
 * an in-memory sheet. GoogleSheetGateway (googleSheetGateway.ts) is the
 * production implementation.
 */

import { log } from 'crawlee';
import {
    FIRST_DATA_ROW,
    LEDGER_HEADER,
    STORE_OK,
    headerMatches,
    rowToEntry,
    storeError,
    storeOk,
} from './types.js';
import type { LedgerStore, StoreResult } from './types.js';
import type { LedgerEntry } from '../utils/dedupeLedger.js';

// ─── Gateway ──────────────────────────────────────────────────────────────────

export interface SheetGateway {
    /** Numeric tab id, or null when no tab has that title. */
    findTabId(title: string): Promise<number | null>;
    addTab(title: string): Promise<number>;
    /** A1-notation read; missing cells come back as ''. */
    readRows(range: string): Promise<string[][]>;
    writeRow(range: string, values: readonly string[]): Promise<void>;
    /** Inserts `count` blank rows before the 0-based `startIndex`. */
    insertRows(tabId: number, startIndex: number, count: number): Promise<void>;
}

const LAST_COLUMN = String.fromCharCode('A'.charCodeAt(0) + LEDGER_HEADER.length - 1);

/** Quotes a tab title for A1 notation: Sheet 3 → 'Sheet 3'. */
export function quoteTab(title: string): string {
    return `'${title.replace(/'/g, "''")}'`;
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class SheetLedgerStore implements LedgerStore {
    private tabId: number | null = null;

    constructor(
        private readonly gateway: SheetGateway,
        readonly region: string,
    ) {}

    async ensureHeader(): Promise<StoreResult> {
        try {
            const tabId = await this.resolveTab();
            const [firstRow] = await this.gateway.readRows(this.rowRange(1));
            if (headerMatches(firstRow)) return STORE_OK;

            log.warning(`[SheetStore] Header missing or outdated in "${this.region}" — inserting a fresh one.`);
            await this.gateway.insertRows(tabId, 0, 1);
            await this.gateway.writeRow(this.rowRange(1), LEDGER_HEADER);
            return STORE_OK;
        } catch (err) {
            return storeError(err);
        }
    }

    async readEntries(): Promise<StoreResult<LedgerEntry[]>> {
        try {
            await this.resolveTab();
            const rows = await this.gateway.readRows(`${quoteTab(this.region)}!A:B`);
            const entries: LedgerEntry[] = [];
            for (const row of rows) {
                const entry = rowToEntry(row);
                if (entry) entries.push(entry);
            }
            return storeOk(entries);
        } catch (err) {
            return storeError(err);
        }
    }

    async insertRow(values: readonly string[], position: number = FIRST_DATA_ROW): Promise<StoreResult> {
        try {
            const tabId = await this.resolveTab();
            await this.gateway.insertRows(tabId, position - 1, 1);
            await this.gateway.writeRow(this.rowRange(position), values);
            return STORE_OK;
        } catch (err) {
            return storeError(err);
        }
    }

    private rowRange(row: number): string {
        return `${quoteTab(this.region)}!A${row}:${LAST_COLUMN}${row}`;
    }

    private async resolveTab(): Promise<number> {
        if (this.tabId !== null) return this.tabId;

        const existing = await this.gateway.findTabId(this.region);
        if (existing !== null) {
            this.tabId = existing;
            return existing;
        }

        log.info(`[SheetStore] Tab "${this.region}" not found — creating it.`);
        this.tabId = await this.gateway.addTab(this.region);
        return this.tabId;
    }
}
