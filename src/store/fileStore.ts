/**
 * src/store/fileStore.ts
 *
 * Ledger store backed by one JSON file per region. The zero-setup backend
 * for local runs and single-host deployments.
 *
 * STRUCTURE ON DISK (<dir>/<region>.json):
 * {
 *   "version": 1,
 *   "rows": [
 *     ["Job ID", "Job URL", …],        ← header, row 1
 *     ["3812345678", "https://…", …], ← newest data row, row 2
 *     …
 *   ]
 * }
 *
 * Writes go to a temp file first and are then renamed over the original so
 * a crash mid-write never leaves a truncated ledger behind.
 */

import * as fs from 'fs';
import * as path from 'path';
import { log } from 'crawlee';
import { LEDGER_HEADER, STORE_OK, headerMatches, rowToEntry, storeError, storeOk } from './types.js';
import type { LedgerStore, StoreResult } from './types.js';
import type { LedgerEntry } from '../utils/dedupeLedger.js';

interface LedgerFile {
    version: 1;
    rows: string[][];
}

function isLedgerFile(value: unknown): value is LedgerFile {
    if (typeof value !== 'object' || value === null || !('rows' in value)) return false;
    const rows = value.rows;
    return Array.isArray(rows) && rows.every(
        (row: unknown) => Array.isArray(row) && row.every((cell: unknown) => typeof cell === 'string')
    );
}

/** Region names become file names; anything outside [A-Za-z0-9._-] is replaced. */
export function regionFileName(region: string): string {
    return `${region.replace(/[^A-Za-z0-9._-]+/g, '_')}.json`;
}

export class FileLedgerStore implements LedgerStore {
    readonly filePath: string;

    constructor(
        private readonly dir: string,
        readonly region: string,
    ) {
        this.filePath = path.join(dir, regionFileName(region));
    }

    async ensureHeader(): Promise<StoreResult> {
        try {
            const file = this.load();
            if (headerMatches(file.rows[0])) return STORE_OK;

            if (file.rows.length > 0) {
                log.warning(`[FileStore] Header missing or outdated in "${this.region}" — inserting a fresh one.`);
            }
            file.rows.unshift([...LEDGER_HEADER]);
            this.save(file);
            return STORE_OK;
        } catch (err) {
            return storeError(err);
        }
    }

    async readEntries(): Promise<StoreResult<LedgerEntry[]>> {
        try {
            const entries: LedgerEntry[] = [];
            for (const row of this.load().rows) {
                const entry = rowToEntry(row);
                if (entry) entries.push(entry);
            }
            return storeOk(entries);
        } catch (err) {
            return storeError(err);
        }
    }

    async insertRow(values: readonly string[], position: number): Promise<StoreResult> {
        try {
            const file = this.load();
            const index = Math.min(Math.max(position - 1, 0), file.rows.length);
            file.rows.splice(index, 0, [...values]);
            this.save(file);
            return STORE_OK;
        } catch (err) {
            return storeError(err);
        }
    }

    private load(): LedgerFile {
        if (!fs.existsSync(this.filePath)) {
            return { version: 1, rows: [] };
        }
        const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
        if (!isLedgerFile(parsed)) {
            throw new Error(`Ledger file ${this.filePath} is not in the expected format`);
        }
        return { version: 1, rows: parsed.rows };
    }

    private save(file: LedgerFile): void {
        fs.mkdirSync(this.dir, { recursive: true });
        const tmp = this.filePath + '.tmp';
        fs.writeFileSync(tmp, JSON.stringify(file, null, 2), 'utf-8');
        fs.renameSync(tmp, this.filePath);
    }
}
