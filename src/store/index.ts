/**
 * src/store/index.ts
 *
 * Picks the ledger backend named by LEDGER_BACKEND and returns a factory
 * that opens one store per category region.
 */

import { log } from 'crawlee';
import { FileLedgerStore } from './fileStore.js';
import { GoogleSheetGateway, createSheetsClient } from './googleSheetGateway.js';
import { PostgresLedgerStore } from './postgresStore.js';
import { SheetLedgerStore } from './sheetStore.js';
import { createDatabase } from '../utils/db.js';
import type { LedgerStoreFactory } from './types.js';
import type { LedgerSettings } from '../config/appConfig.js';

export interface LedgerBackend {
    name: LedgerSettings['backend'];
    open: LedgerStoreFactory;
    close(): Promise<void>;
}

export function createLedgerBackend(settings: LedgerSettings): LedgerBackend {
    switch (settings.backend) {
        case 'sheets': {
            const gateway = new GoogleSheetGateway(
                createSheetsClient(settings.sheets.credentialsJson),
                settings.sheets.spreadsheetId
            );
            log.info(`[Store] Using Google Sheets ledger (spreadsheet ${settings.sheets.spreadsheetId}).`);
            return {
                name: 'sheets',
                open: (region) => new SheetLedgerStore(gateway, region),
                close: async () => {},
            };
        }
        case 'postgres': {
            const db = createDatabase(settings.postgres);
            log.info('[Store] Using PostgreSQL ledger (table job_ledger).');
            return {
                name: 'postgres',
                open: (region) => new PostgresLedgerStore(db.query, region),
                close: () => db.close(),
            };
        }
        case 'file': {
            log.info(`[Store] Using JSON file ledger in ${settings.dir}.`);
            return {
                name: 'file',
                open: (region) => new FileLedgerStore(settings.dir, region),
                close: async () => {},
            };
        }
    }
}
