/**
 * src/store/googleSheetGateway.ts
 *
 * SheetGateway over the Google Sheets v4 API, authenticated with a service
 * account JSON (GOOGLE_CREDENTIALS). The spreadsheet must be shared with the
 * service account's client_email.
 */

import { google } from 'googleapis';
import type { sheets_v4 } from 'googleapis';
import { z } from 'zod';
import type { SheetGateway } from './sheetStore.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets'];

const serviceAccountSchema = z
    .object({
        client_email: z.string().min(1),
        private_key: z.string().min(1),
    })
    .passthrough();

export function createSheetsClient(serviceAccountJson: string): sheets_v4.Sheets {
    let raw: unknown;
    try {
        raw = JSON.parse(serviceAccountJson);
    } catch {
        throw new Error('GOOGLE_CREDENTIALS is not valid JSON');
    }
    const credentials = serviceAccountSchema.parse(raw);

    const auth = new google.auth.GoogleAuth({ credentials, scopes: SCOPES });
    return google.sheets({ version: 'v4', auth });
}

function asCell(value: unknown): string {
    return value === undefined || value === null ? '' : String(value);
}

export class GoogleSheetGateway implements SheetGateway {
    constructor(
        private readonly sheets: sheets_v4.Sheets,
        private readonly spreadsheetId: string,
    ) {}

    async findTabId(title: string): Promise<number | null> {
        const metadata = await this.sheets.spreadsheets.get({
            spreadsheetId: this.spreadsheetId,
            fields: 'sheets.properties',
        });
        const sheet = metadata.data.sheets?.find((entry) => entry.properties?.title === title);
        const sheetId = sheet?.properties?.sheetId;
        return typeof sheetId === 'number' ? sheetId : null;
    }

    async addTab(title: string): Promise<number> {
        const response = await this.sheets.spreadsheets.batchUpdate({
            spreadsheetId: this.spreadsheetId,
            requestBody: {
                requests: [{ addSheet: { properties: { title } } }],
            },
        });
        const sheetId = response.data.replies?.[0]?.addSheet?.properties?.sheetId;
        if (typeof sheetId !== 'number') {
            throw new Error(`addSheet returned no sheetId for "${title}"`);
        }
        return sheetId;
    }

    async readRows(range: string): Promise<string[][]> {
        const response = await this.sheets.spreadsheets.values.get({
            spreadsheetId: this.spreadsheetId,
            range,
        });
        const values: unknown[][] = response.data.values ?? [];
        return values.map((row) => row.map(asCell));
    }

    async writeRow(range: string, values: readonly string[]): Promise<void> {
        await this.sheets.spreadsheets.values.update({
            spreadsheetId: this.spreadsheetId,
            range,
            valueInputOption: 'RAW',
            requestBody: { values: [[...values]] },
        });
    }

    async insertRows(tabId: number, startIndex: number, count: number): Promise<void> {
        await this.sheets.spreadsheets.batchUpdate({
            spreadsheetId: this.spreadsheetId,
            requestBody: {
                requests: [
                    {
                        insertDimension: {
                            range: {
                                sheetId: tabId,
                                dimension: 'ROWS',
                                startIndex,
                                endIndex: startIndex + count,
                            },
                            inheritFromBefore: false,
                        },
                    },
                ],
            },
        });
    }
}
