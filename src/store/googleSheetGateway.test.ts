import { describe, it, expect } from 'vitest';
import { createSheetsClient } from './googleSheetGateway.js';

describe('createSheetsClient', () => {
    it('rejects credentials that are not JSON', () => {
        expect(() => createSheetsClient('not-json')).toThrow('GOOGLE_CREDENTIALS is not valid JSON');
    });

    it('rejects a service account without a key', () => {
        expect(() => createSheetsClient(JSON.stringify({ client_email: 'svc@example.iam.gserviceaccount.com' })))
            .toThrow(/private_key/);
    });

    it('builds a client from a service account', () => {
        const client = createSheetsClient(JSON.stringify({
            type: 'service_account',
            client_email: 'svc@example.iam.gserviceaccount.com',
            private_key: 'test-secret',
        }));
        expect(client.spreadsheets).toBeDefined();
    });
});
