import { describe, it, expect } from 'vitest';
import { ConfigError, loadEnv } from './env.js';

describe('loadEnv', () => {
    it('applies defaults to an empty environment', () => {
        const env = loadEnv({});
        expect(env).toMatchObject({
            LOG_LEVEL: 'INFO',
            TIME_WINDOW: 'hour',
            MAX_PAGES: 4,
            LOCATIONS_PER_RUN: 5,
            ROTATION_SEED: null,
            ENFORCE_COUNTRY: true,
            REQUEST_TIMEOUT_MS: 15_000,
            FETCH_MAX_ATTEMPTS: 3,
            FETCH_BACKOFF_MS: 600,
            LEDGER_BACKEND: 'file',
            SMTP_HOST: 'smtp.gmail.com',
            SMTP_PORT: 465,
            PORT: 8080,
        });
    });

    it('parses numbers and flags from strings', () => {
        const env = loadEnv({
            MAX_PAGES: '2',
            ROTATION_SEED: '7',
            ENFORCE_COUNTRY: 'FALSE',
            PGSSL: 'true',
            PORT: '3000',
        });
        expect(env.MAX_PAGES).toBe(2);
        expect(env.ROTATION_SEED).toBe(7);
        expect(env.ENFORCE_COUNTRY).toBe(false);
        expect(env.PGSSL).toBe(true);
        expect(env.PORT).toBe(3000);
    });

    it('only turns ENFORCE_COUNTRY off for "false"', () => {
        expect(loadEnv({ ENFORCE_COUNTRY: 'no' }).ENFORCE_COUNTRY).toBe(true);
    });

    it('treats a blank ROTATION_SEED as unset', () => {
        expect(loadEnv({ ROTATION_SEED: '  ' }).ROTATION_SEED).toBeNull();
    });

    it('keeps per-category variables', () => {
        expect(loadEnv({ EMAIL_RECEIVER_CYBER: 'a@example.com' }).EMAIL_RECEIVER_CYBER).toBe('a@example.com');
    });

    it('rejects out-of-range values', () => {
        expect(() => loadEnv({ MAX_PAGES: '0' })).toThrow(ConfigError);
        expect(() => loadEnv({ MAX_PAGES: '0' })).toThrow(/- MAX_PAGES:/);
        expect(() => loadEnv({ TIME_WINDOW: 'month' })).toThrow(/- TIME_WINDOW:/);
    });

    it('requires sheet credentials for the sheets backend', () => {
        let message = '';
        try {
            loadEnv({ LEDGER_BACKEND: 'sheets' });
        } catch (err) {
            message = err instanceof Error ? err.message : '';
        }
        expect(message).toBe(
            'Invalid environment variables:\n' +
            '- GOOGLE_CREDENTIALS: Required when LEDGER_BACKEND=sheets\n' +
            '- SPREADSHEET_ID: Required when LEDGER_BACKEND=sheets'
        );
    });
});
