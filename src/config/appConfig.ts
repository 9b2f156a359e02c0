/**
 * src/config/appConfig.ts
 *
 * Builds the single AppConfig value that is created once at process start
 * and passed by reference into the orchestrator. Nothing below the entry
 * point reads process.env.
 *
 * Category and location defaults live in data/categories.json and
 * data/locations.json (overridable with CATEGORIES_FILE / LOCATIONS_FILE).
 * Per-category settings come from the environment, keyed by the category's
 * short key:
 *   EMAIL_RECEIVER_<KEY>  comma-separated recipients
 *   SHEET_<KEY>           ledger region (sheet tab / table partition / file)
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError, formatIssues, loadEnv } from './env.js';
import { UNITED_STATES } from '../sources/types.js';
import type { Env } from './env.js';
import type { Category, TimeWindow } from '../sources/types.js';
import type { CountryPolicy } from '../utils/classifier.js';
import type { SmtpSettings } from '../services/notifier.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PostgresSettings {
    connectionString?: string;
    host: string;
    port: number;
    user?: string;
    password?: string;
    database: string;
    ssl: boolean;
    poolMax: number;
}

export type LedgerSettings =
    | { backend: 'file'; dir: string }
    | { backend: 'sheets'; sheets: { credentialsJson: string; spreadsheetId: string } }
    | { backend: 'postgres'; postgres: PostgresSettings };

export interface SearchSettings {
    timeWindow: TimeWindow;
    maxPages: number;
    locationsPerRun: number;
    /** null → current UTC hour. */
    rotationSeed: number | null;
    pageDelayMs: number;
}

export interface FetchSettings {
    timeoutMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    jitterMs: number;
    proxyUrls: string[];
}

export interface AppConfig {
    readonly logLevel: Env['LOG_LEVEL'];
    readonly categories: readonly Category[];
    readonly locations: readonly string[];
    readonly search: SearchSettings;
    readonly countryPolicy: CountryPolicy;
    readonly fetch: FetchSettings;
    readonly ledger: LedgerSettings;
    readonly smtp: SmtpSettings | null;
    readonly server: { host: string; port: number };
}

// ─── Data Files ───────────────────────────────────────────────────────────────

export const DEFAULT_CATEGORIES_FILE = fileURLToPath(new URL('../../data/categories.json', import.meta.url));
export const DEFAULT_LOCATIONS_FILE = fileURLToPath(new URL('../../data/locations.json', import.meta.url));

const categoryDefinitionSchema = z.object({
    key: z.string().regex(/^[A-Z0-9_]+$/, 'Use upper-case letters, digits and _'),
    name: z.string().min(1),
    keywords: z.array(z.string().trim().min(1)).min(1),
    defaultLedgerHandle: z.string().min(1),
});

export type CategoryDefinition = z.infer<typeof categoryDefinitionSchema>;

const categoriesFileSchema = z.array(categoryDefinitionSchema).min(1).superRefine((defs, ctx) => {
    const seen = new Set<string>();
    defs.forEach((def, index) => {
        if (seen.has(def.key)) {
            ctx.addIssue({ code: 'custom', path: [index, 'key'], message: `Duplicate category key ${def.key}` });
        }
        seen.add(def.key);
    });
});

const locationsFileSchema = z.array(z.string().trim().min(1));

function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Cannot read ${filePath}: ${reason}`);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`${filePath}\n${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

export function loadCategoryDefinitions(filePath: string = DEFAULT_CATEGORIES_FILE): CategoryDefinition[] {
    return readJsonFile(filePath, categoriesFileSchema);
}

export function loadLocations(filePath: string = DEFAULT_LOCATIONS_FILE): string[] {
    return readJsonFile(filePath, locationsFileSchema);
}

// ─── Builders ─────────────────────────────────────────────────────────────────

export function parseRecipients(value: string | undefined): string[] {
    if (!value) return [];
    return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

function envString(env: Env, key: string): string | undefined {
    const value = env[key];
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

export function buildCategories(env: Env, definitions: readonly CategoryDefinition[]): Category[] {
    return definitions.map((def) => ({
        key: def.key,
        name: def.name,
        keywords: [...def.keywords],
        recipients: parseRecipients(envString(env, `EMAIL_RECEIVER_${def.key}`)),
        ledgerHandle: envString(env, `SHEET_${def.key}`) ?? def.defaultLedgerHandle,
    }));
}

function buildLedgerSettings(env: Env): LedgerSettings {
    switch (env.LEDGER_BACKEND) {
        case 'sheets':
            if (!env.GOOGLE_CREDENTIALS || !env.SPREADSHEET_ID) {
                throw new ConfigError('GOOGLE_CREDENTIALS and SPREADSHEET_ID are required when LEDGER_BACKEND=sheets');
            }
            return {
                backend: 'sheets',
                sheets: { credentialsJson: env.GOOGLE_CREDENTIALS, spreadsheetId: env.SPREADSHEET_ID },
            };
        case 'postgres':
            return {
                backend: 'postgres',
                postgres: {
                    connectionString: env.DATABASE_URL,
                    host: env.PGHOST,
                    port: env.PGPORT,
                    user: env.PGUSER,
                    password: env.PGPASSWORD,
                    database: env.PGDATABASE,
                    ssl: env.PGSSL,
                    poolMax: env.PG_POOL_MAX,
                },
            };
        case 'file':
            return { backend: 'file', dir: env.LEDGER_DIR };
    }
}

function buildSmtpSettings(env: Env): SmtpSettings | null {
    if (!env.EMAIL_SENDER || !env.EMAIL_PASSWORD) return null;
    return {
        host: env.SMTP_HOST,
        port: env.SMTP_PORT,
        user: env.EMAIL_SENDER,
        pass: env.EMAIL_PASSWORD,
        from: env.EMAIL_SENDER,
    };
}

export function buildAppConfig(
    env: Env,
    definitions: readonly CategoryDefinition[],
    locations: readonly string[]
): AppConfig {
    return {
        logLevel: env.LOG_LEVEL,
        categories: buildCategories(env, definitions),
        locations: [...locations],
        search: {
            timeWindow: env.TIME_WINDOW,
            maxPages: env.MAX_PAGES,
            locationsPerRun: env.LOCATIONS_PER_RUN,
            rotationSeed: env.ROTATION_SEED,
            pageDelayMs: env.PAGE_DELAY_MS,
        },
        countryPolicy: { enforce: env.ENFORCE_COUNTRY, expected: UNITED_STATES },
        fetch: {
            timeoutMs: env.REQUEST_TIMEOUT_MS,
            maxAttempts: env.FETCH_MAX_ATTEMPTS,
            backoffBaseMs: env.FETCH_BACKOFF_MS,
            jitterMs: env.FETCH_JITTER_MS,
            proxyUrls: env.PROXY_URLS.split(',').map((s) => s.trim()).filter(Boolean),
        },
        ledger: buildLedgerSettings(env),
        smtp: buildSmtpSettings(env),
        server: { host: env.HOST, port: env.PORT },
    };
}

/** Reads the environment and the data files. Throws ConfigError on bad input. */
export function loadAppConfig(raw: NodeJS.ProcessEnv = process.env): AppConfig {
    const env = loadEnv(raw);
    const definitions = loadCategoryDefinitions(env.CATEGORIES_FILE ?? DEFAULT_CATEGORIES_FILE);
    const locations = loadLocations(env.LOCATIONS_FILE ?? DEFAULT_LOCATIONS_FILE);
    return buildAppConfig(env, definitions, locations);
}
