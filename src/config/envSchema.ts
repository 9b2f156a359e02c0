import { z } from 'zod';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const boolUnlessFalse = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() !== 'false';
    return v;
}, z.boolean());

const numFromEnv = z.preprocess((v) => {
    if (v === undefined || v === '') return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
}, z.number().finite());

const intOrNullFromTruthy = z.preprocess((v) => {
    if (v === undefined) return null;
    if (typeof v === 'string') return v.trim() ? Number(v) : null;
    return v;
}, z.number().int().nullable());

export const envSchema = z.object({
    LOG_LEVEL: z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'OFF']).default('INFO'),

    CATEGORIES_FILE: z.string().optional(),
    LOCATIONS_FILE: z.string().optional(),

    TIME_WINDOW: z.enum(['hour', 'day', 'week']).default('hour'),
    MAX_PAGES: numFromEnv.pipe(z.number().int().min(1).max(40)).default(4),
    LOCATIONS_PER_RUN: numFromEnv.pipe(z.number().int().min(1)).default(5),
    ROTATION_SEED: intOrNullFromTruthy.default(null),
    ENFORCE_COUNTRY: boolUnlessFalse.default(true),

    REQUEST_TIMEOUT_MS: numFromEnv.pipe(z.number().int().positive()).default(15_000),
    FETCH_MAX_ATTEMPTS: numFromEnv.pipe(z.number().int().min(1).max(10)).default(3),
    FETCH_BACKOFF_MS: numFromEnv.pipe(z.number().min(0)).default(600),
    FETCH_JITTER_MS: numFromEnv.pipe(z.number().min(0)).default(0),
    PAGE_DELAY_MS: numFromEnv.pipe(z.number().min(0)).default(0),
    PROXY_URLS: z.string().default(''),

    LEDGER_BACKEND: z.enum(['file', 'sheets', 'postgres']).default('file'),
    LEDGER_DIR: z.string().default('storage/ledger'),

    GOOGLE_CREDENTIALS: z.string().optional(),
    SPREADSHEET_ID: z.string().optional(),

    DATABASE_URL: z.string().optional(),
    PGHOST: z.string().default('localhost'),
    PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
    PGUSER: z.string().optional(),
    PGPASSWORD: z.string().optional(),
    PGDATABASE: z.string().default('job_watch'),
    PGSSL: boolStrictTrue.default(false),
    PG_POOL_MAX: numFromEnv.default(5),

    SMTP_HOST: z.string().default('smtp.gmail.com'),
    SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(465),
    EMAIL_SENDER: z.string().optional(),
    EMAIL_PASSWORD: z.string().optional(),

    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
}).passthrough().superRefine((env, ctx) => {
    if (env.LEDGER_BACKEND === 'sheets') {
        if (!env.GOOGLE_CREDENTIALS) {
            ctx.addIssue({ code: 'custom', path: ['GOOGLE_CREDENTIALS'], message: 'Required when LEDGER_BACKEND=sheets' });
        }
        if (!env.SPREADSHEET_ID) {
            ctx.addIssue({ code: 'custom', path: ['SPREADSHEET_ID'], message: 'Required when LEDGER_BACKEND=sheets' });
        }
    }
});

export type Env = z.infer<typeof envSchema>;
