/**
 * src/utils/db.ts
 *
 * PostgreSQL connection pool for the postgres ledger backend.
 *
 * The pool is lazy (it does NOT connect until the first query) and is only
 * created when LEDGER_BACKEND=postgres, so the other backends never need a
 * database. DATABASE_URL takes priority over the individual PG* settings.
 */

import pkg from 'pg';
import { log } from 'crawlee';
import type { PostgresSettings } from '../config/appConfig.js';

const { Pool } = pkg;

/** The slice of Pool#query the stores use; rows are checked by the caller. */
export type QueryFn = (
    sql: string,
    values?: unknown[]
) => Promise<{ rows: pkg.QueryResultRow[]; rowCount: number | null }>;

export interface Database {
    query: QueryFn;
    close(): Promise<void>;
}

export function buildPoolConfig(settings: PostgresSettings): pkg.PoolConfig {
    const common = {
        max: settings.poolMax,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5_000,
    };

    if (settings.connectionString) {
        const wantsSsl = settings.connectionString.includes('sslmode=require') || settings.ssl;
        return {
            ...common,
            connectionString: settings.connectionString,
            ssl: wantsSsl ? { rejectUnauthorized: false } : undefined,
        };
    }

    return {
        ...common,
        host: settings.host,
        port: settings.port,
        user: settings.user,
        password: settings.password,
        database: settings.database,
        ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
    };
}

export function createDatabase(settings: PostgresSettings): Database {
    const pool = new Pool(buildPoolConfig(settings));

    pool.on('error', (err) => {
        log.error(`[DB] Unexpected pool error: ${err.message}`);
    });

    return {
        query: (sql, values) => pool.query(sql, values),
        close: () => pool.end(),
    };
}
