/**
 * src/sources/pageFetcher.ts
 *
 * Fetches one page of guest-search results with bounded retry.
 *
 * Transient failures (connection errors, timeouts, 429 and 500/502/503/504)
 * are retried with exponential backoff:
 *
 *   delay = backoffBaseMs × 2^(attempt − 1) + random(0, jitterMs)
 *
 * Everything else that is not a 2xx with a non-blank body ends the fetch at
 * once. The fetcher never throws: callers get a PageFetchResult and treat
 * any failure as "no more pages" for that query. Only GET is ever issued,
 * so a retry can never duplicate a side effect.
 */

import { log } from 'crawlee';
import { BROWSER_HEADERS, PAGE_SIZE, buildGuestSearchUrl } from '../config/linkedin.js';
import { errorMessage } from './httpTransport.js';
import type { HttpTransport } from './httpTransport.js';
import type { SearchQuery } from './types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type PageQuery = Omit<SearchQuery, 'pageStart'>;

export type PageFetchFailureReason =
    | 'network'          // connection error / timeout on every attempt
    | 'retryable-status' // 429/5xx on every attempt
    | 'http-status'      // any other non-2xx
    | 'empty-body';      // 2xx with nothing in it

export type PageFetchResult =
    | { ok: true; url: string; status: number; body: string; attempts: number }
    | {
        ok: false;
        url: string;
        reason: PageFetchFailureReason;
        status: number | null;
        error: string | null;
        attempts: number;
    };

export interface PageFetcherOptions {
    timeoutMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    jitterMs: number;
    /** Injectable for tests. */
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

// ─── Constants ────────────────────────────────────────────────────────────────

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export const DEFAULT_FETCHER_OPTIONS: PageFetcherOptions = {
    timeoutMs: 15_000,
    maxAttempts: 3,
    backoffBaseMs: 600,
    jitterMs: 0,
};

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Fetcher ──────────────────────────────────────────────────────────────────

export class PageFetcher {
    private readonly options: PageFetcherOptions;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;

    constructor(
        private readonly transport: HttpTransport,
        options: Partial<PageFetcherOptions> = {},
    ) {
        this.options = { ...DEFAULT_FETCHER_OPTIONS, ...options };
        this.sleep = options.sleep ?? sleep;
        this.random = options.random ?? Math.random;
    }

    /** Delay before retry number `attempt` (1 = first retry). */
    getBackoffDelay(attempt: number): number {
        const exponential = this.options.backoffBaseMs * Math.pow(2, attempt - 1);
        const jitter = this.random() * this.options.jitterMs;
        return Math.round(exponential + jitter);
    }

    async fetchPage(query: PageQuery, pageIndex: number): Promise<PageFetchResult> {
        const url = buildGuestSearchUrl({ ...query, pageStart: pageIndex * PAGE_SIZE });
        const maxAttempts = Math.max(1, this.options.maxAttempts);

        let lastStatus: number | null = null;
        let lastError: string | null = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            let status: number;
            let body: string;

            try {
                const resp = await this.transport.get(url, {
                    headers: BROWSER_HEADERS,
                    timeoutMs: this.options.timeoutMs,
                });
                status = resp.status;
                body = resp.body;
            } catch (err) {
                lastError = errorMessage(err);
                lastStatus = null;
                if (attempt < maxAttempts) {
                    await this.backoff(attempt, `request error: ${lastError}`);
                    continue;
                }
                log.warning(`[PageFetcher] Giving up after ${attempt} attempts: ${lastError} (${url})`);
                return { ok: false, url, reason: 'network', status: null, error: lastError, attempts: attempt };
            }

            if (RETRYABLE_STATUSES.has(status)) {
                lastStatus = status;
                lastError = null;
                if (attempt < maxAttempts) {
                    await this.backoff(attempt, `HTTP ${status}`);
                    continue;
                }
                log.warning(`[PageFetcher] Giving up after ${attempt} attempts: HTTP ${status} (${url})`);
                return { ok: false, url, reason: 'retryable-status', status, error: null, attempts: attempt };
            }

            if (status < 200 || status >= 300) {
                log.debug(`[PageFetcher] HTTP ${status} — treating as end of results (${url})`);
                return { ok: false, url, reason: 'http-status', status, error: null, attempts: attempt };
            }

            if (!body.trim()) {
                log.debug(`[PageFetcher] Empty body — end of results (${url})`);
                return { ok: false, url, reason: 'empty-body', status, error: null, attempts: attempt };
            }

            return { ok: true, url, status, body, attempts: attempt };
        }

        // Unreachable: the loop always returns on its last attempt.
        return {
            ok: false,
            url,
            reason: lastStatus === null ? 'network' : 'retryable-status',
            status: lastStatus,
            error: lastError,
            attempts: maxAttempts,
        };
    }

    private async backoff(attempt: number, reason: string): Promise<void> {
        const delayMs = this.getBackoffDelay(attempt);
        log.debug(
            `[PageFetcher] ${reason} | Attempt ${attempt}/${this.options.maxAttempts} | ` +
            `Backing off ${(delayMs / 1000).toFixed(1)}s`
        );
        await this.sleep(delayMs);
    }
}
