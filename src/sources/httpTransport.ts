/**
 * src/sources/httpTransport.ts
 *
 * Blocking GET transports used by the page fetcher.
 *
 *   DirectTransport   → global fetch() with an abort timeout (null tier).
 *   ProxyTransport    → got-scraping through a configured proxy.
 *   FallbackTransport → direct first, proxy when the direct call errors or
 *                       comes back with a 4xx/5xx.
 *
 * A transport resolves with whatever status the server sent and rejects
 * only on connection errors and timeouts. Retry policy lives in the fetcher.
 */

import { log } from 'crawlee';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface HttpResponse {
    status: number;
    body: string;
}

export interface HttpGetOptions {
    headers: Readonly<Record<string, string>>;
    timeoutMs: number;
}

export interface HttpTransport {
    readonly name: string;
    get(url: string, options: HttpGetOptions): Promise<HttpResponse>;
}

// ─── Direct ───────────────────────────────────────────────────────────────────

export class DirectTransport implements HttpTransport {
    readonly name = 'direct';

    async get(url: string, { headers, timeoutMs }: HttpGetOptions): Promise<HttpResponse> {
        const resp = await fetch(url, {
            method: 'GET',
            headers: { ...headers },
            signal: AbortSignal.timeout(timeoutMs),
        });
        return { status: resp.status, body: await resp.text() };
    }
}

// ─── Proxy ────────────────────────────────────────────────────────────────────

/**
 * Proxy URLs copied out of provider dashboards often carry percent-encoded
 * credentials; got-scraping expects them decoded.
 */
export function normalizeProxyUrl(proxyUrl: string): string {
    if (!proxyUrl.includes('@')) return proxyUrl;
    try {
        const p = new URL(proxyUrl);
        const user = decodeURIComponent(p.username);
        const pass = decodeURIComponent(p.password);
        return `${p.protocol}//${user}:${pass}@${p.hostname}${p.port ? `:${p.port}` : ''}`;
    } catch {
        return proxyUrl;
    }
}

export class ProxyTransport implements HttpTransport {
    readonly name = 'proxy';
    private readonly proxyUrl: string;

    constructor(proxyUrl: string) {
        this.proxyUrl = normalizeProxyUrl(proxyUrl);
    }

    async get(url: string, { headers, timeoutMs }: HttpGetOptions): Promise<HttpResponse> {
        const { gotScraping } = await import('got-scraping');
        const response = await gotScraping({
            url,
            proxyUrl: this.proxyUrl,
            headers: { ...headers },
            timeout: { request: timeoutMs },
            retry: { limit: 0 },
            throwHttpErrors: false,
        });
        return { status: response.statusCode, body: response.body };
    }
}

// ─── Fallback ─────────────────────────────────────────────────────────────────

export class FallbackTransport implements HttpTransport {
    readonly name: string;

    constructor(
        private readonly primary: HttpTransport,
        private readonly fallback: HttpTransport,
    ) {
        this.name = `${primary.name}+${fallback.name}`;
    }

    async get(url: string, options: HttpGetOptions): Promise<HttpResponse> {
        try {
            const resp = await this.primary.get(url, options);
            if (resp.status < 400) return resp;
            log.debug(`[Transport] ${this.primary.name} HTTP ${resp.status}, falling back to ${this.fallback.name}…`);
        } catch (err) {
            log.debug(`[Transport] ${this.primary.name} error: ${errorMessage(err)}, falling back to ${this.fallback.name}…`);
        }
        return this.fallback.get(url, options);
    }
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/** Direct only, or direct with the first configured proxy as fallback. */
export function createTransport(proxyUrls: readonly string[]): HttpTransport {
    const direct = new DirectTransport();
    const proxyUrl = proxyUrls[0];
    if (!proxyUrl) return direct;
    return new FallbackTransport(direct, new ProxyTransport(proxyUrl));
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
