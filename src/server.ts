/**
 * src/server.ts
 *
 * HTTP trigger for schedulers (cron, Cloud Scheduler, uptime pingers).
 *
 *   GET /         run once, reply with a one-line summary
 *   GET /run      same as /
 *   GET /healthz  "ok", no I/O
 *   HEAD          200 on any of the above, never starts a run
 *
 * A run request that arrives while this process is still busy with another
 * run gets 409. Nothing coordinates separate processes.
 */

import http from 'http';
import type { AddressInfo } from 'net';
import { log } from 'crawlee';
import { formatRunSummary } from './orchestrator.js';
import type { RunSummary } from './orchestrator.js';

export type RunOnce = () => Promise<RunSummary>;

const RUN_PATHS = new Set(['/', '/run']);

function reply(res: http.ServerResponse, status: number, body: string): void {
    res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end(body + '\n');
}

export function createTriggerServer(runOnce: RunOnce): http.Server {
    let busy = false;

    async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const path = new URL(req.url ?? '/', 'http://localhost').pathname;

        if (req.method !== 'GET' && req.method !== 'HEAD') {
            reply(res, 405, 'method not allowed');
            return;
        }

        if (path === '/healthz' || (req.method === 'HEAD' && RUN_PATHS.has(path))) {
            reply(res, 200, 'ok');
            return;
        }

        if (!RUN_PATHS.has(path)) {
            reply(res, 404, 'not found');
            return;
        }

        if (busy) {
            log.warning('[Server] Run requested while another run is in progress — rejected.');
            reply(res, 409, 'a run is already in progress');
            return;
        }

        busy = true;
        try {
            const summary = await runOnce();
            reply(res, 200, formatRunSummary(summary));
        } finally {
            busy = false;
        }
    }

    return http.createServer((req, res) => {
        handle(req, res).catch((err: unknown) => {
            const error = err instanceof Error ? err : new Error(String(err));
            log.exception(error, '[Server] Run failed');
            if (!res.headersSent) reply(res, 500, `run failed: ${error.message}`);
            else res.end();
        });
    });
}

export function listen(server: http.Server, port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error('Server is not listening on a TCP port'));
                return;
            }
            resolve(address);
        });
    });
}

export function close(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}
