import { afterEach, describe, it, expect } from 'vitest';
import { close, createTriggerServer, listen } from './server.js';
import type http from 'http';
import type { RunSummary } from './orchestrator.js';

const SUMMARY: RunSummary = {
    runId: 'run-1',
    startedAt: '2026-03-02T05:00:00.000Z',
    durationMs: 1500,
    seed: 5,
    locations: ['Austin, TX'],
    seededIds: 0,
    categories: [],
    totals: { pagesFetched: 1, cardsSeen: 0, duplicates: 0, matched: 0, notified: 0, persisted: 0, failures: 0 },
};

let server: http.Server | null = null;

afterEach(async () => {
    if (server) await close(server);
    server = null;
});

async function start(runOnce: () => Promise<RunSummary>): Promise<string> {
    server = createTriggerServer(runOnce);
    const address = await listen(server, 0, '127.0.0.1');
    return `http://127.0.0.1:${address.port}`;
}

describe('trigger server', () => {
    it('answers liveness without running', async () => {
        let runs = 0;
        const base = await start(async () => {
            runs++;
            return SUMMARY;
        });

        const resp = await fetch(`${base}/healthz`);
        expect(resp.status).toBe(200);
        expect(await resp.text()).toBe('ok\n');
        expect(runs).toBe(0);
    });

    it('answers HEAD on the run paths without running', async () => {
        let runs = 0;
        const base = await start(async () => {
            runs++;
            return SUMMARY;
        });

        const root = await fetch(`${base}/`, { method: 'HEAD' });
        const run = await fetch(`${base}/run`, { method: 'HEAD' });

        expect(root.status).toBe(200);
        expect(run.status).toBe(200);
        expect(runs).toBe(0);
    });

    it('runs once per request on / and /run', async () => {
        let runs = 0;
        const base = await start(async () => {
            runs++;
            return SUMMARY;
        });

        const first = await fetch(`${base}/`);
        const second = await fetch(`${base}/run`);

        expect(first.status).toBe(200);
        expect(await first.text()).toBe('run run-1: 0 new posting(s) [] across 1 location(s) in 1.5s\n');
        expect(second.status).toBe(200);
        expect(runs).toBe(2);
    });

    it('rejects a run while another is in progress', async () => {
        let release: (summary: RunSummary) => void = () => {};
        let entered: () => void = () => {};
        const running = new Promise<void>((resolve) => {
            entered = resolve;
        });
        const base = await start(() => {
            entered();
            return new Promise<RunSummary>((resolve) => {
                release = resolve;
            });
        });

        const pending = fetch(`${base}/run`);
        await running;

        const busy = await fetch(`${base}/run`);
        expect(busy.status).toBe(409);
        expect(await busy.text()).toBe('a run is already in progress\n');

        release(SUMMARY);
        const done = await pending;
        expect(done.status).toBe(200);
        await done.text();
    });

    it('reports a failed run as 500', async () => {
        const base = await start(async () => {
            throw new Error('ledger offline');
        });

        const resp = await fetch(`${base}/`);
        expect(resp.status).toBe(500);
        expect(await resp.text()).toBe('run failed: ledger offline\n');
    });

    it('returns 404 for unknown paths and 405 for other methods', async () => {
        const base = await start(async () => SUMMARY);
        expect((await fetch(`${base}/nope`)).status).toBe(404);
        expect((await fetch(`${base}/run`, { method: 'POST' })).status).toBe(405);
    });
});
