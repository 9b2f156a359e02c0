import { describe, it, expect } from 'vitest';
import { formatRunSummary, runOrchestrator } from './orchestrator.js';
import {
    EMPTY_PAGE,
    MemoryLedgerStore,
    RecordingNotifier,
    ScriptedPages,
    category,
    jobUrl,
    resultPage,
} from './testing/fakes.js';
import type { OrchestratorConfig } from './orchestrator.js';
import type { Category } from './sources/types.js';

const NOW = new Date('2026-03-02T05:00:00.000Z');

const CYBER = category({ name: 'Cybersecurity', keywords: ['Security', 'SOC'], ledgerHandle: 'Sheet3' });
const DEVOPS = category({ name: 'Data-DevOps', keywords: ['DevOps', 'Engineer'], ledgerHandle: 'Sheet4' });

function config(categories: Category[], overrides: Partial<OrchestratorConfig['search']> = {}): OrchestratorConfig {
    return {
        categories,
        locations: ['Austin, TX'],
        search: {
            timeWindow: 'hour',
            maxPages: 4,
            locationsPerRun: 5,
            rotationSeed: 0,
            pageDelayMs: 0,
            ...overrides,
        },
        countryPolicy: { enforce: true, expected: 'United States' },
    };
}

function setup(pages: Record<string, readonly string[]>, seeded: Record<string, string[][]> = {}) {
    const stores = new Map<string, MemoryLedgerStore>();
    const openStore = (region: string): MemoryLedgerStore => {
        let store = stores.get(region);
        if (!store) {
            store = new MemoryLedgerStore(region, seeded[region] ?? []);
            stores.set(region, store);
        }
        return store;
    };
    const fetcher = new ScriptedPages(pages);
    const notifier = new RecordingNotifier();
    return { stores, fetcher, notifier, deps: { openStore, fetcher, notifier, now: () => NOW } };
}

describe('runOrchestrator', () => {
    it('delivers a posting matched by two categories only under the first', async () => {
        const { deps, stores, notifier } = setup({
            'Austin, TX': [resultPage([{ id: '555', title: 'DevOps Security Engineer' }]), EMPTY_PAGE],
        });

        const summary = await runOrchestrator(config([CYBER, DEVOPS]), deps);

        expect(notifier.sent.map((s) => s.message.subject)).toEqual(['🔔 New Cybersecurity Job 🔔']);
        expect(stores.get('Sheet3')?.dataRows.map((r) => r[0])).toEqual(['555']);
        expect(stores.get('Sheet4')?.dataRows).toEqual([]);
        expect(summary.categories.map((c) => [c.stats.category, c.stats.matched, c.stats.duplicates])).toEqual([
            ['Cybersecurity', 1, 0],
            ['Data-DevOps', 0, 1],
        ]);
    });

    it('seeds the ledger from every category store', async () => {
        const { deps, notifier } = setup(
            { 'Austin, TX': [resultPage([{ id: '123', title: 'SOC Analyst' }]), EMPTY_PAGE] },
            { Sheet4: [['123', jobUrl('123'), 'SOC Analyst']] }
        );

        const summary = await runOrchestrator(config([CYBER, DEVOPS]), deps);

        expect(summary.seededIds).toBe(1);
        expect(notifier.sent).toHaveLength(0);
        expect(summary.totals.duplicates).toBe(2);
    });

    it('puts a header on every store before reading it', async () => {
        const { deps, stores } = setup({ 'Austin, TX': [EMPTY_PAGE] });

        await runOrchestrator(config([CYBER, DEVOPS]), deps);

        expect(stores.get('Sheet3')?.rows[0]?.[0]).toBe('Job ID');
        expect(stores.get('Sheet4')?.rows[0]?.[0]).toBe('Job ID');
    });

    it('still runs a category whose store cannot be read', async () => {
        const { deps, stores } = setup({
            'Austin, TX': [resultPage([{ id: '8', title: 'Security Engineer' }]), EMPTY_PAGE],
        });
        deps.openStore('Sheet3').failReads = true;

        const summary = await runOrchestrator(config([CYBER]), deps);

        expect(summary.categories[0]?.error).toBeNull();
        expect(stores.get('Sheet3')?.dataRows).toHaveLength(1);
    });

    it('searches the rotated window of locations', async () => {
        const { deps, fetcher } = setup({});
        const cfg: OrchestratorConfig = {
            ...config([CYBER], { locationsPerRun: 2, rotationSeed: 1 }),
            locations: ['Austin, TX', 'Denver, CO', 'Boston, MA'],
        };

        const summary = await runOrchestrator(cfg, deps);

        expect(summary.seed).toBe(1);
        expect(summary.locations).toEqual(['Denver, CO', 'Boston, MA']);
        expect(fetcher.calls.map((c) => c.query.location)).toEqual(['Denver, CO', 'Boston, MA']);
    });

    it('seeds the rotation with the UTC hour when no seed is configured', async () => {
        const { deps } = setup({});
        const summary = await runOrchestrator(config([CYBER], { rotationSeed: null }), deps);
        expect(summary.seed).toBe(5);
    });

    it('sums totals across categories', async () => {
        const { deps } = setup({
            'Austin, TX': [
                resultPage([
                    { id: '1', title: 'SOC Analyst' },
                    { id: '2', title: 'DevOps Engineer' },
                    { id: '3', title: 'Barista' },
                ]),
                EMPTY_PAGE,
            ],
        });

        const summary = await runOrchestrator(config([CYBER, DEVOPS]), deps);

        expect(summary.totals).toEqual({
            pagesFetched: 4,
            cardsSeen: 6,
            duplicates: 1,
            matched: 2,
            notified: 2,
            persisted: 2,
            failures: 0,
        });
    });
});

describe('formatRunSummary', () => {
    it('fits the run on one line', async () => {
        const { deps } = setup({
            'Austin, TX': [resultPage([{ id: '1', title: 'SOC Analyst' }]), EMPTY_PAGE],
        });
        const summary = await runOrchestrator(config([CYBER, DEVOPS]), deps);

        expect(formatRunSummary(summary)).toBe(
            `run ${summary.runId}: 1 new posting(s) [Cybersecurity=1, Data-DevOps=0] across 1 location(s) in 0.0s`
        );
    });
});
