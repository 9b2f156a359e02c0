/**
 * src/orchestrator.ts
 *
 * ONE RUN ACROSS ALL CATEGORIES
 *
 *   1. Sample this run's locations (rotation seeded by the UTC hour unless
 *      ROTATION_SEED is set).
 *   2. Open one ledger store per category, make sure its header is in place
 *      and read back every stored identity.
 *   3. Seed a single DedupeLedger from the union of those identities.
 *   4. Run the category pipelines one after another, in configured order,
 *      all against that same ledger.
 *
 * A posting that matches two categories is therefore only delivered under
 * whichever category comes first. A category that throws is logged and
 * reported as failed; the remaining categories still run.
 *
 * Overlapping runs are not coordinated: two processes that read the ledger
 * before either writes can both deliver the same posting.
 */

import { log } from 'crawlee';
import { emptyCategoryStats, runCategoryPipeline } from './categoryPipeline.js';
import { DedupeLedger } from './utils/dedupeLedger.js';
import { defaultRotationSeed, rotateLocations } from './utils/locationRotation.js';
import { createRunContext } from './utils/runContext.js';
import type { CategoryRunStats, PageSource } from './categoryPipeline.js';
import type { AppConfig } from './config/appConfig.js';
import type { Notifier } from './services/notifier.js';
import type { LedgerStore, LedgerStoreFactory } from './store/types.js';
import type { LedgerEntry } from './utils/dedupeLedger.js';
import type { Category } from './sources/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type OrchestratorConfig = Pick<AppConfig, 'categories' | 'locations' | 'search' | 'countryPolicy'>;

export interface OrchestratorDeps {
    openStore: LedgerStoreFactory;
    fetcher: PageSource;
    notifier: Notifier;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
}

export interface CategoryOutcome {
    stats: CategoryRunStats;
    /** Set when the category pipeline threw. */
    error: string | null;
}

export interface RunTotals {
    pagesFetched: number;
    cardsSeen: number;
    duplicates: number;
    matched: number;
    notified: number;
    persisted: number;
    failures: number;
}

export interface RunSummary {
    runId: string;
    startedAt: string;
    durationMs: number;
    seed: number;
    locations: string[];
    /** Distinct ids loaded from the stores before the first category ran. */
    seededIds: number;
    categories: CategoryOutcome[];
    totals: RunTotals;
}

interface OpenedCategory {
    category: Category;
    store: LedgerStore;
}

// ─── Ledger Seeding ───────────────────────────────────────────────────────────

async function prepareStores(opened: readonly OpenedCategory[]): Promise<LedgerEntry[]> {
    const entries: LedgerEntry[] = [];

    for (const { category, store } of opened) {
        const header = await store.ensureHeader();
        if (!header.ok) {
            log.warning(`[Orchestrator] Header check failed for "${store.region}" (${category.name}): ${header.error}`);
        }

        const read = await store.readEntries();
        if (!read.ok) {
            log.warning(`[Orchestrator] Could not read "${store.region}" (${category.name}): ${read.error}`);
            continue;
        }
        log.debug(`[Orchestrator] "${store.region}": ${read.value.length} stored rows`);
        entries.push(...read.value);
    }

    return entries;
}

// ─── Summary ──────────────────────────────────────────────────────────────────

function sumTotals(outcomes: readonly CategoryOutcome[]): RunTotals {
    const totals: RunTotals = {
        pagesFetched: 0,
        cardsSeen: 0,
        duplicates: 0,
        matched: 0,
        notified: 0,
        persisted: 0,
        failures: 0,
    };
    for (const { stats, error } of outcomes) {
        totals.pagesFetched += stats.pagesFetched;
        totals.cardsSeen += stats.cardsSeen;
        totals.duplicates += stats.duplicates;
        totals.matched += stats.matched;
        totals.notified += stats.notified;
        totals.persisted += stats.persisted;
        totals.failures += stats.notifyFailures + stats.persistFailures + stats.locationsFailed + (error ? 1 : 0);
    }
    return totals;
}

/** One line, used as the HTTP trigger's reply and the CLI's last line. */
export function formatRunSummary(summary: RunSummary): string {
    const perCategory = summary.categories
        .map(({ stats, error }) => (error ? `${stats.category}=failed` : `${stats.category}=${stats.matched}`))
        .join(', ');
    return (
        `run ${summary.runId}: ${summary.totals.matched} new posting(s) [${perCategory}] ` +
        `across ${summary.locations.length} location(s) in ${(summary.durationMs / 1000).toFixed(1)}s`
    );
}

function logSummary(summary: RunSummary): void {
    log.info('\n' + '█'.repeat(60));
    log.info('  RUN COMPLETE');
    log.info(`  Run ID:        ${summary.runId}`);
    log.info(`  Duration:      ${(summary.durationMs / 1000).toFixed(1)}s`);
    log.info(`  Pages fetched: ${summary.totals.pagesFetched}`);
    log.info(`  Cards seen:    ${summary.totals.cardsSeen}`);
    log.info(`  Duplicates:    ${summary.totals.duplicates}`);
    log.info(`  New matches:   ${summary.totals.matched}`);
    log.info(`  Notified:      ${summary.totals.notified}`);
    log.info(`  Persisted:     ${summary.totals.persisted}`);
    log.info(`  Failures:      ${summary.totals.failures}`);
    log.info('  Per category:');
    for (const { stats, error } of summary.categories) {
        const status = error ? `✗ ERROR: ${error}` : `✓ ${stats.matched} new / ${stats.cardsSeen} cards`;
        log.info(`    [${stats.category}] ${status}`);
    }
    log.info('█'.repeat(60));
}

// ─── Main Orchestrator ────────────────────────────────────────────────────────

export async function runOrchestrator(config: OrchestratorConfig, deps: OrchestratorDeps): Promise<RunSummary> {
    const now = deps.now ?? (() => new Date());
    const started = now();
    const context = createRunContext(started);

    const seed = config.search.rotationSeed ?? defaultRotationSeed(started);
    const locations = rotateLocations(config.locations, config.search.locationsPerRun, seed);

    log.info('\n' + '█'.repeat(60));
    log.info('  JOB WATCH — RUN START');
    log.info(`  Run ID:     ${context.runId}`);
    log.info(`  Categories: ${config.categories.map((c) => c.name).join(', ')}`);
    log.info(`  Locations:  ${locations.join(' | ')} (seed ${seed})`);
    log.info(`  Window:     ${config.search.timeWindow}, up to ${config.search.maxPages} page(s) each`);
    log.info('█'.repeat(60));

    const opened: OpenedCategory[] = config.categories.map((category) => ({
        category,
        store: deps.openStore(category.ledgerHandle),
    }));

    const ledger = DedupeLedger.fromEntries(await prepareStores(opened));
    const seededIds = ledger.size;
    log.info(`[Orchestrator] Ledger seeded with ${seededIds} known posting id(s).`);

    const outcomes: CategoryOutcome[] = [];
    for (const { category, store } of opened) {
        try {
            const stats = await runCategoryPipeline(
                { fetcher: deps.fetcher, store, notifier: deps.notifier, now, sleep: deps.sleep },
                category,
                ledger,
                {
                    locations,
                    maxPages: config.search.maxPages,
                    timeWindow: config.search.timeWindow,
                    countryPolicy: config.countryPolicy,
                    pageDelayMs: config.search.pageDelayMs,
                }
            );
            outcomes.push({ stats, error: null });
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            log.exception(error, `[Orchestrator] Category "${category.name}" failed`);
            outcomes.push({ stats: emptyCategoryStats(category.name), error: error.message });
        }
    }

    const summary: RunSummary = {
        runId: context.runId,
        startedAt: context.startedAt,
        durationMs: Math.max(0, now().getTime() - started.getTime()),
        seed,
        locations,
        seededIds,
        categories: outcomes,
        totals: sumTotals(outcomes),
    };
    logSummary(summary);
    return summary;
}
