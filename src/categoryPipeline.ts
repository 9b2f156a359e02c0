/**
 * src/categoryPipeline.ts
 *
 * One category, one run: search every sampled location, page by page, and
 * deliver each new matching posting exactly once.
 *
 * FLOW
 * ────
 *   for each location
 *     for page 0 … maxPages-1
 *       fetch ─ failure ──────────────→ next location
 *       parse ─ no cards ─────────────→ next location
 *       for each card
 *         id seen this run / in ledger → skip
 *         keyword + country check ─ no → skip (only remembered for this run)
 *         notify → persist at row 2 → ledger.accept
 *
 * Notification and store failures are counted and logged; neither stops the
 * card from being accepted into the shared ledger, so nothing is re-sent
 * later in the same run. A throw while handling one location is logged and
 * the next location still runs.
 */

import { log } from 'crawlee';
import { joinKeywords } from './config/linkedin.js';
import { parseResultPage } from './extractors/linkedin.js';
import { formatPostingMessage } from './services/notifier.js';
import { FIRST_DATA_ROW, postingToRow } from './store/types.js';
import { countryOf, matchesKeywords, passesCountryPolicy } from './utils/classifier.js';
import { canonicalizeUrl, extractJobId } from './utils/jobId.js';
import { sleep as defaultSleep } from './sources/pageFetcher.js';
import type { Notifier } from './services/notifier.js';
import type { PageFetchResult, PageQuery } from './sources/pageFetcher.js';
import type { LedgerStore } from './store/types.js';
import type { CountryPolicy } from './utils/classifier.js';
import type { DedupeLedger, LedgerEntry } from './utils/dedupeLedger.js';
import type { Category, JobPosting, PostingCandidate, TimeWindow } from './sources/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/** What the pipeline needs from a page fetcher. PageFetcher satisfies it. */
export interface PageSource {
    fetchPage(query: PageQuery, pageIndex: number): Promise<PageFetchResult>;
}

export interface CategoryPipelineDeps {
    fetcher: PageSource;
    store: LedgerStore;
    notifier: Notifier;
    now?: () => Date;
    sleep?: (ms: number) => Promise<void>;
}

export interface CategoryPipelineOptions {
    locations: readonly string[];
    maxPages: number;
    timeWindow: TimeWindow;
    countryPolicy: CountryPolicy;
    /** Pause between consecutive pages of one location. 0 disables it. */
    pageDelayMs: number;
}

export interface CategoryRunStats {
    category: string;
    locationsSearched: number;
    locationsFailed: number;
    pagesFetched: number;
    cardsSeen: number;
    duplicates: number;
    rejected: number;
    matched: number;
    notified: number;
    notifyFailures: number;
    persisted: number;
    persistFailures: number;
}

export function emptyCategoryStats(category: string): CategoryRunStats {
    return {
        category,
        locationsSearched: 0,
        locationsFailed: 0,
        pagesFetched: 0,
        cardsSeen: 0,
        duplicates: 0,
        rejected: 0,
        matched: 0,
        notified: 0,
        notifyFailures: 0,
        persisted: 0,
        persistFailures: 0,
    };
}

interface RunState {
    readonly deps: Required<CategoryPipelineDeps>;
    readonly category: Category;
    readonly ledger: DedupeLedger;
    readonly options: CategoryPipelineOptions;
    readonly seenThisRun: Set<string>;
    readonly stats: CategoryRunStats;
}

// ─── Pipeline ─────────────────────────────────────────────────────────────────

export async function runCategoryPipeline(
    deps: CategoryPipelineDeps,
    category: Category,
    ledger: DedupeLedger,
    options: CategoryPipelineOptions
): Promise<CategoryRunStats> {
    const state: RunState = {
        deps: {
            ...deps,
            now: deps.now ?? (() => new Date()),
            sleep: deps.sleep ?? defaultSleep,
        },
        category,
        ledger,
        options,
        seenThisRun: new Set<string>(),
        stats: emptyCategoryStats(category.name),
    };

    for (const location of options.locations) {
        try {
            await searchLocation(state, location);
            state.stats.locationsSearched++;
        } catch (err) {
            state.stats.locationsFailed++;
            log.exception(
                err instanceof Error ? err : new Error(String(err)),
                `[Pipeline:${category.name}] Location "${location}" aborted`
            );
        }
    }

    return state.stats;
}

async function searchLocation(state: RunState, location: string): Promise<void> {
    const { deps, category, options, stats } = state;
    const query: PageQuery = {
        keywords: joinKeywords(category.keywords),
        location,
        timeWindow: options.timeWindow,
    };

    for (let pageIndex = 0; pageIndex < options.maxPages; pageIndex++) {
        if (pageIndex > 0 && options.pageDelayMs > 0) {
            await deps.sleep(options.pageDelayMs);
        }

        const result = await deps.fetcher.fetchPage(query, pageIndex);
        stats.pagesFetched++;
        if (!result.ok) {
            log.debug(`[Pipeline:${category.name}] ${location} p${pageIndex}: stop (${result.reason})`);
            return;
        }

        const page = parseResultPage(result.body);
        if (page.cardCount === 0) {
            log.debug(`[Pipeline:${category.name}] ${location} p${pageIndex}: no cards, stop`);
            return;
        }

        for (const candidate of page.candidates) {
            await handleCandidate(state, candidate);
        }
    }
}

async function handleCandidate(state: RunState, candidate: PostingCandidate): Promise<void> {
    const { deps, category, ledger, options, seenThisRun, stats } = state;
    stats.cardsSeen++;

    const entry: LedgerEntry = {
        id: extractJobId(candidate.url),
        url: canonicalizeUrl(candidate.url),
    };

    if (seenThisRun.has(entry.id) || ledger.isKnown(entry)) {
        stats.duplicates++;
        return;
    }
    seenThisRun.add(entry.id);

    const country = countryOf(candidate.location);
    if (!matchesKeywords(candidate.title, category.keywords) || !passesCountryPolicy(country, options.countryPolicy)) {
        stats.rejected++;
        return;
    }
    stats.matched++;

    const posting: JobPosting = {
        id: entry.id,
        url: entry.url,
        title: candidate.title,
        company: candidate.company,
        location: candidate.location,
        country,
        category: category.name,
        scrapedAt: deps.now().toISOString(),
    };

    const sent = await deps.notifier.send(formatPostingMessage(posting), category.recipients);
    if (!sent.ok) {
        stats.notifyFailures++;
    } else if (!sent.skipped) {
        stats.notified++;
    }

    const stored = await deps.store.insertRow(postingToRow(posting), FIRST_DATA_ROW);
    if (stored.ok) {
        stats.persisted++;
    } else {
        stats.persistFailures++;
        log.warning(`[Pipeline:${category.name}] Could not persist ${posting.id} to "${deps.store.region}": ${stored.error}`);
    }

    ledger.accept(entry);
    log.info(`[Pipeline:${category.name}] ✓ New: "${posting.title}" @ "${posting.company}" (${posting.location})`);
}
