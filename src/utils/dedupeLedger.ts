/**
 * src/utils/dedupeLedger.ts
 *
 * In-memory identity set shared by every category in one run.
 *
 * The orchestrator builds exactly one ledger per run, seeds it from the union
 * of all categories' persisted rows, and hands the same instance to each
 * category pipeline. A posting id is accepted at most once for the lifetime
 * of the ledger, so a listing matched by two categories is only delivered
 * under the first one to reach it.
 *
 * The id is the only key for postings whose id was read from the URL.
 * Canonical URLs are a secondary key only between entries that fell back to
 * a hashed id, such as older URL-only rows: `/jobs/search/?currentJobId=N`
 * listings share one canonical URL but are distinct postings.
 */

import { isHashedId } from './jobId.js';

export interface LedgerEntry {
    id: string;
    /** Canonical URL; empty when the stored row had none. */
    url: string;
}

export class DedupeLedger {
    private readonly ids = new Set<string>();
    private readonly urls = new Set<string>();

    static fromEntries(entries: Iterable<LedgerEntry>): DedupeLedger {
        const ledger = new DedupeLedger();
        for (const entry of entries) ledger.add(entry);
        return ledger;
    }

    get size(): number {
        return this.ids.size;
    }

    has(id: string): boolean {
        return this.ids.has(id);
    }

    isKnown(entry: LedgerEntry): boolean {
        if (this.ids.has(entry.id)) return true;
        return isHashedId(entry.id) && entry.url !== '' && this.urls.has(entry.url);
    }

    /**
     * Records the entry. Returns false, and changes nothing, when it was
     * already known.
     */
    accept(entry: LedgerEntry): boolean {
        if (this.isKnown(entry)) return false;
        this.add(entry);
        return true;
    }

    private add(entry: LedgerEntry): void {
        if (entry.id) this.ids.add(entry.id);
        if (entry.url && isHashedId(entry.id)) this.urls.add(entry.url);
    }
}
