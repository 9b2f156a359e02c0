/**
 * src/sources/types.ts
 *
 * Shared types for the search → parse → dedupe → notify pipeline.
 *
 * A PostingCandidate is what the card parser hands over; a JobPosting is the
 * immutable record built once a candidate has an identity, a country and a
 * category. Only JobPostings ever reach the notifier or the ledger store.
 */

// ─── Country ──────────────────────────────────────────────────────────────────

export const UNITED_STATES = 'United States';
export const OTHER_COUNTRY = 'Other';

export type Country = typeof UNITED_STATES | typeof OTHER_COUNTRY;

export const UNKNOWN_LOCATION = 'Unknown';

// ─── Postings ─────────────────────────────────────────────────────────────────

export interface PostingCandidate {
    /** Raw href from the card, query string still attached. */
    url: string;
    title: string;
    company: string;
    location: string;
}

export interface JobPosting {
    readonly id: string;
    /** Canonical listing URL (query and fragment stripped). */
    readonly url: string;
    readonly title: string;
    readonly company: string;
    readonly location: string;
    readonly country: Country;
    readonly category: string;
    /** ISO-8601, UTC. */
    readonly scrapedAt: string;
}

// ─── Categories ───────────────────────────────────────────────────────────────

export interface Category {
    /** Short env key, e.g. "CYBER" → EMAIL_RECEIVER_CYBER / SHEET_CYBER. */
    readonly key: string;
    readonly name: string;
    readonly keywords: readonly string[];
    readonly recipients: readonly string[];
    /** Store region (sheet tab, table partition or file) holding this category's rows. */
    readonly ledgerHandle: string;
}

// ─── Search Query ─────────────────────────────────────────────────────────────

export type TimeWindow = 'hour' | 'day' | 'week';

export interface SearchQuery {
    keywords: string;       // OR-joined terms, e.g. "SRE OR platform engineer"
    location: string;       // metro name the endpoint recognises
    timeWindow: TimeWindow;
    pageStart: number;      // result offset (pageIndex × page size)
}
