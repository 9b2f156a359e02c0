/**
 * src/config/linkedin.ts
 *
 * Endpoint, selector map and request headers for the public guest job
 * search (no login required).
 *
 * ABOUT THE GUEST SEARCH ENDPOINT
 * ────────────────────────────────
 * /jobs-guest/jobs/api/seeMoreJobPostings/search returns a bare HTML
 * fragment: a flat run of <li> elements, one per result card, with no page
 * chrome around them. Each card carries BEM-style classes such as
 *   base-card__full-link        (anchor to the listing)
 *   base-search-card__title     (job title)
 *   base-search-card__subtitle  (company)
 *   job-search-card__location   (city / region)
 * The block prefix changes between A/B variants but the element suffixes do
 * not, so selectors match on the suffix only.
 *
 * PAGINATION
 * ───────────
 * ?start=N with 25 cards per page. An empty body or a page without any <li>
 * means there are no more results for the query.
 */

import type { SearchQuery, TimeWindow } from '../sources/types.js';

export const GUEST_SEARCH_URL =
    'https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search';

export const PAGE_SIZE = 25;

export const CardSelectors = {
    /** Each result card. */
    card: 'li',
    /** Anchor whose href is the listing URL. */
    link: '[class*="_full-link"]',
    title: '[class*="_title"]',
    company: '[class*="_subtitle"]',
    /** Optional — absent on some remote/ad cards. */
    location: '[class*="_location"]',
} as const;

/** f_TPR tokens: seconds since posting. */
export const TIME_WINDOW_TOKENS: Record<TimeWindow, string> = {
    hour: 'r3600',
    day: 'r86400',
    week: 'r604800',
};

/** "DD" = date descending, newest first. */
export const SORT_NEWEST_FIRST = 'DD';

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
    'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Referer': 'https://www.linkedin.com/jobs/search/',
};

/**
 * Builds the guest search URL for one page of results.
 *
 * @example
 *   buildGuestSearchUrl({ keywords: 'SRE OR DevOps', location: 'Austin, TX', timeWindow: 'hour', pageStart: 25 })
 *   → …/search?keywords=SRE+OR+DevOps&location=Austin%2C+TX&f_TPR=r3600&sortBy=DD&start=25
 */
export function buildGuestSearchUrl(query: SearchQuery): string {
    const params = new URLSearchParams({
        keywords: query.keywords,
        location: query.location,
        f_TPR: TIME_WINDOW_TOKENS[query.timeWindow],
        sortBy: SORT_NEWEST_FIRST,
        start: String(query.pageStart),
    });
    return `${GUEST_SEARCH_URL}?${params.toString()}`;
}

/** Joins a category's keyword list into the endpoint's OR syntax. */
export function joinKeywords(keywords: readonly string[]): string {
    return keywords.join(' OR ');
}
