/**
 * src/utils/classifier.ts
 *
 * Keyword and country checks applied to every new card.
 *
 * Keyword matching is plain case-insensitive substring containment, not a
 * word match: "sre" also hits inside longer tokens. Some keywords appear in
 * more than one category list; the shared ledger decides which category
 * gets such a posting (whichever runs first).
 */

import { OTHER_COUNTRY, UNITED_STATES } from '../sources/types.js';
import type { Country } from '../sources/types.js';

export interface CountryPolicy {
    /** When false, every country passes. */
    enforce: boolean;
    expected: Country;
}

export function matchesKeywords(title: string, keywords: readonly string[]): boolean {
    const lowered = title.toLowerCase();
    return keywords.some((keyword) => lowered.includes(keyword.toLowerCase()));
}

export function countryOf(location: string): Country {
    const lowered = location.toLowerCase();
    if (lowered.includes('united states') || lowered.includes('usa')) return UNITED_STATES;
    return OTHER_COUNTRY;
}

export function passesCountryPolicy(country: Country, policy: CountryPolicy): boolean {
    return !policy.enforce || country === policy.expected;
}
