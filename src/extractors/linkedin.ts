/**
 * src/extractors/linkedin.ts
 *
 * Turns one page of guest-search HTML into posting candidates.
 *
 * Parsing happens in two steps so that "what the markup gave us" stays
 * separate from "what we accept":
 *   1. parseCardFragments() reads every <li> into a CardFragment where each
 *      field is either the trimmed text/href or null.
 *   2. toCandidate() rejects fragments without a link, title or company
 *      (sponsored slots, upsell cards, half-rendered items) and fills the
 *      location with "Unknown" when it is missing.
 *
 * Malformed cards never raise; they are simply not returned.
 */

import * as cheerio from 'cheerio';
import { CardSelectors } from '../config/linkedin.js';
import { UNKNOWN_LOCATION } from '../sources/types.js';
import type { PostingCandidate } from '../sources/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface CardFragment {
    link: string | null;
    title: string | null;
    company: string | null;
    location: string | null;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function cleanText(value: string | undefined): string | null {
    if (value === undefined) return null;
    const text = value.replace(/\s+/g, ' ').trim();
    return text || null;
}

// ─── Public API ───────────────────────────────────────────────────────────────

export function parseCardFragments(html: string): CardFragment[] {
    const $ = cheerio.load(html);
    const fragments: CardFragment[] = [];

    $(CardSelectors.card).each((_, el) => {
        const $card = $(el);

        const $link = $card.find(CardSelectors.link).first();
        const $title = $card.find(CardSelectors.title).first();
        const $company = $card.find(CardSelectors.company).first();
        const $location = $card.find(CardSelectors.location).first();

        fragments.push({
            link: $link.length > 0 ? cleanText($link.attr('href')) : null,
            title: $title.length > 0 ? cleanText($title.text()) : null,
            company: $company.length > 0 ? cleanText($company.text()) : null,
            location: $location.length > 0 ? cleanText($location.text()) : null,
        });
    });

    return fragments;
}

export function toCandidate(fragment: CardFragment): PostingCandidate | null {
    const { link, title, company, location } = fragment;
    if (link === null || title === null || company === null) return null;

    return {
        url: link,
        title,
        company,
        location: location ?? UNKNOWN_LOCATION,
    };
}

export interface ParsedPage {
    /** Number of <li> fragments on the page, malformed ones included. */
    cardCount: number;
    candidates: PostingCandidate[];
}

/**
 * Parses one result page. `cardCount === 0` means the endpoint ran out of
 * results; a page of nothing but malformed cards still counts as a page.
 */
export function parseResultPage(html: string): ParsedPage {
    const fragments = parseCardFragments(html);
    const candidates: PostingCandidate[] = [];
    for (const fragment of fragments) {
        const candidate = toCandidate(fragment);
        if (candidate) candidates.push(candidate);
    }
    return { cardCount: fragments.length, candidates };
}

export function parsePostingCards(html: string): PostingCandidate[] {
    return parseResultPage(html).candidates;
}
