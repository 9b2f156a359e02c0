/**
 * src/utils/jobId.ts
 *
 * Stable posting identity derived from a raw result URL.
 *
 * Result cards link to the same listing through several URL shapes:
 *   - /jobs/view/3812345678/
 *   - /jobs/view/devops-engineer-at-acme-3812345678?refId=…&trackingId=…
 *   - /jobs/search/?currentJobId=3812345678
 *   - urn:li:jobPosting:3812345678
 *
 * The numeric listing id is the identity whenever one can be found. When
 * none can, the identity is a hash of the canonical URL, prefixed with
 * `u_` so it can never collide with a numeric id.
 */

import { createHash } from 'crypto';

// ─── Patterns ─────────────────────────────────────────────────────────────────

/** Numeric id after the /jobs/view/ marker — bare, or the tail of a slug. */
const VIEW_PATH_PATTERN = /\/jobs\/view\/(?:[^/?#]*-)?(\d+)(?=[/?#]|$)/;

/** URN form found in data-entity-urn attributes. */
const URN_PATTERN = /jobPosting:(\d+)/;

const ID_QUERY_PARAMS = ['currentJobId', 'jobId', 'job_id', 'jobPostingId'] as const;

const HASH_PREFIX = 'u_';
const HASH_LENGTH = 16;

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Drops the query string and fragment. Used for display and URL-level dedupe. */
export function canonicalizeUrl(rawUrl: string): string {
    return rawUrl.trim().split(/[?#]/)[0] ?? '';
}

function idFromQuery(rawUrl: string): string | null {
    const queryStart = rawUrl.indexOf('?');
    if (queryStart === -1) return null;

    const params = new URLSearchParams(rawUrl.slice(queryStart + 1).split('#')[0]);
    for (const name of ID_QUERY_PARAMS) {
        const value = params.get(name)?.trim();
        if (value && /^\d+$/.test(value)) return value;
    }
    return null;
}

export function hashUrl(canonicalUrl: string): string {
    const digest = createHash('sha256').update(canonicalUrl).digest('hex');
    return `${HASH_PREFIX}${digest.slice(0, HASH_LENGTH)}`;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Returns the listing id embedded in `rawUrl`, or a hash of its canonical
 * form. Never throws.
 */
export function extractJobId(rawUrl: string): string {
    const input = rawUrl.trim();

    const viewMatch = VIEW_PATH_PATTERN.exec(canonicalizeUrl(input));
    if (viewMatch?.[1]) return viewMatch[1];

    const urnMatch = URN_PATTERN.exec(input);
    if (urnMatch?.[1]) return urnMatch[1];

    const fromQuery = idFromQuery(input);
    if (fromQuery) return fromQuery;

    return hashUrl(canonicalizeUrl(input));
}

/** True for ids produced by the hash fallback rather than read from the URL. */
export function isHashedId(id: string): boolean {
    return id.startsWith(HASH_PREFIX);
}
