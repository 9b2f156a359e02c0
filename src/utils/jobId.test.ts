import { describe, it, expect } from 'vitest';
import { canonicalizeUrl, extractJobId, hashUrl, isHashedId } from './jobId.js';

describe('extractJobId', () => {
    it('reads the id from a bare /jobs/view/ path', () => {
        expect(extractJobId('https://www.linkedin.com/jobs/view/123456789/')).toBe('123456789');
    });

    it('reads the id from the tail of a slug', () => {
        const url = 'https://www.linkedin.com/jobs/view/devops-engineer-at-acme-3812345678?refId=abc&trackingId=xyz';
        expect(extractJobId(url)).toBe('3812345678');
    });

    it('ignores tracking parameters', () => {
        const a = extractJobId('https://www.linkedin.com/jobs/view/sre-at-globex-555?refId=1&position=3');
        const b = extractJobId('https://www.linkedin.com/jobs/view/sre-at-globex-555?refId=2&trackingId=zz#top');
        expect(a).toBe('555');
        expect(b).toBe(a);
    });

    it('falls back to the URN form', () => {
        expect(extractJobId('urn:li:jobPosting:777')).toBe('777');
    });

    it('falls back to a numeric id query parameter', () => {
        expect(extractJobId('https://www.linkedin.com/jobs/search/?currentJobId=42&geoId=1')).toBe('42');
    });

    it('hashes the canonical URL when no id is present', () => {
        const id = extractJobId('https://example.com/careers/posting?ref=newsletter');
        expect(isHashedId(id)).toBe(true);
        expect(id).toHaveLength(18);
        expect(id).toBe(hashUrl('https://example.com/careers/posting'));
        expect(extractJobId('https://example.com/careers/posting')).toBe(id);
    });

    it('is deterministic', () => {
        const url = 'https://example.com/a/b';
        expect(extractJobId(url)).toBe(extractJobId(url));
    });

    it('does not treat numeric ids as hashed', () => {
        expect(isHashedId('123456789')).toBe(false);
    });
});

describe('canonicalizeUrl', () => {
    it('trims and drops query and fragment', () => {
        expect(canonicalizeUrl('  https://a.example/x?y=1#z ')).toBe('https://a.example/x');
    });
});
