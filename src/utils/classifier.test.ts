import { describe, it, expect } from 'vitest';
import { countryOf, matchesKeywords, passesCountryPolicy } from './classifier.js';

describe('matchesKeywords', () => {
    it('is case-insensitive substring containment', () => {
        expect(matchesKeywords('Senior SRE II', ['sre'])).toBe(true);
        expect(matchesKeywords('Oracle Developer', ['Data Analyst'])).toBe(false);
    });

    it('matches inside longer words', () => {
        expect(matchesKeywords('Presales Consultant', ['sales'])).toBe(true);
    });

    it('never matches an empty keyword list', () => {
        expect(matchesKeywords('DevOps Engineer', [])).toBe(false);
    });
});

describe('countryOf', () => {
    it('recognises US locations', () => {
        expect(countryOf('Austin, TX, USA')).toBe('United States');
        expect(countryOf('New York, United States')).toBe('United States');
    });

    it('classifies everything else as Other', () => {
        expect(countryOf('Remote - Canada')).toBe('Other');
        expect(countryOf('Unknown')).toBe('Other');
    });
});

describe('passesCountryPolicy', () => {
    it('only lets the expected country through when enforced', () => {
        const policy = { enforce: true, expected: 'United States' as const };
        expect(passesCountryPolicy('United States', policy)).toBe(true);
        expect(passesCountryPolicy('Other', policy)).toBe(false);
    });

    it('lets everything through when not enforced', () => {
        expect(passesCountryPolicy('Other', { enforce: false, expected: 'United States' })).toBe(true);
    });
});
