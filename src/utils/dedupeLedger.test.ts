import { describe, it, expect } from 'vitest';
import { DedupeLedger } from './dedupeLedger.js';

describe('DedupeLedger', () => {
    it('accepts an id once', () => {
        const ledger = new DedupeLedger();
        expect(ledger.accept({ id: '1', url: 'https://x.example/jobs/view/1' })).toBe(true);
        expect(ledger.accept({ id: '1', url: 'https://x.example/jobs/view/1' })).toBe(false);
        expect(ledger.size).toBe(1);
    });

    it('keeps postings with distinct ids apart even when their URLs match', () => {
        const ledger = new DedupeLedger();
        const search = 'https://www.linkedin.com/jobs/search/';
        expect(ledger.accept({ id: '111111', url: search })).toBe(true);
        expect(ledger.isKnown({ id: '222222', url: search })).toBe(false);
        expect(ledger.accept({ id: '222222', url: search })).toBe(true);
        expect(ledger.size).toBe(2);
    });

    it('lets a URL-only row block a hashed-id posting at the same URL', () => {
        const ledger = DedupeLedger.fromEntries([{ id: 'u_0123456789abcdef', url: 'https://x.example/p' }]);
        expect(ledger.isKnown({ id: 'u_fedcba9876543210', url: 'https://x.example/p' })).toBe(true);
        expect(ledger.accept({ id: 'u_fedcba9876543210', url: 'https://x.example/p' })).toBe(false);
    });

    it('does not let a URL-only row block a posting with a listing id', () => {
        const ledger = DedupeLedger.fromEntries([{ id: 'u_0123456789abcdef', url: 'https://x.example/p' }]);
        expect(ledger.isKnown({ id: '99', url: 'https://x.example/p' })).toBe(false);
    });

    it('does not match on empty URLs', () => {
        const ledger = DedupeLedger.fromEntries([{ id: '1', url: '' }]);
        expect(ledger.isKnown({ id: '2', url: '' })).toBe(false);
    });

    it('seeds from entries', () => {
        const ledger = DedupeLedger.fromEntries([
            { id: '1', url: '' },
            { id: '2', url: '' },
            { id: '1', url: '' },
        ]);
        expect(ledger.size).toBe(2);
        expect(ledger.has('2')).toBe(true);
    });
});
