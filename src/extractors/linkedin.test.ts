import { describe, it, expect } from 'vitest';
import { parseCardFragments, parsePostingCards, parseResultPage, toCandidate } from './linkedin.js';

function card(opts: { href?: string; title?: string; company?: string; location?: string }): string {
    return [
        '<li><div class="base-card">',
        opts.href !== undefined ? `<a class="base-card__full-link" href="${opts.href}"><span>view</span></a>` : '',
        opts.title !== undefined ? `<h3 class="base-search-card__title">${opts.title}</h3>` : '',
        opts.company !== undefined ? `<h4 class="base-search-card__subtitle"><a>${opts.company}</a></h4>` : '',
        opts.location !== undefined ? `<span class="job-search-card__location">${opts.location}</span>` : '',
        '</div></li>',
    ].join('');
}

describe('parseCardFragments', () => {
    it('reads every field and collapses whitespace', () => {
        const html = card({
            href: 'https://www.linkedin.com/jobs/view/devops-engineer-at-acme-111?refId=a',
            title: '\n   DevOps    Engineer  ',
            company: ' Acme Corp ',
            location: 'Austin, TX, USA',
        });
        expect(parseCardFragments(html)).toEqual([
            {
                link: 'https://www.linkedin.com/jobs/view/devops-engineer-at-acme-111?refId=a',
                title: 'DevOps Engineer',
                company: 'Acme Corp',
                location: 'Austin, TX, USA',
            },
        ]);
    });

    it('uses null for missing fields', () => {
        expect(parseCardFragments(card({ title: 'Only a title' }))).toEqual([
            { link: null, title: 'Only a title', company: null, location: null },
        ]);
    });

    it('returns nothing for markup without list items', () => {
        expect(parseCardFragments('<div>No more jobs</div>')).toEqual([]);
        expect(parseCardFragments('')).toEqual([]);
    });
});

describe('toCandidate', () => {
    it('rejects fragments missing link, title or company', () => {
        const base = { link: 'https://x.example/jobs/view/1', title: 'SRE', company: 'Acme', location: null };
        expect(toCandidate({ ...base, link: null })).toBeNull();
        expect(toCandidate({ ...base, title: null })).toBeNull();
        expect(toCandidate({ ...base, company: null })).toBeNull();
    });

    it('defaults the location to Unknown', () => {
        expect(toCandidate({ link: 'https://x.example/jobs/view/1', title: 'SRE', company: 'Acme', location: null }))
            .toEqual({ url: 'https://x.example/jobs/view/1', title: 'SRE', company: 'Acme', location: 'Unknown' });
    });
});

describe('parseResultPage', () => {
    it('counts malformed cards but only returns valid ones', () => {
        const html = [
            card({ href: 'https://x.example/jobs/view/1', title: 'SRE', company: 'Acme', location: 'Denver, CO' }),
            card({ title: 'Sponsored', company: 'Ad Co' }),
            card({ href: 'https://x.example/jobs/view/2', title: 'Cloud Engineer', company: 'Globex' }),
        ].join('');

        const page = parseResultPage(html);
        expect(page.cardCount).toBe(3);
        expect(page.candidates.map((c) => c.title)).toEqual(['SRE', 'Cloud Engineer']);
        expect(page.candidates[1]?.location).toBe('Unknown');
        expect(parsePostingCards(html)).toEqual(page.candidates);
    });
});
