import { describe, it, expect } from 'vitest';
import {
  buildDeepSearchQueries,
  buildTargetedQueries,
  companySlug,
  planQueries,
  shuffle,
} from '../outreach/query-planner.js';
import { makeProfile } from './helpers/fakes.js';

function facetCount(queries: { facet: string }[], facet: string): number {
  return queries.filter((q) => q.facet === facet).length;
}

describe('planQueries', () => {
  it('plans base and agency queries for a title-only profile', () => {
    const queries = planQueries(makeProfile({ job_title: 'Data Engineer' }));

    expect(queries).toHaveLength(20);
    expect(facetCount(queries, 'base')).toBe(12);
    expect(facetCount(queries, 'agency')).toBe(8);
    expect(queries.map((q) => q.text)).toContain('"Data Engineer" recruiter email contact');
    expect(queries.map((q) => q.text)).toContain('"Robert Half" "Data Engineer" recruiter email');
  });

  it('truncates to the query budget', () => {
    expect(planQueries(makeProfile(), { maxQueries: 5 })).toHaveLength(5);
  });

  it('caps how many values of each facet are expanded', () => {
    const locations = Array.from({ length: 10 }, (_, i) => `City ${i}`);
    const queries = planQueries(makeProfile({ locations }), { maxQueries: 1000 });

    expect(facetCount(queries, 'location')).toBe(24);
    expect(queries.some((q) => q.text.includes('City 8'))).toBe(false);
    expect(queries).toHaveLength(12 + 24 + 8);
  });

  it('adds site: queries only when the company yields a slug', () => {
    const withSlug = planQueries(makeProfile({ target_companies: ['Acme Corp'] }), { maxQueries: 1000 });
    expect(facetCount(withSlug, 'company')).toBe(5);
    expect(withSlug.map((q) => q.text)).toContain('site:acmecorp.com careers email');

    const withoutSlug = planQueries(makeProfile({ target_companies: ['!!!'] }), { maxQueries: 1000 });
    expect(facetCount(withoutSlug, 'company')).toBe(3);
  });

  it('covers every target company under the default budget', () => {
    const companies = ['Acme', 'Globex', 'Initech'];
    const queries = planQueries(makeProfile({ target_companies: companies, locations: ['Austin'], industries: ['Fintech'] }));

    expect(queries.length).toBeLessThanOrEqual(80);
    for (const company of companies) {
      expect(queries.some((q) => q.text.includes(company))).toBe(true);
    }
  });

  it('removes case-insensitive duplicates', () => {
    const queries = planQueries(makeProfile({ industries: ['Fintech', 'fintech'] }), { maxQueries: 1000 });
    expect(facetCount(queries, 'industry')).toBe(2);
  });

  it('produces the same order for the same random source', () => {
    const profile = makeProfile({ domains: ['Payments'], locations: ['Austin'] });
    const random = () => 0.42;
    expect(planQueries(profile, { random })).toEqual(planQueries(profile, { random }));
  });
});

describe('shuffle', () => {
  it('leaves the order alone when every draw picks the current slot', () => {
    expect(shuffle([1, 2, 3, 4], () => 0.999)).toEqual([1, 2, 3, 4]);
  });

  it('swaps with the first slot when every draw is zero', () => {
    expect(shuffle([1, 2, 3, 4], () => 0)).toEqual([2, 3, 4, 1]);
  });

  it('does not mutate its input', () => {
    const input = [1, 2, 3];
    shuffle(input, () => 0);
    expect(input).toEqual([1, 2, 3]);
  });
});

describe('companySlug', () => {
  it('lowercases and strips everything but letters, digits and hyphens', () => {
    expect(companySlug('Big-Co Labs, Inc.')).toBe('big-colabsinc');
  });
});

describe('buildDeepSearchQueries', () => {
  it('builds two site-restricted queries per domain', () => {
    expect(buildDeepSearchQueries(['acme.io'], 'SRE')).toEqual([
      { text: 'site:acme.io email contact', facet: 'deep-search' },
      { text: 'site:acme.io careers "SRE"', facet: 'deep-search' },
    ]);
  });

  it('skips repeated domains', () => {
    expect(buildDeepSearchQueries(['acme.io', 'ACME.io'], 'SRE')).toHaveLength(2);
  });
});

describe('buildTargetedQueries', () => {
  it('pairs each hiring phrase with the job title', () => {
    const queries = buildTargetedQueries('SRE');
    expect(queries).toHaveLength(6);
    expect(queries[0]).toEqual({ text: '"we are hiring" "SRE" email', facet: 'targeted' });
  });
});
