import type { RandomSource } from '../lib/timing.js';
import type { JobProfile, QueryFacet, SearchQuery } from './types.js';

export const DEFAULT_MAX_QUERIES = 80;

export const FACET_LIMITS = {
  locations: 8,
  companies: 10,
  industries: 6,
  domains: 6,
} as const;

const RECRUITING_AGENCIES = [
  'Robert Half',
  'Hays',
  'Randstad',
  'Adecco',
  'Michael Page',
  'Kforce',
  'TEKsystems',
  'Insight Global',
];

const TARGETED_PHRASES = [
  'we are hiring',
  'send resume',
  'send your cv',
  'join our team',
  'now hiring',
  'apply by email',
];

export interface PlanOptions {
  maxQueries?: number;
  random?: RandomSource;
}

function baseTemplates(title: string): string[] {
  return [
    `"${title}" recruiter email contact`,
    `"${title}" hiring manager email`,
    `"${title}" HR contact email`,
    `"${title}" careers contact page email`,
    `"${title}" "contact us" hiring`,
    `"${title}" talent acquisition email`,
    `site:linkedin.com "${title}" recruiter email`,
    `"${title}" technical recruiter "@" email`,
    `"${title}" job opening "email your resume"`,
    `"${title}" job posting apply via email`,
    `"${title}" startup hiring email`,
    `"${title}" agency recruiter contact`,
  ];
}

function locationTemplates(title: string, location: string): string[] {
  return [
    `"${title}" ${location} recruiter email`,
    `"${title}" jobs ${location} hiring contact`,
    `${location} tech recruiter email "${title}"`,
  ];
}

export function companySlug(company: string): string {
  return company.toLowerCase().replace(/[^a-z0-9-]/g, '');
}

function companyTemplates(title: string, company: string): string[] {
  const slug = companySlug(company);
  const templates = [
    `${company} "${title}" recruiter email`,
    `${company} careers "${title}" contact`,
    `${company} talent acquisition email`,
  ];
  if (slug) {
    templates.push(`site:${slug}.com careers email`, `site:${slug}.com "${title}"`);
  }
  return templates;
}

function industryTemplates(title: string, industry: string): string[] {
  return [
    `${industry} "${title}" recruiter email`,
    `${industry} companies hiring "${title}" contact`,
  ];
}

function domainTemplates(title: string, domain: string): string[] {
  return [
    `"${domain}" "${title}" hiring email`,
    `${domain} engineer recruiter contact email`,
  ];
}

function agencyTemplates(title: string): string[] {
  return RECRUITING_AGENCIES.map((agency) => `"${agency}" "${title}" recruiter email`);
}

/** Fisher–Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

function tag(facet: QueryFacet, texts: string[]): SearchQuery[] {
  return texts.map((text) => ({ text, facet }));
}

function dedupe(queries: SearchQuery[]): SearchQuery[] {
  const seen = new Set<string>();
  const unique: SearchQuery[] = [];
  for (const query of queries) {
    const key = query.text.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    unique.push(query);
  }
  return unique;
}

/**
 * Expands a job profile into search queries: title-only base templates,
 * per-facet templates for the first few values of each facet, and agency
 * queries. The list is shuffled before truncation, so which facets survive
 * a tight budget is random.
 */
export function planQueries(profile: JobProfile, options: PlanOptions = {}): SearchQuery[] {
  const maxQueries = options.maxQueries ?? DEFAULT_MAX_QUERIES;
  const title = profile.job_title;

  const all: SearchQuery[] = [
    ...tag('base', baseTemplates(title)),
    ...profile.locations
      .slice(0, FACET_LIMITS.locations)
      .flatMap((location) => tag('location', locationTemplates(title, location))),
    ...profile.target_companies
      .slice(0, FACET_LIMITS.companies)
      .flatMap((company) => tag('company', companyTemplates(title, company))),
    ...profile.industries
      .slice(0, FACET_LIMITS.industries)
      .flatMap((industry) => tag('industry', industryTemplates(title, industry))),
    ...profile.domains
      .slice(0, FACET_LIMITS.domains)
      .flatMap((domain) => tag('domain', domainTemplates(title, domain))),
    ...tag('agency', agencyTemplates(title)),
  ];

  return shuffle(dedupe(all), options.random).slice(0, maxQueries);
}

export function buildDeepSearchQueries(domains: readonly string[], jobTitle: string): SearchQuery[] {
  return dedupe(
    domains.flatMap((domain) =>
      tag('deep-search', [
        `site:${domain} email contact`,
        `site:${domain} careers "${jobTitle}"`,
      ]),
    ),
  );
}

export function buildTargetedQueries(jobTitle: string): SearchQuery[] {
  return tag(
    'targeted',
    TARGETED_PHRASES.map((phrase) => `"${phrase}" "${jobTitle}" email`),
  );
}
