import { z } from 'zod';
import rawCatalogue from './data/pattern-catalogue.json' with { type: 'json' };
import type { CandidateSource } from './candidate-aggregator.js';
import type { Candidate, JobProfile } from './types.js';

const catalogueSchema = z.object({
  rolePrefixes: z.array(z.string()),
  companyTypeAliases: z.record(z.array(z.string())),
  companyTypeDomains: z.record(z.array(z.string())),
  industryDomains: z.record(z.array(z.string())),
  networkPrefixes: z.array(z.string()),
  networkDomains: z.array(z.string()),
  jobBoardAddresses: z.array(z.string()),
  careerPrefixes: z.array(z.string()),
  startupRoles: z.array(z.string()),
  startupDomains: z.array(z.string()),
  startupIndustries: z.array(z.string()),
});

export type PatternCatalogue = z.infer<typeof catalogueSchema>;

export const defaultCatalogue: PatternCatalogue = catalogueSchema.parse(rawCatalogue);

const TARGET_COMPANY_LIMIT = 10;
const LOCATION_LIMIT = 5;

/** Lowercases and strips everything that cannot appear in a mailbox or host label. */
export function slugify(value: string, separator = ''): string {
  return value
    .toLowerCase()
    .trim()
    .replace(/\s+/g, separator)
    .replace(/[^a-z0-9.-]/g, '')
    .replace(/\.{2,}/g, '.')
    .replace(/^[.-]+|[.-]+$/g, '');
}

class BoundedList {
  private readonly items: Candidate[] = [];
  private readonly seen = new Set<Candidate>();

  constructor(private readonly limit: number) {}

  get full(): boolean {
    return this.items.length >= this.limit;
  }

  push(address: string): void {
    const normalized = address.toLowerCase();
    if (this.full || this.seen.has(normalized)) return;
    this.seen.add(normalized);
    this.items.push(normalized);
  }

  toArray(): Candidate[] {
    return [...this.items];
  }
}

function domainsForProfile(profile: JobProfile, catalogue: PatternCatalogue): string[] {
  const domains: string[] = [];
  if (profile.company_types.length > 0) {
    for (const companyType of profile.company_types) {
      const wanted = companyType.toLowerCase();
      for (const [group, aliases] of Object.entries(catalogue.companyTypeAliases)) {
        if (aliases.includes(wanted)) domains.push(...(catalogue.companyTypeDomains[group] ?? []));
      }
    }
  } else {
    for (const group of Object.values(catalogue.companyTypeDomains)) domains.push(...group);
  }
  for (const industry of profile.industries) {
    domains.push(...(catalogue.industryDomains[industry.toLowerCase()] ?? []));
  }
  return [...new Set(domains)];
}

/**
 * Role mailboxes at the target companies, at catalogue domains matching the
 * profile's company types and industries, and regional aliases per location.
 */
export function generateCompanyPatterns(
  profile: JobProfile,
  catalogue: PatternCatalogue = defaultCatalogue,
): Candidate[] {
  const out = new BoundedList(profile.max_emails);
  const job = slugify(profile.job_title).replace(/-/g, '');

  const companyShare = Math.max(1, Math.floor(profile.max_emails / 2));
  let fromCompanies = 0;
  for (const company of profile.target_companies.slice(0, TARGET_COMPANY_LIMIT)) {
    const host = slugify(company);
    if (!host) continue;
    for (const prefix of catalogue.rolePrefixes.slice(0, 3)) {
      if (fromCompanies >= companyShare) break;
      out.push(`${prefix}@${host}.com`);
      fromCompanies += 1;
    }
  }

  for (const domain of domainsForProfile(profile, catalogue)) {
    for (const prefix of catalogue.rolePrefixes) {
      out.push(`${prefix}@${domain}`);
      if (job) {
        out.push(`${prefix}.${job}@${domain}`);
        out.push(`${job}.${prefix}@${domain}`);
        out.push(`${prefix}-${job}@${domain}`);
      }
      if (out.full) return out.toArray();
    }
  }

  for (const location of profile.locations.slice(0, LOCATION_LIMIT)) {
    const place = slugify(location);
    if (!place) continue;
    for (const prefix of ['recruiter', 'hr', 'jobs']) {
      out.push(`${prefix}.${place}@jobsearch.com`);
    }
  }

  return out.toArray();
}

export function generateNetworkPatterns(
  profile: JobProfile,
  catalogue: PatternCatalogue = defaultCatalogue,
): Candidate[] {
  const out = new BoundedList(15);
  for (const company of profile.target_companies.slice(0, TARGET_COMPANY_LIMIT)) {
    const host = slugify(company);
    if (!host) continue;
    for (const prefix of catalogue.networkPrefixes.slice(0, 3)) {
      out.push(`${prefix}@${host}.com`);
      out.push(`${prefix}.${host}@company.com`);
    }
  }
  for (const domain of catalogue.networkDomains) {
    for (const prefix of catalogue.networkPrefixes.slice(0, 2)) {
      out.push(`${prefix}@${domain}`);
    }
  }
  return out.toArray();
}

export function generateJobBoardPatterns(
  profile: JobProfile,
  catalogue: PatternCatalogue = defaultCatalogue,
): Candidate[] {
  const out = new BoundedList(10);
  const job = slugify(profile.job_title, '-');
  for (const address of catalogue.jobBoardAddresses) {
    out.push(address);
    if (job) out.push(`${job}.${address}`);
  }
  for (const location of profile.locations.slice(0, 3)) {
    const place = slugify(location, '-');
    if (!place) continue;
    out.push(`jobs-${place}@jobboards.com`);
    out.push(`recruiting-${place}@careers.com`);
  }
  return out.toArray();
}

export function generateCareerPagePatterns(
  profile: JobProfile,
  catalogue: PatternCatalogue = defaultCatalogue,
): Candidate[] {
  const out = new BoundedList(12);
  for (const company of profile.target_companies.slice(0, TARGET_COMPANY_LIMIT)) {
    const host = slugify(company);
    if (!host) continue;
    for (const prefix of catalogue.careerPrefixes) {
      out.push(`${prefix}@${host}.com`);
      out.push(`${prefix}@careers.${host}.com`);
    }
  }
  for (const industry of profile.industries) {
    const label = slugify(industry);
    if (!label) continue;
    for (const prefix of catalogue.careerPrefixes.slice(0, 3)) {
      out.push(`${prefix}@${label}-company.com`);
    }
  }
  return out.toArray();
}

/** Only produces addresses when the profile asks for startups. */
export function generateStartupPatterns(
  profile: JobProfile,
  catalogue: PatternCatalogue = defaultCatalogue,
): Candidate[] {
  if (!profile.company_types.some((type) => type.toLowerCase().includes('startup'))) return [];

  const out = new BoundedList(8);
  const job = slugify(profile.job_title, '-');
  for (const domain of catalogue.startupDomains) {
    for (const role of catalogue.startupRoles.slice(0, 3)) {
      out.push(`${role}@${domain}`);
      if (job) out.push(`${role}-${job}@${domain}`);
    }
  }
  for (const industry of profile.industries) {
    if (!catalogue.startupIndustries.includes(industry.toLowerCase())) continue;
    const label = slugify(industry);
    out.push(`hiring@${label}-startup.io`);
    out.push(`jobs@${label}-ventures.com`);
  }
  return out.toArray();
}

/** Pattern sources in the order the aggregator should merge them. */
export function patternSources(
  profile: JobProfile,
  catalogue: PatternCatalogue = defaultCatalogue,
): CandidateSource[] {
  return [
    { name: 'company-patterns', collect: async () => generateCompanyPatterns(profile, catalogue) },
    { name: 'professional-network', collect: async () => generateNetworkPatterns(profile, catalogue) },
    { name: 'job-boards', collect: async () => generateJobBoardPatterns(profile, catalogue) },
    { name: 'career-pages', collect: async () => generateCareerPagePatterns(profile, catalogue) },
    { name: 'startup-directories', collect: async () => generateStartupPatterns(profile, catalogue) },
  ];
}
