import { randomUUID } from 'node:crypto';
import { createRunLogger } from '../lib/logger.js';
import { aggregateCandidates, type CandidateSource, type SourceReport } from './candidate-aggregator.js';
import type { Dispatcher } from './dispatcher.js';
import { describeScope, type HistoryFilter, type HistoryScope } from './history-filter.js';
import { patternSources } from './pattern-generator.js';
import { planQueries } from './query-planner.js';
import type { SearchClient } from './search-client.js';
import type { DispatchSummary, JobProfile } from './types.js';

export interface PipelineServices {
  searchClient: SearchClient;
  historyFilter: HistoryFilter;
  dispatcher: Dispatcher;
  maxQueries: number;
  /** Replaces the built-in pattern sources; used to plug in other discovery sources. */
  sources?: (profile: JobProfile) => CandidateSource[];
}

export type PipelineOutcome =
  | { kind: 'completed'; summary: DispatchSummary; sources: SourceReport[] }
  | { kind: 'no_candidates'; sources: SourceReport[] };

export function resolveHistoryScope(profile: JobProfile): HistoryScope {
  const scope = profile.history_scope;
  switch (scope.type) {
    case 'global':
      return { type: 'global' };
    case 'job_title':
      return { type: 'job_title', jobTitle: scope.job_title ?? profile.job_title };
    case 'recent':
      return { type: 'recent', days: scope.days };
  }
}

/**
 * Discover → cap → drop already-contacted → send. Returns `no_candidates`
 * when discovery yields nothing; every other expected condition produces a
 * summary.
 */
export async function runOutreachPipeline(
  profile: JobProfile,
  services: PipelineServices,
): Promise<PipelineOutcome> {
  const log = createRunLogger(randomUUID(), { jobTitle: profile.job_title });
  log.info(
    {
      maxEmails: profile.max_emails,
      experience: [profile.experience_level, profile.experience_years].filter(Boolean).join(' '),
      skills: [...profile.required_skills, ...profile.preferred_skills],
      locations: profile.locations,
      companyTypes: profile.company_types,
      industries: profile.industries,
    },
    'Outreach run started',
  );

  const queries = planQueries(profile, { maxQueries: services.maxQueries });
  // Source order matters: the max_emails cap keeps the earliest addresses.
  const sources: CandidateSource[] = [
    {
      name: 'web-search',
      collect: async () => (await services.searchClient.search(queries, profile.job_title)).candidates,
    },
    ...(services.sources ?? patternSources)(profile),
  ];

  const aggregate = await aggregateCandidates(sources, log);
  const scraped = [...aggregate.candidates].slice(0, profile.max_emails);
  if (scraped.length === 0) {
    log.warn('No candidate addresses found');
    return { kind: 'no_candidates', sources: aggregate.sources };
  }

  const scope = resolveHistoryScope(profile);
  const filtered = await services.historyFilter.filter(scraped, scope);
  log.info(
    { scope: describeScope(scope), existing: filtered.existingCount, skipped: filtered.removed },
    'Filtered previously contacted addresses',
  );

  const base = {
    job_title: profile.job_title,
    total_emails_scraped: scraped.length,
    emails_skipped_duplicate: filtered.removed,
    new_emails_found: filtered.remaining.length,
  };

  if (filtered.remaining.length === 0) {
    return {
      kind: 'completed',
      sources: aggregate.sources,
      summary: {
        message: 'No new emails to send - all scraped emails have been contacted before',
        ...base,
        emails_sent: 0,
        emails_failed: 0,
        emails: [],
      },
    };
  }

  const dispatched = await services.dispatcher.dispatch(profile, filtered.remaining, log);
  log.info(
    { sent: dispatched.sent, failed: dispatched.failed, unrecorded: dispatched.unrecorded },
    'Outreach run complete',
  );

  return {
    kind: 'completed',
    sources: aggregate.sources,
    summary: {
      message: 'Email sending process completed with deduplication',
      ...base,
      emails_sent: dispatched.sent,
      emails_failed: dispatched.failed,
      emails: dispatched.sentAddresses,
    },
  };
}
