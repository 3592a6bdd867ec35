import type { ContactHistoryStore, RecipientFilter } from './history-store.js';
import type { Candidate } from './types.js';

export const MIN_RECENT_DAYS = 1;
export const MAX_RECENT_DAYS = 365;
const DAY_MS = 24 * 60 * 60 * 1000;

export type HistoryScope =
  | { type: 'global' }
  | { type: 'job_title'; jobTitle: string }
  | { type: 'recent'; days: number };

export interface FilterResult {
  remaining: Candidate[];
  removed: number;
  /** Size of the history set the candidates were compared against. */
  existingCount: number;
}

export function isValidDayWindow(days: number): boolean {
  return Number.isInteger(days) && days >= MIN_RECENT_DAYS && days <= MAX_RECENT_DAYS;
}

export function describeScope(scope: HistoryScope): string {
  switch (scope.type) {
    case 'global':
      return 'all time';
    case 'job_title':
      return `job title "${scope.jobTitle}"`;
    case 'recent':
      return `last ${scope.days} days`;
  }
}

/** Candidates minus a set of known addresses, preserving candidate order. */
export function subtractHistory(candidates: Iterable<Candidate>, history: ReadonlySet<Candidate>): FilterResult {
  const remaining: Candidate[] = [];
  let removed = 0;
  for (const address of new Set(candidates)) {
    if (history.has(address)) removed += 1;
    else remaining.push(address);
  }
  return { remaining, removed, existingCount: history.size };
}

export class HistoryFilter {
  constructor(
    private readonly store: ContactHistoryStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Addresses already contacted in the given scope. Read-only. */
  async contacted(scope: HistoryScope): Promise<Set<Candidate>> {
    return this.store.distinctRecipients(this.toRecipientFilter(scope));
  }

  async filter(candidates: Iterable<Candidate>, scope: HistoryScope): Promise<FilterResult> {
    const history = await this.contacted(scope);
    return subtractHistory(candidates, history);
  }

  private toRecipientFilter(scope: HistoryScope): RecipientFilter {
    switch (scope.type) {
      case 'global':
        return {};
      case 'job_title':
        return { jobTitle: scope.jobTitle };
      case 'recent':
        if (!isValidDayWindow(scope.days)) {
          throw new RangeError(`Days must be between ${MIN_RECENT_DAYS} and ${MAX_RECENT_DAYS}`);
        }
        return { since: new Date(this.now().getTime() - scope.days * DAY_MS) };
    }
  }
}
