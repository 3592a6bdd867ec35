import { describe, it, expect, beforeEach } from 'vitest';
import {
  describeScope,
  HistoryFilter,
  isValidDayWindow,
  subtractHistory,
} from '../outreach/history-filter.js';
import { InMemoryHistoryStore } from './helpers/fakes.js';

const NOW = new Date('2026-03-01T00:00:00.000Z');

describe('HistoryFilter', () => {
  let store: InMemoryHistoryStore;
  let filter: HistoryFilter;

  beforeEach(() => {
    store = new InMemoryHistoryStore(() => NOW);
    store.seed({ job_title: 'SRE', recipient_email: 'a@acme.io', status: 'sent' }, new Date('2026-02-27T12:00:00Z'));
    store.seed({ job_title: 'Backend Engineer', recipient_email: 'b@acme.io', status: 'sent' }, new Date('2025-12-01T12:00:00Z'));
    store.seed({ job_title: 'SRE', recipient_email: 'c@acme.io', status: 'failed' }, new Date('2026-02-28T12:00:00Z'));
    filter = new HistoryFilter(store, () => NOW);
  });

  it('reads every contacted address for the global scope', async () => {
    expect([...(await filter.contacted({ type: 'global' }))].sort()).toEqual(['a@acme.io', 'b@acme.io', 'c@acme.io']);
  });

  it('limits the job-title scope to exact title matches', async () => {
    expect([...(await filter.contacted({ type: 'job_title', jobTitle: 'SRE' }))].sort()).toEqual([
      'a@acme.io',
      'c@acme.io',
    ]);
    expect((await filter.contacted({ type: 'job_title', jobTitle: 'sre' })).size).toBe(0);
  });

  it('limits the recent scope to the trailing day window', async () => {
    expect([...(await filter.contacted({ type: 'recent', days: 7 }))].sort()).toEqual(['a@acme.io', 'c@acme.io']);
    expect((await filter.contacted({ type: 'recent', days: 365 })).size).toBe(3);
  });

  it('rejects day windows outside 1 to 365', async () => {
    await expect(filter.contacted({ type: 'recent', days: 0 })).rejects.toThrow('Days must be between 1 and 365');
    await expect(filter.contacted({ type: 'recent', days: 366 })).rejects.toThrow(RangeError);
  });

  it('counts failed attempts as contacted', async () => {
    const result = await filter.filter(['c@acme.io', 'new@beta.io'], { type: 'global' });
    expect(result).toEqual({ remaining: ['new@beta.io'], removed: 1, existingCount: 3 });
  });

  it('filters within the scope and keeps candidate order', async () => {
    const result = await filter.filter(
      ['x@beta.io', 'a@acme.io', 'x@beta.io', 'b@acme.io'],
      { type: 'job_title', jobTitle: 'SRE' },
    );
    expect(result).toEqual({ remaining: ['x@beta.io', 'b@acme.io'], removed: 1, existingCount: 2 });
  });

  it('propagates store read failures', async () => {
    store.failReads = true;
    await expect(filter.filter(['x@beta.io'], { type: 'global' })).rejects.toThrow('history unavailable');
  });
});

describe('subtractHistory', () => {
  it('returns everything when the history is empty', () => {
    expect(subtractHistory(['a@x.io', 'b@x.io'], new Set())).toEqual({
      remaining: ['a@x.io', 'b@x.io'],
      removed: 0,
      existingCount: 0,
    });
  });
});

describe('isValidDayWindow', () => {
  it('accepts whole days from 1 to 365', () => {
    expect(isValidDayWindow(1)).toBe(true);
    expect(isValidDayWindow(365)).toBe(true);
    expect(isValidDayWindow(0)).toBe(false);
    expect(isValidDayWindow(366)).toBe(false);
    expect(isValidDayWindow(1.5)).toBe(false);
  });
});

describe('describeScope', () => {
  it('describes each scope for logs', () => {
    expect(describeScope({ type: 'global' })).toBe('all time');
    expect(describeScope({ type: 'job_title', jobTitle: 'SRE' })).toBe('job title "SRE"');
    expect(describeScope({ type: 'recent', days: 30 })).toBe('last 30 days');
  });
});
