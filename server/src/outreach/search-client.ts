import { z } from 'zod';
import { parse as parseHtml } from 'node-html-parser';
import type { SearchSettings } from '../lib/config.js';
import defaultLogger, { type Logger } from '../lib/logger.js';
import { classifyThrown, errorMessage, failure, success, type Outcome } from '../lib/outcome.js';
import { jitter, sleep as realSleep, type RandomSource, type Sleep } from '../lib/timing.js';
import { extractAddresses, extractMailtoAddresses } from './address-validator.js';
import { buildDeepSearchQueries, buildTargetedQueries } from './query-planner.js';
import type { Candidate, SearchQuery } from './types.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

const searchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        snippet: z.string().optional(),
        link: z.string().optional(),
      }),
    )
    .optional(),
});

export type SearchItem = NonNullable<z.infer<typeof searchResponseSchema>['items']>[number];

/** Result pages are read up to this many bytes; the rest is discarded. */
export const MAX_PAGE_BYTES = 1_000_000;

const PROMISING_LINK_KEYWORDS = ['career', 'job', 'contact', 'about', 'team'];

const SOCIAL_HOSTS = [
  'linkedin.com',
  'facebook.com',
  'twitter.com',
  'x.com',
  'instagram.com',
  'youtube.com',
  'tiktok.com',
];

// Mailbox providers say nothing about the employer, so they never seed a deep search.
const FREE_MAIL_DOMAINS = new Set([
  'gmail.com',
  'yahoo.com',
  'outlook.com',
  'hotmail.com',
  'icloud.com',
  'aol.com',
  'proton.me',
  'protonmail.com',
]);

export interface SearchStats {
  queriesRun: number;
  queriesFailed: number;
  queriesRateLimited: number;
  pagesFetched: number;
  linksFollowed: number;
}

export interface SearchResult {
  candidates: Set<Candidate>;
  stats: SearchStats;
}

type QueryStatus = 'ok' | 'rate_limited' | 'failed';

interface QueryResult {
  candidates: Set<Candidate>;
  status: QueryStatus;
  pages: number;
  linksFollowed: number;
}

export interface SearchClientOptions {
  settings: SearchSettings;
  fetch?: FetchLike;
  sleep?: Sleep;
  random?: RandomSource;
  logger?: Logger;
  maxPageBytes?: number;
}

function emptyStats(): SearchStats {
  return { queriesRun: 0, queriesFailed: 0, queriesRateLimited: 0, pagesFetched: 0, linksFollowed: 0 };
}

function hostOf(link: string): string | null {
  try {
    return new URL(link).hostname.toLowerCase();
  } catch {
    return null;
  }
}

export function isSocialHost(host: string): boolean {
  return SOCIAL_HOSTS.some((social) => host === social || host.endsWith(`.${social}`));
}

/** A result link worth fetching for more addresses. */
export function isPromisingLink(link: string | undefined): link is string {
  if (!link) return false;
  const host = hostOf(link);
  if (!host || isSocialHost(host)) return false;
  if (!/^https?:/i.test(link)) return false;
  const lower = link.toLowerCase();
  return PROMISING_LINK_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/** Distinct employer domains from found addresses, in discovery order. */
export function deriveDomains(candidates: Iterable<Candidate>, limit: number): string[] {
  const domains: string[] = [];
  for (const address of candidates) {
    if (domains.length >= limit) break;
    const domain = address.slice(address.indexOf('@') + 1);
    if (!domain || FREE_MAIL_DOMAINS.has(domain) || domains.includes(domain)) continue;
    domains.push(domain);
  }
  return domains;
}

async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel().catch(() => undefined);
}

/** Decodes at most `maxBytes` of the body and cancels the remainder. */
export async function readTextCapped(response: Response, maxBytes: number): Promise<string> {
  const stream = response.body;
  if (!stream) return '';
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let text = '';
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const room = maxBytes - total;
    if (value.byteLength >= room) {
      text += decoder.decode(value.subarray(0, room));
      await reader.cancel().catch(() => undefined);
      return text;
    }
    total += value.byteLength;
    text += decoder.decode(value, { stream: true });
  }
  return text + decoder.decode();
}

function addAll(target: Set<Candidate>, source: Iterable<Candidate>): void {
  for (const address of source) target.add(address);
}

/**
 * Client for a Custom Search style API (key + engine id, `start`/`num`
 * paging). Queries run in fixed-size concurrent batches; batches and the
 * pages of one query run sequentially. A failing query, page or link
 * contributes nothing and never fails the run.
 */
export class SearchClient {
  private readonly settings: SearchSettings;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly random: RandomSource;
  private readonly log: Logger;
  private readonly maxPageBytes: number;

  constructor(options: SearchClientOptions) {
    this.settings = options.settings;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.log = options.logger ?? defaultLogger;
    this.maxPageBytes = options.maxPageBytes ?? MAX_PAGE_BYTES;
  }

  get enabled(): boolean {
    return Boolean(this.settings.apiKey && this.settings.engineId);
  }

  async search(queries: readonly SearchQuery[], jobTitle: string): Promise<SearchResult> {
    const stats = emptyStats();
    const found = new Set<Candidate>();

    if (!this.enabled) {
      this.log.info('Search API credentials not configured, skipping web search');
      return { candidates: found, stats };
    }

    let batches = await this.runBatches(queries, found, stats, 0);
    this.log.info({ found: found.size, ...stats }, 'Primary search round complete');

    const domains = deriveDomains(found, this.settings.deepSearchDomains);
    if (domains.length > 0) {
      const before = found.size;
      batches += await this.runBatches(buildDeepSearchQueries(domains, jobTitle), found, stats, batches);
      this.log.info({ domains, added: found.size - before }, 'Deep search round complete');
    }

    if (found.size < this.settings.targetFloor) {
      const before = found.size;
      await this.runBatches(buildTargetedQueries(jobTitle), found, stats, batches);
      this.log.info({ added: found.size - before }, 'Targeted keyword round complete');
    }

    return { candidates: found, stats };
  }

  /**
   * Runs `queries` in batches and returns how many batches ran. Every batch
   * after the first of the whole search waits a randomized delay first.
   */
  private async runBatches(
    queries: readonly SearchQuery[],
    found: Set<Candidate>,
    stats: SearchStats,
    earlierBatches: number,
  ): Promise<number> {
    const { batchSize, batchDelayMs } = this.settings;
    let batches = 0;

    for (let start = 0; start < queries.length; start += batchSize) {
      if (earlierBatches + batches > 0) {
        await this.sleep(jitter(batchDelayMs.min, batchDelayMs.max, this.random));
      }
      const batch = queries.slice(start, start + batchSize);
      const settled = await Promise.allSettled(batch.map((query) => this.runQuery(query)));

      settled.forEach((outcome, i) => {
        stats.queriesRun += 1;
        if (outcome.status === 'rejected') {
          stats.queriesFailed += 1;
          this.log.error({ query: batch[i].text, error: errorMessage(outcome.reason) }, 'Search query crashed');
          return;
        }
        const result = outcome.value;
        stats.pagesFetched += result.pages;
        stats.linksFollowed += result.linksFollowed;
        if (result.status === 'failed') stats.queriesFailed += 1;
        if (result.status === 'rate_limited') stats.queriesRateLimited += 1;
        addAll(found, result.candidates);
      });
      batches += 1;
    }
    return batches;
  }

  /** Paginates one query; a 429 ends pagination after a randomized backoff. */
  async runQuery(query: SearchQuery): Promise<QueryResult> {
    const { pagesPerQuery, pageSize, pageDelayMs, backoffMs, maxLinkFollowsPerQuery } = this.settings;
    const result: QueryResult = { candidates: new Set(), status: 'ok', pages: 0, linksFollowed: 0 };

    for (let page = 0; page < pagesPerQuery; page++) {
      if (page > 0) await this.sleep(pageDelayMs);

      const outcome = await this.fetchPage(query.text, 1 + page * pageSize);
      if (!outcome.ok) {
        if (outcome.error.kind === 'rate_limited') {
          const wait = jitter(backoffMs.min, backoffMs.max, this.random);
          this.log.warn({ query: query.text, page, backoffMs: wait }, 'Search API rate limited, abandoning query');
          await this.sleep(wait);
          result.status = 'rate_limited';
        } else {
          this.log.warn({ query: query.text, page, error: outcome.error }, 'Search page failed');
          result.status = 'failed';
        }
        return result;
      }

      result.pages += 1;
      const items = outcome.value;
      for (const item of items) {
        addAll(result.candidates, extractAddresses(`${item.title ?? ''} ${item.snippet ?? ''} ${item.link ?? ''}`));

        if (result.linksFollowed < maxLinkFollowsPerQuery && isPromisingLink(item.link)) {
          result.linksFollowed += 1;
          const scraped = await this.scrapePage(item.link);
          if (scraped.ok) {
            addAll(result.candidates, scraped.value);
          } else {
            this.log.debug({ link: item.link, error: scraped.error }, 'Skipped result page');
          }
        }
      }

      if (items.length < pageSize) break;
    }

    return result;
  }

  async fetchPage(q: string, start: number): Promise<Outcome<SearchItem[]>> {
    const url = new URL(this.settings.apiUrl);
    url.searchParams.set('key', this.settings.apiKey ?? '');
    url.searchParams.set('cx', this.settings.engineId ?? '');
    url.searchParams.set('q', q);
    url.searchParams.set('start', String(start));
    url.searchParams.set('num', String(this.settings.pageSize));

    try {
      const response = await this.fetchImpl(url.toString(), {
        signal: AbortSignal.timeout(this.settings.requestTimeoutMs),
      });
      if (response.status !== 200) await discardBody(response);
      if (response.status === 429) {
        return failure({ kind: 'rate_limited', message: 'Too many requests', status: 429 });
      }
      if (response.status !== 200) {
        return failure({ kind: 'http_status', message: `Search API returned ${response.status}`, status: response.status });
      }
      const parsed = searchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        return failure({ kind: 'parse', message: parsed.error.issues[0]?.message ?? 'Unexpected response shape' });
      }
      return success(parsed.data.items ?? []);
    } catch (err) {
      return failure(classifyThrown(err));
    }
  }

  /** Fetches an HTML page and harvests addresses from its text and mailto links. */
  async scrapePage(link: string): Promise<Outcome<Set<Candidate>>> {
    try {
      const response = await this.fetchImpl(link, {
        signal: AbortSignal.timeout(this.settings.requestTimeoutMs),
        headers: { Accept: 'text/html,application/xhtml+xml' },
      });
      if (!response.ok) {
        await discardBody(response);
        return failure({ kind: 'http_status', message: `Page returned ${response.status}`, status: response.status });
      }
      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.toLowerCase().includes('html')) {
        await discardBody(response);
        return success(new Set<Candidate>());
      }

      const html = await readTextCapped(response, this.maxPageBytes);
      const addresses = extractAddresses(parseHtml(html).text);
      addAll(addresses, extractMailtoAddresses(html));
      return success(addresses);
    } catch (err) {
      return failure(classifyThrown(err));
    }
  }
}
