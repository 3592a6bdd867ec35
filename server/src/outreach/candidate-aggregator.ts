import defaultLogger, { type Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/outcome.js';
import { isValidAddress, normalizeAddress } from './address-validator.js';
import type { Candidate } from './types.js';

export interface CandidateSource {
  name: string;
  collect: () => Promise<Iterable<string>>;
}

export interface SourceReport {
  name: string;
  status: 'ok' | 'failed';
  /** Valid addresses the source returned, before cross-source de-duplication. */
  found: number;
  /** Addresses this source added that no earlier source had. */
  added: number;
  error?: string;
}

export interface AggregateResult {
  candidates: Set<Candidate>;
  sources: SourceReport[];
}

/**
 * Union of every source's valid addresses, in source order. A source that
 * throws is reported as failed and contributes nothing; if all fail the
 * result is empty and the caller reports "no candidates".
 */
export async function aggregateCandidates(
  sources: readonly CandidateSource[],
  log: Logger = defaultLogger,
): Promise<AggregateResult> {
  const candidates = new Set<Candidate>();
  const reports: SourceReport[] = [];

  for (const source of sources) {
    try {
      const collected = await source.collect();
      let found = 0;
      let added = 0;
      for (const raw of collected) {
        if (!isValidAddress(raw)) continue;
        const address = normalizeAddress(raw);
        found += 1;
        if (!candidates.has(address)) {
          candidates.add(address);
          added += 1;
        }
      }
      reports.push({ name: source.name, status: 'ok', found, added });
    } catch (err) {
      const message = errorMessage(err);
      log.warn({ source: source.name, error: message }, 'Candidate source failed');
      reports.push({ name: source.name, status: 'failed', found: 0, added: 0, error: message });
    }
  }

  log.info({ total: candidates.size, sources: reports }, 'Candidates aggregated');
  return { candidates, sources: reports };
}
