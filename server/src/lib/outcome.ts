/**
 * Result of a single I/O call. Callers decide whether a failure is logged
 * and skipped or escalated.
 */
export type Outcome<T, E = OutcomeError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface OutcomeError {
  kind: 'rate_limited' | 'http_status' | 'network' | 'timeout' | 'parse' | 'rejected';
  message: string;
  status?: number;
}

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure(error: OutcomeError): Outcome<never> {
  return { ok: false, error };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Maps a thrown fetch/transport error to an outcome error. */
export function classifyThrown(err: unknown): OutcomeError {
  const message = errorMessage(err);
  const name = err instanceof Error ? err.name : '';
  if (name === 'TimeoutError' || name === 'AbortError' || /timed? ?out/i.test(message)) {
    return { kind: 'timeout', message };
  }
  if (err instanceof SyntaxError) {
    return { kind: 'parse', message };
  }
  return { kind: 'network', message };
}
