import { sleep as realSleep, type Sleep } from './timing.js';

// SMTP 4xx replies are temporary by definition (RFC 5321 §4.2.1).
const TRANSIENT_SMTP_CODES = new Set([421, 450, 451, 452]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNECTION',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ESOCKET',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);
const TRANSIENT_PATTERNS = ['timeout', 'timed out', 'socket hang up', 'connection closed', 'try again later'];

function readNumber(source: unknown, key: string): number | null {
  if (typeof source !== 'object' || source === null) return null;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : null;
}

function readString(source: unknown, key: string): string | null {
  if (typeof source !== 'object' || source === null) return null;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : null;
}

export function isTransientError(error: unknown): boolean {
  const responseCode = readNumber(error, 'responseCode');
  if (responseCode != null && TRANSIENT_SMTP_CODES.has(responseCode)) return true;

  const code = readString(error, 'code')?.toUpperCase();
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => message.includes(p));
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  sleep?: Sleep;
  onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Runs `fn` until it resolves, a non-transient error is thrown, or
 * `maxAttempts` is reached. Delay doubles per attempt with ±50% jitter.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3;
  const baseDelay = options.baseDelay ?? 1000;
  const wait = options.sleep ?? realSleep;

  let lastError: Error | undefined;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxAttempts || !isTransientError(err)) {
        throw lastError;
      }
      options.onRetry?.(attempt, lastError);
      await wait(baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random()));
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}
