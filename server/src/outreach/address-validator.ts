import type { Candidate } from './types.js';

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
// Dot-separated atoms on both sides: no leading, trailing or doubled dots.
const WHOLE_EMAIL_PATTERN = /^[a-z0-9_%+-]+(?:\.[a-z0-9_%+-]+)*@(?:[a-z0-9-]+\.)+[a-z]{2,}$/;
const MAILTO_PATTERN = /href\s*=\s*["']mailto:([^"'?#\s]+)/gi;

export const MIN_ADDRESS_LENGTH = 6;
export const MAX_ADDRESS_LENGTH = 100;

// Placeholder mailboxes and markup false positives ("logo@2x.png").
const DENYLIST: readonly RegExp[] = [
  /@example\.(com|org|net)$/,
  /noreply|no-reply|donotreply/,
  /^admin@/,
  /^webmaster@/,
  /^postmaster@/,
  /mailer-daemon/,
  /\.(png|jpe?g|gif|svg|webp|pdf)$/,
];

/**
 * Validates one whole string as a candidate address. The input is compared
 * case-insensitively; callers store the lowercased form.
 */
export function isValidAddress(value: unknown): value is Candidate {
  if (typeof value !== 'string') return false;
  const address = value.trim().toLowerCase();
  if (address.length < MIN_ADDRESS_LENGTH || address.length > MAX_ADDRESS_LENGTH) return false;
  if (address.indexOf('@') !== address.lastIndexOf('@')) return false;
  if (!WHOLE_EMAIL_PATTERN.test(address)) return false;
  return !DENYLIST.some((pattern) => pattern.test(address));
}

export function normalizeAddress(value: string): Candidate {
  return value.trim().toLowerCase();
}

export function extractAddresses(text: unknown): Set<Candidate> {
  const found = new Set<Candidate>();
  if (typeof text !== 'string' || !text) return found;

  for (const match of text.matchAll(EMAIL_PATTERN)) {
    const address = normalizeAddress(match[0].replace(/^\.+/, ''));
    if (isValidAddress(address)) found.add(address);
  }
  return found;
}

function decodeMailtoTarget(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/** Addresses in `href="mailto:..."` attributes of an HTML document. */
export function extractMailtoAddresses(html: unknown): Set<Candidate> {
  const found = new Set<Candidate>();
  if (typeof html !== 'string' || !html) return found;

  for (const match of html.matchAll(MAILTO_PATTERN)) {
    const address = normalizeAddress(decodeMailtoTarget(match[1]));
    if (isValidAddress(address)) found.add(address);
  }
  return found;
}
