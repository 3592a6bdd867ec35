import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const intWithDefault = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: intWithDefault(8000, 1),

  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  EMAIL_LOGS_TABLE: z.string().min(1).default('email_logs'),

  GOOGLE_API_KEY: optionalString,
  GOOGLE_SEARCH_ENGINE_ID: optionalString,
  SEARCH_API_URL: z.string().url().default('https://www.googleapis.com/customsearch/v1'),
  SEARCH_MAX_QUERIES: intWithDefault(80, 1),
  SEARCH_BATCH_SIZE: intWithDefault(8, 1),
  SEARCH_PAGES_PER_QUERY: intWithDefault(3, 1),
  SEARCH_PAGE_SIZE: intWithDefault(10, 1),
  SEARCH_PAGE_DELAY_MS: intWithDefault(300),
  SEARCH_BATCH_DELAY_MIN_MS: intWithDefault(1000),
  SEARCH_BATCH_DELAY_MAX_MS: intWithDefault(2000),
  SEARCH_BACKOFF_MIN_MS: intWithDefault(3000),
  SEARCH_BACKOFF_MAX_MS: intWithDefault(6000),
  SEARCH_LINK_FOLLOWS_PER_QUERY: intWithDefault(2),
  SEARCH_DEEP_DOMAINS: intWithDefault(5),
  SEARCH_TARGET_FLOOR: intWithDefault(20),
  REQUEST_TIMEOUT_MS: intWithDefault(10_000, 1),

  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: intWithDefault(587, 1),
  SMTP_MAX_ATTEMPTS: intWithDefault(2, 1),
  SENDER_NAME: z.string().min(1).default('Job Seeker'),
  SENDER_EMAIL: z.string().email(),
  SENDER_PASSWORD: z.string().min(1),
  RESUME_URL: optionalString,
  GITHUB_URL: optionalString,
  LINKEDIN_URL: optionalString,

  DISPATCH_DELAY_MS: intWithDefault(1000),
  SEND_RATE_LIMIT_MAX: intWithDefault(5, 1),
  SEND_RATE_LIMIT_WINDOW_MS: intWithDefault(60_000, 1),
  MAX_REQUEST_BODY_BYTES: intWithDefault(64_000, 1),

  SENTRY_DSN: optionalString,
});

export interface SearchSettings {
  apiUrl: string;
  apiKey?: string;
  engineId?: string;
  maxQueries: number;
  batchSize: number;
  pagesPerQuery: number;
  pageSize: number;
  pageDelayMs: number;
  batchDelayMs: { min: number; max: number };
  backoffMs: { min: number; max: number };
  maxLinkFollowsPerQuery: number;
  deepSearchDomains: number;
  targetFloor: number;
  requestTimeoutMs: number;
}

export interface SenderProfile {
  name: string;
  email: string;
  resumeUrl?: string;
  githubUrl?: string;
  linkedinUrl?: string;
}

export interface AppConfig {
  env: string;
  port: number;
  supabase: { url: string; serviceRoleKey: string; table: string };
  search: SearchSettings;
  smtp: { host: string; port: number; user: string; password: string; maxAttempts: number };
  sender: SenderProfile;
  dispatch: { delayMs: number };
  http: { sendRateLimit: { max: number; windowMs: number }; maxBodyBytes: number };
  sentryDsn?: string;
}

/**
 * Builds the immutable application config from environment variables.
 * Throws ConfigError listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  return Object.freeze({
    env: e.NODE_ENV,
    port: e.PORT,
    supabase: {
      url: e.SUPABASE_URL,
      serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
      table: e.EMAIL_LOGS_TABLE,
    },
    search: {
      apiUrl: e.SEARCH_API_URL,
      apiKey: e.GOOGLE_API_KEY,
      engineId: e.GOOGLE_SEARCH_ENGINE_ID,
      maxQueries: e.SEARCH_MAX_QUERIES,
      batchSize: e.SEARCH_BATCH_SIZE,
      pagesPerQuery: e.SEARCH_PAGES_PER_QUERY,
      pageSize: e.SEARCH_PAGE_SIZE,
      pageDelayMs: e.SEARCH_PAGE_DELAY_MS,
      batchDelayMs: { min: e.SEARCH_BATCH_DELAY_MIN_MS, max: e.SEARCH_BATCH_DELAY_MAX_MS },
      backoffMs: { min: e.SEARCH_BACKOFF_MIN_MS, max: e.SEARCH_BACKOFF_MAX_MS },
      maxLinkFollowsPerQuery: e.SEARCH_LINK_FOLLOWS_PER_QUERY,
      deepSearchDomains: e.SEARCH_DEEP_DOMAINS,
      targetFloor: e.SEARCH_TARGET_FLOOR,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    smtp: {
      host: e.SMTP_HOST,
      port: e.SMTP_PORT,
      user: e.SENDER_EMAIL,
      password: e.SENDER_PASSWORD,
      maxAttempts: e.SMTP_MAX_ATTEMPTS,
    },
    sender: {
      name: e.SENDER_NAME,
      email: e.SENDER_EMAIL,
      resumeUrl: e.RESUME_URL,
      githubUrl: e.GITHUB_URL,
      linkedinUrl: e.LINKEDIN_URL,
    },
    dispatch: { delayMs: e.DISPATCH_DELAY_MS },
    http: {
      sendRateLimit: { max: e.SEND_RATE_LIMIT_MAX, windowMs: e.SEND_RATE_LIMIT_WINDOW_MS },
      maxBodyBytes: e.MAX_REQUEST_BODY_BYTES,
    },
    sentryDsn: e.SENTRY_DSN,
  });
}
