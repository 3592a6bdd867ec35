import { z } from 'zod';

// null and blank values count as absent.
const stringList = z
  .array(z.string().trim().min(1).max(200))
  .max(50)
  .nullish()
  .transform((items) => items ?? []);
const optionalText = z
  .string()
  .trim()
  .max(255)
  .nullish()
  .transform((text) => text || undefined);

export const historyScopeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('global') }),
  z.object({ type: z.literal('job_title'), job_title: z.string().trim().min(1).max(255).optional() }),
  z.object({ type: z.literal('recent'), days: z.number().int().min(1).max(365) }),
]);

export const jobProfileSchema = z.object({
  job_title: z.string().trim().min(1).max(255),
  experience_level: optionalText,
  experience_years: optionalText,
  required_skills: stringList,
  preferred_skills: stringList,
  locations: stringList,
  remote_ok: z.boolean().default(true),
  company_types: stringList,
  target_companies: stringList,
  company_size: optionalText,
  industries: stringList,
  domains: stringList,
  employment_type: optionalText,
  salary_range: optionalText,
  max_emails: z.number().int().min(1).max(1000).default(25),
  urgency: z
    .string()
    .trim()
    .max(50)
    .nullish()
    .transform((text) => text || 'normal'),
  history_scope: historyScopeSchema.default({ type: 'global' }),
});

export type JobProfile = z.infer<typeof jobProfileSchema>;
export type JobProfileInput = z.input<typeof jobProfileSchema>;
export type HistoryScopeInput = z.infer<typeof historyScopeSchema>;

export type QueryFacet =
  | 'base'
  | 'location'
  | 'company'
  | 'industry'
  | 'domain'
  | 'agency'
  | 'deep-search'
  | 'targeted';

export interface SearchQuery {
  text: string;
  facet: QueryFacet;
}

/** Lowercased, validated email address. */
export type Candidate = string;

export type ContactStatus = 'sent' | 'failed';

export interface ContactHistoryRecord {
  id: number;
  job_title: string;
  recipient_email: string;
  sent_at: string;
  status: ContactStatus;
}

export interface DispatchSummary {
  message: string;
  job_title: string;
  total_emails_scraped: number;
  emails_skipped_duplicate: number;
  new_emails_found: number;
  emails_sent: number;
  emails_failed: number;
  emails: string[];
}
