import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Candidate, ContactHistoryRecord, ContactStatus } from './types.js';

export interface NewContactRecord {
  job_title: string;
  recipient_email: string;
  status: ContactStatus;
}

export interface RecipientFilter {
  jobTitle?: string;
  since?: Date;
}

/**
 * Append-only contact history. The core only inserts, reads distinct
 * recipients, and lists everything newest first.
 */
export interface ContactHistoryStore {
  insert(record: NewContactRecord): Promise<void>;
  distinctRecipients(filter?: RecipientFilter): Promise<Set<Candidate>>;
  listAll(): Promise<ContactHistoryRecord[]>;
}

export class HistoryStoreError extends Error {
  constructor(operation: string, message: string, readonly code?: string) {
    super(`Contact history ${operation} failed: ${message}`);
    this.name = 'HistoryStoreError';
  }
}

const recipientRowSchema = z.object({ recipient_email: z.string() });

const recordRowSchema = z.object({
  id: z.number(),
  job_title: z.string(),
  recipient_email: z.string(),
  sent_at: z.string(),
  status: z.enum(['sent', 'failed']),
});

// PostgREST caps a response at 1000 rows by default.
const PAGE_SIZE = 1000;

export class SupabaseContactHistoryStore implements ContactHistoryStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table = 'email_logs',
  ) {}

  async insert(record: NewContactRecord): Promise<void> {
    const { error } = await this.client.from(this.table).insert(record);
    if (error) throw new HistoryStoreError('insert', error.message, error.code);
  }

  async distinctRecipients(filter: RecipientFilter = {}): Promise<Set<Candidate>> {
    const recipients = new Set<Candidate>();
    for (let from = 0; ; from += PAGE_SIZE) {
      let query = this.client.from(this.table).select('recipient_email');
      if (filter.jobTitle !== undefined) query = query.eq('job_title', filter.jobTitle);
      if (filter.since) query = query.gte('sent_at', filter.since.toISOString());

      const { data, error } = await query.order('id', { ascending: true }).range(from, from + PAGE_SIZE - 1);
      if (error) throw new HistoryStoreError('read', error.message, error.code);

      const rows = z.array(recipientRowSchema).parse(data ?? []);
      for (const row of rows) recipients.add(row.recipient_email.toLowerCase());
      if (rows.length < PAGE_SIZE) break;
    }
    return recipients;
  }

  async listAll(): Promise<ContactHistoryRecord[]> {
    const records: ContactHistoryRecord[] = [];
    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(this.table)
        .select('id, job_title, recipient_email, sent_at, status')
        .order('sent_at', { ascending: false })
        .order('id', { ascending: false })
        .range(from, from + PAGE_SIZE - 1);
      if (error) throw new HistoryStoreError('list', error.message, error.code);

      const rows = z.array(recordRowSchema).parse(data ?? []);
      records.push(...rows);
      if (rows.length < PAGE_SIZE) break;
    }
    return records;
  }
}
