import { describe, it, expect } from 'vitest';
import { createApp } from '../index.js';
import { loadConfig } from '../lib/config.js';
import { createServices, type ServiceOverrides } from '../services.js';
import { InMemoryHistoryStore, RecordingTransport } from './helpers/fakes.js';
import { stubSearchClient } from './helpers/services.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const testEnv = {
  NODE_ENV: 'test',
  SUPABASE_URL: 'http://supabase.test',
  SUPABASE_SERVICE_ROLE_KEY: 'test-service-key',
  SENDER_EMAIL: 'sender@test.local',
  SENDER_PASSWORD: 'test-secret',
  DISPATCH_DELAY_MS: '0',
};

function buildApp(overrides: ServiceOverrides = {}, env: Record<string, string> = {}) {
  const store = overrides.store instanceof InMemoryHistoryStore ? overrides.store : new InMemoryHistoryStore();
  const transport = new RecordingTransport();
  const services = createServices(loadConfig({ ...testEnv, ...env }), {
    store,
    transport,
    searchClient: stubSearchClient([]),
    ...overrides,
  });
  return { app: createApp(services), store, transport };
}

function postJson(app: ReturnType<typeof createApp>, body: unknown) {
  return app.request('http://test/send-emails', {
    method: 'POST',
    body: JSON.stringify(body),
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('POST /send-emails', () => {
  it('sends on the first request and skips everyone on the repeat', async () => {
    const { app, transport } = buildApp({ searchClient: stubSearchClient(['a@acme.io', 'b@beta.io']) });

    const first = await postJson(app, { job_title: 'SRE', max_emails: 2 });
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({
      message: 'Email sending process completed with deduplication',
      job_title: 'SRE',
      total_emails_scraped: 2,
      emails_skipped_duplicate: 0,
      new_emails_found: 2,
      emails_sent: 2,
      emails_failed: 0,
      emails: ['a@acme.io', 'b@beta.io'],
    });

    const second = await postJson(app, { job_title: 'SRE', max_emails: 2 });
    expect(second.status).toBe(200);
    expect(await second.json()).toEqual({
      message: 'No new emails to send - all scraped emails have been contacted before',
      job_title: 'SRE',
      total_emails_scraped: 2,
      emails_skipped_duplicate: 2,
      new_emails_found: 0,
      emails_sent: 0,
      emails_failed: 0,
      emails: [],
    });
    expect(transport.sent).toHaveLength(2);
  });

  it('returns 404 when discovery finds nothing', async () => {
    const { app } = buildApp({ sources: () => [] });

    const res = await postJson(app, { job_title: 'SRE' });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'No recruiter emails found for this job criteria' });
  });

  it('accepts null and blank optional fields', async () => {
    const { app, transport } = buildApp({ searchClient: stubSearchClient(['a@acme.io']) });

    const res = await postJson(app, {
      job_title: 'SRE',
      experience_level: null,
      salary_range: null,
      urgency: null,
      employment_type: '',
      locations: null,
      max_emails: 1,
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ emails_sent: 1, emails: ['a@acme.io'] });
    expect(transport.sent[0].text).not.toContain('My salary expectation');
    expect(transport.sent[0].text).not.toContain('I am looking for a');
  });

  it('rejects a profile without a job title', async () => {
    const { app } = buildApp();

    const res = await postJson(app, { max_emails: 5 });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Invalid request' });
  });

  it('rejects a day window outside 1 to 365 in the history scope', async () => {
    const { app } = buildApp();

    const res = await postJson(app, { job_title: 'SRE', history_scope: { type: 'recent', days: 400 } });

    expect(res.status).toBe(400);
  });

  it('returns 400 for malformed JSON and 415 for other content types', async () => {
    const { app } = buildApp();

    const malformed = await app.request('http://test/send-emails', {
      method: 'POST',
      body: '{"job_title":',
      headers: { 'Content-Type': 'application/json' },
    });
    const form = await app.request('http://test/send-emails', {
      method: 'POST',
      body: 'job_title=SRE',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });

    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: 'Invalid JSON body' });
    expect(form.status).toBe(415);
  });

  it('returns 500 with the cause when the history store is unavailable', async () => {
    const store = new InMemoryHistoryStore();
    store.failReads = true;
    const { app, transport } = buildApp({ store, searchClient: stubSearchClient(['a@acme.io']) });

    const res = await postJson(app, { job_title: 'SRE', max_emails: 1 });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error: history unavailable' });
    expect(transport.sent).toEqual([]);
  });

  it('rate limits repeated send requests', async () => {
    const { app } = buildApp({ sources: () => [] }, { SEND_RATE_LIMIT_MAX: '1' });

    const first = await postJson(app, { job_title: 'SRE' });
    const second = await postJson(app, { job_title: 'SRE' });

    expect(first.status).toBe(404);
    expect(second.status).toBe(429);
    expect(await second.json()).toEqual({ error: 'Too many requests. Please try again later.' });
  });
});

describe('history endpoints', () => {
  function seeded() {
    const store = new InMemoryHistoryStore();
    store.seed({ job_title: 'SRE', recipient_email: 'a@acme.io', status: 'sent' }, new Date(Date.now() - 2 * DAY_MS));
    store.seed(
      { job_title: 'Data Engineer', recipient_email: 'b@beta.io', status: 'failed' },
      new Date(Date.now() - 100 * DAY_MS),
    );
    return buildApp({ store });
  }

  it('lists all contact attempts newest first', async () => {
    const { app, store } = seeded();

    const res = await app.request('http://test/logs');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([store.rows[0], store.rows[1]]);
  });

  it('lists every address contacted before', async () => {
    const { app } = seeded();

    const res = await app.request('http://test/existing-emails');

    expect(await res.json()).toEqual({
      message: 'Retrieved existing email addresses',
      total_existing_emails: 2,
      existing_emails: ['a@acme.io', 'b@beta.io'],
    });
  });

  it('lists addresses contacted for one job title', async () => {
    const { app } = seeded();

    const res = await app.request('http://test/existing-emails/Data%20Engineer');

    expect(await res.json()).toEqual({
      message: 'Retrieved existing emails for job: Data Engineer',
      job_title: 'Data Engineer',
      total_existing_emails: 1,
      existing_emails: ['b@beta.io'],
    });
  });

  it('lists addresses contacted in the last N days', async () => {
    const { app } = seeded();

    const res = await app.request('http://test/recent-emails/30');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: 'Retrieved emails contacted in the last 30 days',
      days: 30,
      total_recent_emails: 1,
      recent_emails: ['a@acme.io'],
    });
  });

  it('rejects day windows outside 1 to 365', async () => {
    const { app } = seeded();

    for (const days of ['0', '366', 'abc', '1.5']) {
      const res = await app.request(`http://test/recent-emails/${days}`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Days must be between 1 and 365' });
    }
  });
});

describe('service endpoints', () => {
  it('reports health', async () => {
    const { app } = buildApp();

    const res = await app.request('http://test/health');
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toEqual({ status: 'healthy', timestamp: expect.any(String) });
  });

  it('echoes the request id and sets security headers', async () => {
    const { app } = buildApp();

    const res = await app.request('http://test/health', { headers: { 'X-Request-ID': 'req-42' } });

    expect(res.headers.get('X-Request-ID')).toBe('req-42');
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
  });

  it('returns JSON 404s for unknown routes', async () => {
    const { app } = buildApp();

    const res = await app.request('http://test/unknown');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
