import { Hono } from 'hono';
import { readJsonBody } from '../lib/http-body-guard.js';
import { errorMessage } from '../lib/outcome.js';
import { captureError } from '../lib/sentry.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';
import { isValidDayWindow, MAX_RECENT_DAYS, MIN_RECENT_DAYS } from '../outreach/history-filter.js';
import { runOutreachPipeline } from '../outreach/pipeline.js';
import { jobProfileSchema } from '../outreach/types.js';
import type { AppServices } from '../services.js';

function sorted(addresses: Iterable<string>): string[] {
  return [...addresses].sort();
}

export function createOutreachRoutes(services: AppServices) {
  const outreach = new Hono();
  const { sendRateLimit, maxBodyBytes } = services.config.http;

  // ---------------------------------------------------------------------------
  // POST /send-emails — discover, de-duplicate and send for one job profile
  // ---------------------------------------------------------------------------
  outreach.post(
    '/send-emails',
    rateLimitMiddleware({ maxRequests: sendRateLimit.max, windowMs: sendRateLimit.windowMs }),
    async (c) => {
      const log = c.get('log');
      const body = await readJsonBody(c, maxBodyBytes);
      if (!body.ok) return body.response;

      const parsed = jobProfileSchema.safeParse(body.data);
      if (!parsed.success) {
        return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
      }
      const profile = parsed.data;

      try {
        log.info({ jobTitle: profile.job_title, maxEmails: profile.max_emails }, 'Processing outreach request');
        const outcome = await runOutreachPipeline(profile, services.pipeline);
        if (outcome.kind === 'no_candidates') {
          return c.json({ error: 'No recruiter emails found for this job criteria' }, 404);
        }
        return c.json(outcome.summary);
      } catch (err) {
        const message = errorMessage(err);
        captureError(err, { route: 'send-emails', jobTitle: profile.job_title, requestId: c.get('requestId') });
        log.error({ err, jobTitle: profile.job_title }, 'Outreach request failed');
        return c.json({ error: `Internal server error: ${message}` }, 500);
      }
    },
  );

  // ---------------------------------------------------------------------------
  // GET /logs — every contact attempt, newest first
  // ---------------------------------------------------------------------------
  outreach.get('/logs', async (c) => {
    try {
      return c.json(await services.store.listAll());
    } catch (err) {
      c.get('log').error({ err }, 'Failed to fetch email logs');
      return c.json({ error: `Internal server error: ${errorMessage(err)}` }, 500);
    }
  });

  // ---------------------------------------------------------------------------
  // GET /existing-emails[/:jobTitle] — addresses contacted before
  // ---------------------------------------------------------------------------
  outreach.get('/existing-emails', async (c) => {
    try {
      const existing = await services.historyFilter.contacted({ type: 'global' });
      return c.json({
        message: 'Retrieved existing email addresses',
        total_existing_emails: existing.size,
        existing_emails: sorted(existing),
      });
    } catch (err) {
      c.get('log').error({ err }, 'Failed to fetch existing emails');
      return c.json({ error: `Internal server error: ${errorMessage(err)}` }, 500);
    }
  });

  outreach.get('/existing-emails/:jobTitle', async (c) => {
    const jobTitle = c.req.param('jobTitle');
    try {
      const existing = await services.historyFilter.contacted({ type: 'job_title', jobTitle });
      return c.json({
        message: `Retrieved existing emails for job: ${jobTitle}`,
        job_title: jobTitle,
        total_existing_emails: existing.size,
        existing_emails: sorted(existing),
      });
    } catch (err) {
      c.get('log').error({ err, jobTitle }, 'Failed to fetch existing emails for job');
      return c.json({ error: `Internal server error: ${errorMessage(err)}` }, 500);
    }
  });

  // ---------------------------------------------------------------------------
  // GET /recent-emails/:days — addresses contacted in the last N days (1–365)
  // ---------------------------------------------------------------------------
  outreach.get('/recent-emails/:days', async (c) => {
    const raw = c.req.param('days');
    const days = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
    if (!isValidDayWindow(days)) {
      return c.json({ error: `Days must be between ${MIN_RECENT_DAYS} and ${MAX_RECENT_DAYS}` }, 400);
    }

    try {
      const recent = await services.historyFilter.contacted({ type: 'recent', days });
      return c.json({
        message: `Retrieved emails contacted in the last ${days} days`,
        days,
        total_recent_emails: recent.size,
        recent_emails: sorted(recent),
      });
    } catch (err) {
      c.get('log').error({ err, days }, 'Failed to fetch recent emails');
      return c.json({ error: `Internal server error: ${errorMessage(err)}` }, 500);
    }
  });

  return outreach;
}
