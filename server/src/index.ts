import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createOutreachRoutes } from './routes/outreach.js';
import { ConfigError, loadConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';
import { createServices, type AppServices } from './services.js';

export function createApp(services: AppServices) {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/', (c) => {
    return c.json({
      message: 'Recruiter outreach API',
      endpoints: {
        'POST /send-emails': 'Discover recruiter addresses for a job profile and send outreach',
        'GET /logs': 'All contact attempts, newest first',
        'GET /existing-emails': 'Every address contacted before',
        'GET /existing-emails/:jobTitle': 'Addresses contacted for one job title',
        'GET /recent-emails/:days': 'Addresses contacted in the last N days (1-365)',
        'GET /health': 'Liveness check',
      },
    });
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.route('/', createOutreachRoutes(services));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    captureError(err, { path: c.req.path, method: c.req.method, requestId });
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string, services: AppServices) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  const flushTasks = Promise.allSettled([services.close(), flushSentry(2000)]).then((results) => {
    const closed = results[0];
    if (closed.status === 'rejected') {
      logger.warn({
        error: closed.reason instanceof Error ? closed.reason.message : String(closed.reason),
      }, 'Closing services failed during shutdown');
    }
  });

  server.close(() => {
    void Promise.race([
      flushTasks,
      new Promise((resolve) => setTimeout(resolve, 3_000)),
    ]).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  const config = loadConfig();
  initSentry(config.sentryDsn, config.env);
  const services = createServices(config);
  const app = createApp(services);

  logger.info({ port: config.port }, 'Recruiter outreach server starting');
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM', services));
  process.on('SIGINT', () => shutdown('SIGINT', services));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION', services);
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION', services);
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  try {
    startServer();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal(err.message);
      process.exit(1);
    }
    throw err;
  }
}
