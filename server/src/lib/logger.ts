import pino, { type Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type { Logger };

/**
 * Creates a child logger scoped to one outreach pipeline run.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ runId, ...extra });
}

export default logger;
