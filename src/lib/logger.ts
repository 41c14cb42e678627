import { pino } from 'pino';

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

/**
 * Session ids are phone numbers; only the last four digits reach the logs.
 */
export function maskSessionId(sessionId: string): string {
  const digits = sessionId.replace(/\D/g, '');
  if (digits.length < 4) return '***';
  return `***${digits.slice(-4)}`;
}

/**
 * Creates a child logger scoped to a specific conversation session.
 */
export function createSessionLogger(
  sessionId: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ session: maskSessionId(sessionId), ...extra });
}

export type Logger = typeof logger;

export default logger;
