import pino from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Unknown or missing levels fall back to `info`. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}

// Credentials can reach log lines through error objects thrown by the Google clients.
const REDACTED_PATHS = ['apiKey', 'authOptions.credentials', '*.apiKey', '*.authOptions.credentials'];

export const logger = pino({
  name: 'verita',
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(
  component: string,
  bindings: Record<string, string | number> = {},
): pino.Logger {
  return logger.child({ ...bindings, component });
}
