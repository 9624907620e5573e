import pino, { type Logger } from 'pino';
import { z } from 'zod';

export type { Logger } from 'pino';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Diagnostic logger. Always writes to stderr so stdout stays parseable when
 * piped, and defaults to silent so a normal run prints nothing but results
 * and `Error:` lines.
 */
export function createLogger(opts: { level?: LogLevel; destination?: pino.DestinationStream } = {}): Logger {
  return pino(
    {
      name: 'trello',
      level: opts.level ?? 'silent',
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: ['key', 'token', '*.key', '*.token'], censor: '[redacted]' },
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    opts.destination ?? pino.destination({ fd: 2, sync: true }),
  );
}

/** `--verbose` wins; otherwise TRELLO_LOG_LEVEL when it names a valid level. */
export function resolveLogLevel(opts: { verbose: boolean; env: Readonly<Record<string, string | undefined>> }): LogLevel {
  if (opts.verbose) return 'debug';
  const parsed = LogLevelSchema.safeParse((opts.env.TRELLO_LOG_LEVEL ?? '').trim().toLowerCase());
  return parsed.success ? parsed.data : 'silent';
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
