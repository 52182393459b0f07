/**
 * CLI Logger
 *
 * Root pino logger for CLI runs. Services derive component children from it.
 *
 * Configuration:
 * - level from the validated config (LOG_LEVEL)
 * - ISO timestamps and label-formatted levels
 * - credential-like fields redacted if they ever get logged
 *
 * Logs go to stderr so stdout stays clean for tables and --json output.
 *
 * @module packages/cli/utils/logger
 */

import pino, { type Logger } from 'pino';

export function createLogger(level: string): Logger {
  return pino(
    {
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: [
          'databaseUrl',
          '*.databaseUrl',
          '*.password',
          '*.token',
          '*.secret',
          '*.apiKey',
          '*.privateKey',
          '*.credentials',
        ],
        censor: '[REDACTED]',
      },
    },
    pino.destination(2)
  );
}
