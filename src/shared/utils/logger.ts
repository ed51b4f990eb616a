/**
 * Structured JSON logger for the integration-test harness.
 *
 * Uses Pino so that runs in CI produce machine-readable logs.
 */

import pino from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

function toLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

/**
 * Create and configure a Pino logger instance.
 *
 * Reads LOG_LEVEL from environment variable (supports both lowercase and uppercase).
 * Defaults to 'info' if not specified or not a known level.
 *
 * @param name - Logger name
 * @param level - Optional log level override
 * @returns Configured Pino logger
 */
export function setupLogger(name: string = 'dataprocessing-tests', level?: string): pino.Logger {
  const logLevel: LogLevel = toLogLevel(level) ?? toLogLevel(process.env.LOG_LEVEL) ?? 'info';

  return pino({
    name,
    level: logLevel,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
