/**
 * Structured logging
 *
 * Logs go to standard error so that command results printed on standard
 * output can be piped and parsed.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
  /** Human-readable output through pino-pretty (development runs only) */
  pretty?: boolean;
}

const REDACT_PATHS = [
  'value',
  'secret',
  'accountKey',
  'password',
  '*.value',
  '*.secret',
  '*.accountKey',
  '*.password',
];

/**
 * Create a pino logger writing to file descriptor 2.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions: LoggerOptions = {
    name: options.name ?? 'supabase-aks-deployer',
    level: options.level ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '***' },
  };

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: { target: 'pino-pretty', options: { destination: 2, colorize: true } },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

export interface Timer {
  /** Log an intermediate step with elapsed time */
  checkpoint: (label: string, context?: Record<string, unknown>) => void;
  /** Log completion and return the elapsed milliseconds */
  end: (context?: Record<string, unknown>) => number;
  /** Log failure and return the elapsed milliseconds */
  error: (error: unknown, context?: Record<string, unknown>) => number;
}

export function createTimer(logger: Logger, operation: string): Timer {
  const startedAt = Date.now();
  const elapsed = (): number => Date.now() - startedAt;

  return {
    checkpoint(label, context = {}) {
      logger.debug({ operation, checkpoint: label, elapsedMs: elapsed(), ...context }, 'Checkpoint');
    },
    end(context = {}) {
      const durationMs = elapsed();
      logger.info({ operation, durationMs, ...context }, `${operation} completed`);
      return durationMs;
    },
    error(error, context = {}) {
      const durationMs = elapsed();
      logger.error({ operation, durationMs, err: error, ...context }, `${operation} failed`);
      return durationMs;
    },
  };
}
