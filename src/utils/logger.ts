/**
 * Logger factory and lazy logging helpers
 *
 * All components take an optional pino `Logger`. The root logger is built
 * here so the CLIs and the library share one level convention, which can be
 * overridden through the OLLAMA_BENCH_LOG_LEVEL environment variable.
 */

import { pino, type Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

type LogMethodLevel = Exclude<LogLevel, 'silent'>;
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface CreateLoggerOptions {
  level?: LogLevel;
  name?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolve the effective level: environment override first, then the caller's choice
 */
export function resolveLogLevel(requested?: LogLevel): LogLevel {
  const envLevel = process.env.OLLAMA_BENCH_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return requested ?? 'info';
}

/**
 * Create the root logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', name: 'ollama-bench' });
 * logger.info({ model: 'llama3' }, 'Starting iterations');
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'ollama-bench',
    level: resolveLogLevel(options.level),
  });
}

/**
 * Lazy log helper that only evaluates context when the level is enabled
 *
 * Used on per-chunk paths where building the context object for every
 * streamed fragment would be wasted work at the default level.
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogMethodLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}

export type { Logger };
