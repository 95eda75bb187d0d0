/**
 * Structured logging for the tutoring orchestrator.
 *
 * Components accept an injected logger and otherwise fall back to
 * `useLogger().child({ category })`.
 */

import { pino, destination, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
  /** Write to stderr, keeping stdout for command output */
  stderr?: boolean;
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLevel(value: string | undefined): LevelWithSilent | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  return LEVELS.find(level => level === normalized);
}

/**
 * Create a logger based on environment.
 * In test environment the logger is silent unless LOG_LEVEL is set.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = parseLevel(process.env.LOG_LEVEL);
  const level = options.level
    ?? envLevel
    ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

  const pinoOptions = { name: options.name ?? 'studyhall', level };
  return options.stderr ? pino(pinoOptions, destination(2)) : pino(pinoOptions);
}

let rootLogger: Logger | null = null;

/**
 * Root logger, created on first use
 */
export function useLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

/**
 * Replace the root logger (CLI sets one with the configured level)
 */
export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

export function getCategoryLogger(category: string, logger?: Logger): Logger {
  return (logger ?? useLogger()).child({ category });
}
