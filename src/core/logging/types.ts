import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, no wrapper.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ path }, 'Staged artifact');
 *   logger.warn({ err }, 'Stage cleanup failed');
 */
export type Logger = PinoLogger;

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
