import pino from 'pino';
import type { Logger, LogLevel } from './types.js';

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from environment.
 *
 * GOLDEN_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (stdout belongs to the diff output, tests stay quiet)
 */
export function resolveLogLevel(env: Record<string, string | undefined>): LogLevel {
  const level = env['GOLDEN_LOG_LEVEL']?.toLowerCase();
  return level && isLogLevel(level) ? level : 'silent';
}

let _root: Logger | null = null;

/**
 * Root logger: synchronous JSON to stderr (stdout carries the diff).
 */
export function getRootLogger(): Logger {
  if (!_root) {
    _root = pino(
      {
        level: resolveLogLevel(process.env),
        timestamp: pino.stdTimeFunctions.isoTime,
        serializers: {
          err: pino.stdSerializers.err,
        },
      },
      pino.destination({ dest: 2, sync: true })
    );
  }
  return _root;
}

/** Child logger bound to a component name. */
export function createLogger(component: string): Logger {
  return getRootLogger().child({ component });
}
