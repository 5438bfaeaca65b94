import {
  pino,
  stdSerializers,
  stdTimeFunctions,
  type DestinationStream,
  type Logger,
} from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Structured JSON logger shared by the whole service. Components take a
 * child logger tagged with their name:
 *
 * ```typescript
 * const log = logger.child({ component: 'message-handler' });
 * log.error({ err, stage: 'translate' }, 'Failed to translate message');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    level: options.level ?? 'info',
    base: { pid: process.pid, hostname: undefined },
    timestamp: stdTimeFunctions.isoTime,
    serializers: { err: stdSerializers.err },
  };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}
