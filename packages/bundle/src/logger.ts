/**
 * Structured logging for the bundle loader
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions as PinoOptions } from 'pino';

export type { Logger } from 'pino';

const REDACT_PATHS = [
  'secretKey',
  '*.secretKey',
  'keyPair.secretKey',
  '*.secret_key',
  '*.privateKey',
];

export interface LoggerOptions {
  /** Logger name (default "plugseal") */
  name?: string;
  /** Log level; falls back to PLUGSEAL_LOG_LEVEL, then LOG_LEVEL, then "info" */
  level?: string;
  /** Where log lines go (default stdout) */
  destination?: DestinationStream;
}

/**
 * Resolve the effective log level from an explicit value and the environment
 */
export function resolveLogLevel(
  level: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return level || env.PLUGSEAL_LOG_LEVEL || env.LOG_LEVEL || 'info';
}

/**
 * Create a named pino logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: PinoOptions = {
    name: options.name ?? 'plugseal',
    level: resolveLogLevel(options.level),

    formatters: {
      level: (label) => ({ level: label }),
    },

    serializers: {
      err: pino.stdSerializers.err,
    },

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/**
 * Logger that discards everything (tests, library callers that want quiet)
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
