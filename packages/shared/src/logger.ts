import pino, { stdTimeFunctions } from 'pino';
import type { DestinationStream, Level, Logger } from 'pino';

export const LOG_LEVELS: readonly (Level | 'silent')[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export type LogLevel = (typeof LOG_LEVELS)[number];

export type CreateLoggerOptions = {
  level?: LogLevel;
  name?: string;
  destination?: DestinationStream;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions = {
    level: options.level ?? 'info',
    name: options.name,
    base: undefined,
    timestamp: stdTimeFunctions.isoTime
  };
  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}

export const silentLogger: Logger = pino({ level: 'silent' });
