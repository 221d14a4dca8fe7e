import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

// stdout is reserved for command output.
export const createLogger = (level: string): Logger => pino(createLoggerOptions(level), pino.destination(2));

export const createSilentLogger = (): Logger => pino({ level: 'silent' });
