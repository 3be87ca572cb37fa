import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LoggerSettings {
  level: string;
  /** Log destination. Without one the logger is silent: the terminal owns stdout. */
  file?: string;
}

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(settings: LoggerSettings): Logger {
  if (!settings.file) {
    return pino(createLoggerOptions('silent'));
  }

  return pino(
    createLoggerOptions(settings.level),
    pino.destination({ dest: settings.file, mkdir: true, sync: false }),
  );
}

/** Silent logger for tests and embedders that do not care. */
export function createNullLogger(): Logger {
  return pino(createLoggerOptions('silent'));
}
