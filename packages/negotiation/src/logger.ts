import pino from 'pino';

export type Logger = pino.BaseLogger;

export interface LoggerOptions {
  name?: string;
  level?: string;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  return pino({
    name: options.name ?? 'negotiation',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
  });
}
