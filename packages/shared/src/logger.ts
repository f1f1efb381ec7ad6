import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: LogSink;
}

export const createLogger = ({
  level = 'info',
  stream = process.stderr,
}: LoggerOptions = {}): Logger => {
  const write = (messageLevel: Exclude<LogLevel, 'silent'>, message: string) => {
    if (severity[messageLevel] < severity[level]) {
      return;
    }
    stream.write(`${messageLevel}: ${message}\n`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
};
