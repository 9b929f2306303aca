import { pino, type DestinationStream, type Logger as PinoInstance } from 'pino';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export type LogContext = Readonly<Record<string, unknown>>;

/**
 * Logging collaborator handed to every component. Nothing in the repository reaches
 * for a process-wide logger.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export interface CreateLoggerOptions {
  readonly name?: string;
  readonly level?: LogLevel;
  readonly destination?: DestinationStream;
}

const wrap = (instance: PinoInstance): Logger => ({
  debug: (message, context) => (context ? instance.debug(context, message) : instance.debug(message)),
  info: (message, context) => (context ? instance.info(context, message) : instance.info(message)),
  warn: (message, context) => (context ? instance.warn(context, message) : instance.warn(message)),
  error: (message, context) => (context ? instance.error(context, message) : instance.error(message)),
  child: (bindings) => wrap(instance.child(bindings))
});

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const settings = {
    name: options.name ?? 'scrapeyard',
    level: options.level ?? 'info'
  };
  const instance = options.destination ? pino(settings, options.destination) : pino(settings);
  return wrap(instance);
};

export const createNoopLogger = (): Logger => {
  const logger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => logger
  };
  return logger;
};
