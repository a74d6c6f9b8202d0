import type { logLevels } from './constants.ts';

/**
 * One of the levels in {@link logLevels}, least severe first. A
 * {@link filterTransport} passes entries at or above its level.
 */
export type LogLevel = keyof typeof logLevels;

/**
 * What a logger hands its transports for each call of a level method.
 * `message` is the call's first argument and `data` the rest, in order;
 * `tags` are the logger's own tags followed by those of its sub-loggers.
 */
export type LogEntry = {
  level: LogLevel;
  tags: string[];
  message?: string | undefined;
  data: unknown[];
};

/**
 * Receives entries synchronously, in the order they are logged. See
 * `makeConsoleTransport`, `makeJsonTransport` and `makeArrayTransport`.
 */
export type Transport = (entry: LogEntry) => void;

export type LoggerOptions = {
  /**
   * Replaces the console transport a logger gets by default. Pass `[]` for a
   * silent logger.
   */
  transports?: Transport[];
  tags?: string[];
};

/**
 * A message followed by values to log with it, or nothing.
 */
export type LogArgs = [message: string, ...data: unknown[]] | [];

export type LogMethod = (...args: LogArgs) => void;
