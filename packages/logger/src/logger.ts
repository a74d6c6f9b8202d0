/**
 * A Logger delivers entries to a set of transports, labelling each with the
 * tags of the logger that produced it.
 *
 * @example
 * ```ts
 * const logger = new Logger('mtls-worker');
 * logger.info('Handling request', url);
 * >>> [mtls-worker] Handling request https://...
 *
 * const upstream = logger.subLogger('upstream');
 * upstream.warn('Transport failure');
 * >>> [mtls-worker, upstream] Transport failure
 * ```
 *
 * Transports are synchronous; a transport that needs to do asynchronous work
 * must start it itself and handle its failures.
 */

import { mergeOptions, parseOptions } from './options.ts';
import type {
  LogArgs,
  LogEntry,
  LogLevel,
  LogMethod,
  LoggerOptions,
} from './types.ts';

// Use harden() where the host provides it, but run without it too.
const harden: <Value>(value: Value) => Value =
  globalThis.harden ?? ((value) => value);

export class Logger {
  readonly #options: LoggerOptions;

  log: LogMethod;

  debug: LogMethod;

  info: LogMethod;

  warn: LogMethod;

  error: LogMethod;

  /**
   * @param options - The options for the logger, or a string to use as the
   *   logger's tag.
   * @param options.transports - Where entries are delivered. Defaults to the
   *   console.
   * @param options.tags - Tags added to every entry; sub-loggers accumulate
   *   them.
   */
  constructor(options: LoggerOptions | string | undefined = undefined) {
    this.#options = parseOptions(options);

    const bind = (level: LogLevel): LogMethod =>
      harden((...args: LogArgs) => this.#dispatch(level, ...args));
    this.debug = bind('debug');
    this.info = bind('info');
    this.log = bind('log');
    this.warn = bind('warn');
    this.error = bind('error');
  }

  /**
   * Creates a sub-logger that inherits this logger's tags and transports.
   *
   * @param options - Additional options, or a tag to add.
   * @returns The sub-logger.
   */
  subLogger(options: LoggerOptions | string = {}): Logger {
    return new Logger(
      mergeOptions(
        this.#options,
        typeof options === 'string' ? { tags: [options] } : options,
      ),
    );
  }

  #dispatch(level: LogLevel, ...args: LogArgs): void {
    const { transports, tags } = mergeOptions(this.#options);
    const [message, ...data] = args;
    const entry: LogEntry = harden({ level, tags, message, data });
    transports.forEach((transport) => transport(entry));
  }
}
harden(Logger);
