import { logLevels } from './constants.ts';
import { formatTagPrefix } from './tags.ts';
import type { LogEntry, LogLevel, Transport } from './types.ts';

type ConsoleTransportOptions = {
  tags?: boolean;
};

/**
 * Creates a transport that writes each entry to the `console` method named by
 * its level.
 *
 * @param options - Options for the console transport.
 * @param options.tags - Whether to prefix the output with the entry's tags
 * (default: `true`).
 * @returns The console transport.
 */
export function makeConsoleTransport(
  options: ConsoleTransportOptions = {},
): Transport {
  const { tags = true } = options;
  return (entry) => {
    const prefix = formatTagPrefix(tags, entry).trimEnd();
    const args = [
      ...(prefix ? [prefix] : []),
      ...(entry.message ? [entry.message] : []),
      ...entry.data,
    ];
    // eslint-disable-next-line no-console
    console[entry.level](...args);
  };
}

const serializeDatum = (datum: unknown): unknown =>
  datum instanceof Error ? { name: datum.name, message: datum.message } : datum;

/**
 * Creates a transport that writes each entry as a single JSON line, the form
 * edge log collectors index.
 *
 * @param write - Receives each serialized line (default: `console.log`).
 * @returns The JSON transport.
 */
export function makeJsonTransport(
  // eslint-disable-next-line no-console
  write: (line: string) => void = console.log,
): Transport {
  return (entry) => {
    write(
      JSON.stringify({
        level: entry.level,
        tags: entry.tags,
        message: entry.message,
        data: entry.data.map(serializeDatum),
      }),
    );
  };
}

/**
 * Creates a transport that collects entries into an array.
 *
 * @param target - The array to push entries onto.
 * @returns The array transport.
 */
export const makeArrayTransport = (target: LogEntry[]): Transport => {
  return (entry) => {
    target.push(entry);
  };
};

/**
 * Wraps a transport so that it only sees entries at or above a level.
 *
 * @param transport - The transport to wrap.
 * @param minimumLevel - The least severe level to pass through.
 * @returns The filtered transport.
 */
export const filterTransport = (
  transport: Transport,
  minimumLevel: LogLevel,
): Transport => {
  const threshold = logLevels[minimumLevel];
  return (entry) => {
    if (logLevels[entry.level] >= threshold) {
      transport(entry);
    }
  };
};
