import type { LogEntry } from './types.ts';

/**
 * Formats an entry's tags as a bracketed prefix, e.g. `"[worker, upstream] "`.
 *
 * @param includeTags - Whether the transport renders tags at all.
 * @param entry - The log entry whose tags to format.
 * @returns The formatted tag prefix, or `""`.
 */
export function formatTagPrefix(includeTags: boolean, entry: LogEntry): string {
  return includeTags && entry.tags.length > 0
    ? `[${entry.tags.join(', ')}] `
    : '';
}
