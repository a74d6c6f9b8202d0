export type {
  LogArgs,
  LogEntry,
  LogLevel,
  LogMethod,
  LoggerOptions,
  Transport,
} from './types.ts';
export { Logger } from './logger.ts';
export { logLevels } from './constants.ts';
export {
  filterTransport,
  makeArrayTransport,
  makeConsoleTransport,
  makeJsonTransport,
} from './transports.ts';
