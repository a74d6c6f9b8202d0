/**
 * Log levels in ascending order of severity. Each level names the `console`
 * method the console transport writes to.
 */
export const logLevels = {
  debug: 0,
  info: 1,
  log: 2,
  warn: 3,
  error: 4,
} as const;
