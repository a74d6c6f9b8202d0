import type { Environment } from '@edgebind/bindings';
import type { LogLevel } from '@edgebind/logger';
import {
  enums,
  exactOptional,
  pattern,
  size,
  string,
  type,
  validate,
} from '@metamask/superstruct';

export const DEFAULT_UPSTREAM_URL = 'https://mtls.example.com/';

export const DEFAULT_CERTIFICATE_BINDING = 'MTLS_CERTIFICATE';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * The worker's variables, as the host places them in the environment beside
 * the bindings.
 */
export const workerVarsStruct = type({
  UPSTREAM_URL: exactOptional(pattern(string(), /^https?:\/\/[^/]/u)),
  CERTIFICATE_BINDING: exactOptional(size(string(), 1, Infinity)),
  LOG_LEVEL: exactOptional(enums(['debug', 'info', 'log', 'warn', 'error'])),
});

export type WorkerConfig = {
  upstreamUrl: string;
  certificateBinding: string;
  logLevel: LogLevel;
};

/**
 * Reads the worker's configuration from its environment.
 *
 * @param environment - The invocation's environment.
 * @returns The configuration, with defaults for unset variables.
 * @throws {StructError} If a variable is set to an invalid value.
 */
export const readConfig = (environment: Environment): WorkerConfig => {
  const [error, vars] = validate(environment, workerVarsStruct);
  if (error !== undefined) {
    throw error;
  }
  return harden({
    upstreamUrl: vars.UPSTREAM_URL ?? DEFAULT_UPSTREAM_URL,
    certificateBinding: vars.CERTIFICATE_BINDING ?? DEFAULT_CERTIFICATE_BINDING,
    logLevel: vars.LOG_LEVEL ?? DEFAULT_LOG_LEVEL,
  });
};
