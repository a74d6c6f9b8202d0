import type { TypeVerifier } from './types.ts';

/**
 * Wraps a host-specific type check so that any failure during introspection
 * counts as "not an instance".
 *
 * @param check - The host-specific check.
 * @returns A verifier that never throws.
 */
export const makeTypeVerifier = (check: TypeVerifier): TypeVerifier =>
  harden((value: unknown, typeName: string): boolean => {
    try {
      return check(value, typeName) === true;
    } catch {
      return false;
    }
  });

const hasConstructorNamed = (value: unknown, typeName: string): boolean => {
  if (
    value === null ||
    (typeof value !== 'object' && typeof value !== 'function')
  ) {
    return false;
  }
  let prototype: object | null = Object.getPrototypeOf(value);
  while (prototype !== null) {
    const constructor: unknown = Object.getOwnPropertyDescriptor(
      prototype,
      'constructor',
    )?.value;
    if (typeof constructor === 'function' && constructor.name === typeName) {
      return true;
    }
    prototype = Object.getPrototypeOf(prototype);
  }
  return false;
};

/**
 * The default verifier. The edge host gives each binding object a class of
 * its own (`Fetcher`, `KVNamespace`, ...), so the host type identity is the
 * name of a constructor on the object's prototype chain. Only descriptors are
 * read, so no getter of the value runs.
 */
export const isInstanceOfType: TypeVerifier =
  makeTypeVerifier(hasConstructorNamed);
