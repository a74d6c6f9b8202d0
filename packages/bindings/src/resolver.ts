import {
  BindingMissingError,
  BindingTypeMismatchError,
} from '@edgebind/errors';

import type { BindingSpecification } from './specification.ts';
import type { Environment, TypeVerifier } from './types.ts';
import { isInstanceOfType, makeTypeVerifier } from './verifier.ts';

export type ResolveOptions = {
  /**
   * The host adapter's type check. Defaults to {@link isInstanceOfType}.
   */
  verify?: TypeVerifier;
};

/**
 * Wraps a host value in a handle if it passes verification.
 *
 * @param value - The host value.
 * @param specification - The kind of binding expected.
 * @param options - Resolution options.
 * @param options.verify - The host adapter's type check.
 * @returns The handle, or `undefined` if the value is not of the expected type.
 */
export const toBinding = <Binding>(
  value: unknown,
  specification: BindingSpecification<Binding>,
  { verify = isInstanceOfType }: ResolveOptions = {},
): Binding | undefined => {
  if (!makeTypeVerifier(verify)(value, specification.typeName)) {
    return undefined;
  }
  return specification.fromHost(value);
};

/**
 * Reads an own property of the environment through its descriptor, so no
 * getter runs. An accessor yields a descriptor without a value.
 *
 * @param environment - The invocation's bindings.
 * @param name - The binding name.
 * @returns The descriptor, or `undefined` if there is no such own property.
 * @throws {BindingMissingError} If the environment cannot be inspected.
 */
const getOwnDescriptor = (
  environment: Environment,
  name: string,
): PropertyDescriptor | undefined => {
  try {
    return Object.getOwnPropertyDescriptor(environment, name);
  } catch (error) {
    throw new BindingMissingError(name, { cause: error });
  }
};

/**
 * Looks up a binding by exact, case-sensitive name and checks that the host
 * object behind it is of the expected type.
 *
 * @param environment - The invocation's bindings.
 * @param name - The binding name.
 * @param specification - The kind of binding expected.
 * @param options - Resolution options.
 * @returns A handle to the binding.
 * @throws {BindingMissingError} If `name` is empty or not in the environment.
 * @throws {BindingTypeMismatchError} If the host object is of another type,
 * or the binding is an accessor.
 */
export const resolveBinding = <Binding>(
  environment: Environment,
  name: string,
  specification: BindingSpecification<Binding>,
  options: ResolveOptions = {},
): Binding => {
  const descriptor =
    name.length === 0 ? undefined : getOwnDescriptor(environment, name);
  if (descriptor === undefined) {
    throw new BindingMissingError(name);
  }
  const binding = toBinding(descriptor.value, specification, options);
  if (binding === undefined) {
    throw new BindingTypeMismatchError(name, specification.typeName);
  }
  return binding;
};
