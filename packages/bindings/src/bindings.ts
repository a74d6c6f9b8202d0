import {
  FETCHER_TYPE_NAME,
  FetchBinding,
  isHostFetcher,
} from './FetchBinding.ts';
import { resolveBinding } from './resolver.ts';
import type { ResolveOptions } from './resolver.ts';
import { makeBindingSpecification } from './specification.ts';
import type { BindingSpecification } from './specification.ts';
import type { Environment, ResponseShape } from './types.ts';

export type FetchBindingSpecifications<RequestValue, ResponseValue> = {
  /**
   * A client certificate uploaded to the host. Fetches through it present the
   * certificate to the destination.
   */
  mtlsCertificate: BindingSpecification<
    FetchBinding<RequestValue, ResponseValue>
  >;
  /**
   * Another worker, reached without a network hop.
   */
  service: BindingSpecification<FetchBinding<RequestValue, ResponseValue>>;
};

/**
 * Creates the specifications of the fetch-capable bindings for one response
 * shape.
 *
 * The host gives certificate bindings and service bindings the same class,
 * so both specifications check for {@link FETCHER_TYPE_NAME}. A service
 * binding therefore resolves as a certificate binding and the other way
 * round; only `kind` tells them apart.
 *
 * @param shape - The response shape.
 * @returns The specifications, by kind.
 */
export const makeFetchBindingSpecifications = <RequestValue, ResponseValue>(
  shape: ResponseShape<RequestValue, ResponseValue>,
): FetchBindingSpecifications<RequestValue, ResponseValue> => {
  const fromHost = (
    value: unknown,
  ): FetchBinding<RequestValue, ResponseValue> | undefined =>
    isHostFetcher(value) ? new FetchBinding(value, shape) : undefined;

  return harden({
    mtlsCertificate: makeBindingSpecification(
      'mtlsCertificate',
      FETCHER_TYPE_NAME,
      fromHost,
    ),
    service: makeBindingSpecification('service', FETCHER_TYPE_NAME, fromHost),
  });
};

export type BindingGetter<Bindings extends Record<string, unknown>> = <
  Kind extends keyof Bindings & string,
>(
  environment: Environment,
  name: string,
  kind: Kind,
  options?: ResolveOptions,
) => Bindings[Kind];

/**
 * Creates a resolver that looks up specifications by kind.
 *
 * @param specifications - The binding specifications, by kind.
 * @returns The resolver.
 */
export const makeBindingGetter = <Bindings extends Record<string, unknown>>(
  specifications: {
    readonly [Kind in keyof Bindings]: BindingSpecification<Bindings[Kind]>;
  },
): BindingGetter<Bindings> => {
  const getBinding = <Kind extends keyof Bindings & string>(
    environment: Environment,
    name: string,
    kind: Kind,
    options: ResolveOptions = {},
  ): Bindings[Kind] =>
    resolveBinding(environment, name, specifications[kind], options);
  return harden(getBinding);
};
