import {
  makeBindingGetter,
  makeFetchBindingSpecifications,
} from './bindings.ts';
import type { FetchBinding } from './FetchBinding.ts';
import { nativeShape } from './response/native.ts';
import type { FetchResponse, NativeRequestInput } from './response/native.ts';

export type MtlsCertificate = FetchBinding<NativeRequestInput, FetchResponse>;
export type ServiceBinding = FetchBinding<NativeRequestInput, FetchResponse>;

export const bindingSpecifications =
  makeFetchBindingSpecifications(nativeShape);

/**
 * Resolves a binding of the given kind, with responses in the native shape.
 */
export const getBinding = makeBindingGetter(bindingSpecifications);

export {
  FETCHER_TYPE_NAME,
  FetchBinding,
  isHostFetcher,
} from './FetchBinding.ts';
export {
  makeBindingGetter,
  makeFetchBindingSpecifications,
} from './bindings.ts';
export type { BindingGetter, FetchBindingSpecifications } from './bindings.ts';
export { requestOptionsStruct } from './request.ts';
export type { RequestOptions } from './request.ts';
export { resolveBinding, toBinding } from './resolver.ts';
export type { ResolveOptions } from './resolver.ts';
export {
  FetchResponse,
  adaptNativeResponse,
  nativeShape,
} from './response/native.ts';
export type { NativeRequestInput } from './response/native.ts';
export { makeBindingSpecification } from './specification.ts';
export type { BindingOf, BindingSpecification } from './specification.ts';
export type {
  Environment,
  HostFetcher,
  ResponseShape,
  TypeVerifier,
} from './types.ts';
export { isInstanceOfType, makeTypeVerifier } from './verifier.ts';
