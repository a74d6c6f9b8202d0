import {
  makeBindingGetter,
  makeFetchBindingSpecifications,
} from './bindings.ts';
import type { FetchBinding } from './FetchBinding.ts';
import { httpShape } from './response/http.ts';
import type { HttpRequestInput, HttpResponse } from './response/http.ts';

export type MtlsCertificate = FetchBinding<HttpRequestInput, HttpResponse>;
export type ServiceBinding = FetchBinding<HttpRequestInput, HttpResponse>;

export const bindingSpecifications = makeFetchBindingSpecifications(httpShape);

/**
 * Resolves a binding of the given kind, with responses as standard response
 * records.
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
  adaptHttpResponse,
  httpRequestStruct,
  httpShape,
  toRequest,
  toResponse,
} from './response/http.ts';
export type {
  HttpHeaders,
  HttpRequest,
  HttpRequestInput,
  HttpResponse,
} from './response/http.ts';
export { makeBindingSpecification } from './specification.ts';
export type { BindingOf, BindingSpecification } from './specification.ts';
export type {
  Environment,
  HostFetcher,
  ResponseShape,
  TypeVerifier,
} from './types.ts';
export { isInstanceOfType, makeTypeVerifier } from './verifier.ts';
