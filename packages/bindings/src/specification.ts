/**
 * Describes one kind of binding: the host type name its objects must carry,
 * and how a verified host object becomes a handle.
 *
 * Several kinds may share a `typeName` when the host represents them the same
 * way; `kind` is what the application asked for, `typeName` is what the host
 * can prove.
 */
export type BindingSpecification<Binding> = {
  kind: string;
  typeName: string;
  /**
   * Wraps a host object that has already passed the type verifier. Returns
   * `undefined` if the object lacks the surface the handle needs.
   */
  fromHost: (value: unknown) => Binding | undefined;
};

/**
 * The handle type produced by a binding specification.
 */
export type BindingOf<Specification> =
  Specification extends BindingSpecification<infer Binding> ? Binding : never;

/**
 * Creates a binding specification.
 *
 * @param kind - The name the application uses for this kind of binding.
 * @param typeName - The host type name its objects carry.
 * @param fromHost - Wraps a verified host object in a handle.
 * @returns The specification.
 */
export const makeBindingSpecification = <Binding>(
  kind: string,
  typeName: string,
  fromHost: (value: unknown) => Binding | undefined,
): BindingSpecification<Binding> => harden({ kind, typeName, fromHost });
