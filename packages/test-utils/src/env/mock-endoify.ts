// eslint-disable-next-line spaced-comment
/// <reference types="ses"/>

// Tests run without lockdown, so `harden` is the identity.
globalThis.harden = <Value>(value: Value): Value => value;

export {};
