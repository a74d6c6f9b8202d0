export type { FakeTransport, FetchInput } from './host.ts';
export { Fetcher, KVNamespace, failWith, respondWith } from './host.ts';
