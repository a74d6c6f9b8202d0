import { describe, expect, it, vi } from 'vitest';

import { DEFAULT_OPTIONS, mergeOptions, parseOptions, unique } from './options.ts';
import type { Transport } from './types.ts';

const mocks = vi.hoisted(() => ({
  consoleTransport: vi.fn(),
}));

vi.mock('./transports.ts', () => ({
  makeConsoleTransport: () => mocks.consoleTransport,
}));

describe('parseOptions', () => {
  it('parses an undefined options bag', () => {
    expect(parseOptions(undefined)).toStrictEqual({
      transports: [mocks.consoleTransport],
    });
  });

  it('parses an options bag without transports', () => {
    expect(parseOptions({ tags: ['worker'] })).toStrictEqual({
      transports: [mocks.consoleTransport],
      tags: ['worker'],
    });
  });

  it('keeps supplied transports', () => {
    const transport: Transport = vi.fn();
    expect(
      parseOptions({ tags: ['worker'], transports: [transport] }),
    ).toStrictEqual({ tags: ['worker'], transports: [transport] });
  });

  it('parses a string', () => {
    expect(parseOptions('worker')).toStrictEqual({
      tags: ['worker'],
      transports: [mocks.consoleTransport],
    });
  });

  it.each([[0], [true]])('throws for invalid options: %j', (value) => {
    expect(() => parseOptions(value as unknown as string)).toThrow(
      'Invalid logger options',
    );
  });
});

describe('unique', () => {
  it('drops repeated values, keeping first occurrences', () => {
    expect(unique(['a', 'b', 'a', 'c', 'b'])).toStrictEqual(['a', 'b', 'c']);
  });
});

describe('mergeOptions', () => {
  it.each([
    { left: ['worker'], right: ['sub'], result: ['worker', 'sub'] },
    { left: ['worker', 'worker'], right: ['sub'], result: ['worker', 'sub'] },
    {
      left: ['worker', 'fizz'],
      right: ['worker', 'buzz'],
      result: ['worker', 'fizz', 'buzz'],
    },
  ])('merges tags: $left and $right', ({ left, right, result }) => {
    expect(mergeOptions({ tags: left }, { tags: right }).tags).toStrictEqual(
      result,
    );
  });

  it('defaults to the default options', () => {
    expect(mergeOptions()).toStrictEqual(DEFAULT_OPTIONS);
  });

  it('merges transports without duplicates', () => {
    const transportA: Transport = vi.fn();
    const transportB: Transport = vi.fn();
    expect(
      mergeOptions(
        { transports: [transportA] },
        { transports: [transportA, transportB] },
      ).transports,
    ).toStrictEqual([transportA, transportB]);
  });
});
