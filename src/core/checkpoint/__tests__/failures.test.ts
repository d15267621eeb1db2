// src/core/checkpoint/__tests__/failures.test.ts
import { describe, it, expect } from '@jest/globals';
import { countFailures, failuresFor, unionFailures } from '../failures.js';
import type { DistributionFailures } from '../../types/index.js';

describe('unionFailures', () => {
  it('adds ids to existing domains and keeps the old ones', () => {
    const target: DistributionFailures = new Map([['https://example.com', new Set(['A'])]]);

    unionFailures(target, new Map([['https://example.com', new Set(['B'])]]));

    expect([...(target.get('https://example.com') ?? [])].sort()).toEqual(['A', 'B']);
  });

  it('creates entries for new domains', () => {
    const target: DistributionFailures = new Map();

    unionFailures(target, new Map([['https://other.com', new Set(['D'])]]));

    expect([...(target.get('https://other.com') ?? [])]).toEqual(['D']);
  });

  it('ignores empty incoming sets', () => {
    const target: DistributionFailures = new Map();

    unionFailures(target, new Map([['https://other.com', new Set<string>()]]));

    expect(target.has('https://other.com')).toBe(false);
  });

  it('does not alias the incoming set', () => {
    const incoming = new Set(['D']);
    const target: DistributionFailures = new Map();

    unionFailures(target, new Map([['https://example.com', incoming]]));
    incoming.add('E');

    expect(target.get('https://example.com')?.size).toBe(1);
  });
});

describe('failuresFor', () => {
  it('charges every id to every domain', () => {
    const failures = failuresFor(['https://a.com', 'https://b.com'], ['1', '2']);

    expect([...(failures.get('https://a.com') ?? [])]).toEqual(['1', '2']);
    expect([...(failures.get('https://b.com') ?? [])]).toEqual(['1', '2']);
    expect(countFailures(failures)).toBe(4);
  });
});
