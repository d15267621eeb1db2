// src/core/distribution/__tests__/fanout.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { cleanAllSites, pushToDomains } from '../fanout.js';
import { buildRecord } from '../../orchestrator.js';
import { FakeDistributor, detail, item, storedColumns } from '../../__tests__/fakes.js';
import type { VideoRecord } from '../../types/index.js';

const stored = (record: VideoRecord) => ({ ...record, columns: storedColumns(record) });

describe('pushToDomains', () => {
  const batch = [stored(buildRecord(item('D'), detail('Title D'))), stored(buildRecord(item('E'), detail('Title E')))];

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('records each domain with the ids it rejected', async () => {
    const distributor = new FakeDistributor(['https://example.com', 'https://other.com']);
    distributor.rejects.set('https://example.com', new Set(['D']));

    const failures = await pushToDomains(distributor, batch, distributor.domains);

    expect(failures).toEqual(new Map([
      ['https://example.com', new Set(['D'])],
      ['https://other.com', new Set()],
    ]));
  });

  it('charges every id in the batch to an unreachable domain', async () => {
    const distributor = new FakeDistributor(['https://example.com']);
    distributor.down.add('https://example.com');

    const failures = await pushToDomains(distributor, batch, distributor.domains);

    expect(failures.get('https://example.com')).toEqual(new Set(['D', 'E']));
  });
});

describe('cleanAllSites', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('cleans every domain and reports each outcome', async () => {
    const distributor = new FakeDistributor(['https://example.com', 'https://other.com']);
    distributor.cleanFails.add('https://other.com');

    const results = await cleanAllSites(distributor);

    expect(results).toEqual(new Map([
      ['https://example.com', true],
      ['https://other.com', false],
    ]));
  });

  it('does nothing without domains', async () => {
    const distributor = new FakeDistributor([]);

    expect((await cleanAllSites(distributor)).size).toBe(0);
    expect(distributor.cleaned).toEqual([]);
  });
});
