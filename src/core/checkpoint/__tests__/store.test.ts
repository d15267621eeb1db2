// src/core/checkpoint/__tests__/store.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { CheckpointStore } from '../store.js';
import { ErrorCode, SyncError } from '../../errors.js';

describe('CheckpointStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    dir = await mkdtemp(path.join(os.tmpdir(), 'checkpoint-'));
    file = path.join(dir, 'nested', 'state.json');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('creates a zero checkpoint on first load', async () => {
    const store = new CheckpointStore(file);
    const checkpoint = await store.load();

    expect(checkpoint.lastPage).toBe(0);
    expect(checkpoint.credentialToken).toBeUndefined();
    expect(checkpoint.failedUploadIds.size).toBe(0);
    expect(checkpoint.failedDistribution.size).toBe(0);
    expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual({
      lastPage: 0,
      credentialToken: null,
      failedUploadIds: [],
      failedDistribution: {},
    });
  });

  it('writes sorted ids, two-space indent and omits empty domains', async () => {
    const store = new CheckpointStore(file);
    const checkpoint = await store.load();
    checkpoint.lastPage = 3;
    checkpoint.credentialToken = 'test-token';
    checkpoint.failedUploadIds = new Set(['C', 'A']);
    checkpoint.failedDistribution = new Map([
      ['https://other.com', new Set<string>()],
      ['https://example.com', new Set(['E', 'D'])],
    ]);

    await store.save(checkpoint);

    expect(await readFile(file, 'utf-8')).toBe(
      [
        '{',
        '  "lastPage": 3,',
        '  "credentialToken": "test-token",',
        '  "failedUploadIds": [',
        '    "A",',
        '    "C"',
        '  ],',
        '  "failedDistribution": {',
        '    "https://example.com": [',
        '      "D",',
        '      "E"',
        '    ]',
        '  }',
        '}',
        '',
      ].join('\n')
    );
  });

  it('round-trips through a fresh store', async () => {
    const first = new CheckpointStore(file);
    const checkpoint = await first.load();
    checkpoint.lastPage = 7;
    checkpoint.failedUploadIds.add('C');
    checkpoint.failedDistribution.set('https://example.com', new Set(['D']));
    await first.save(checkpoint);

    const loaded = await new CheckpointStore(file).load();

    expect(loaded.lastPage).toBe(7);
    expect([...loaded.failedUploadIds]).toEqual(['C']);
    expect([...(loaded.failedDistribution.get('https://example.com') ?? [])]).toEqual(['D']);
  });

  it('leaves no temp file behind after a save', async () => {
    const store = new CheckpointStore(file);
    await store.load();

    expect(await readdir(path.dirname(file))).toEqual(['state.json']);
  });

  it('reads numeric ids as strings', async () => {
    await new CheckpointStore(file).load();
    await writeFile(file, JSON.stringify({ lastPage: 2, failedUploadIds: [17], failedDistribution: {} }));

    const loaded = await new CheckpointStore(file).load();

    expect([...loaded.failedUploadIds]).toEqual(['17']);
    expect(loaded.credentialToken).toBeUndefined();
  });

  it('fails on a file that is not JSON', async () => {
    await new CheckpointStore(file).load();
    await writeFile(file, '{ "lastPage": ');

    await expect(new CheckpointStore(file).load()).rejects.toMatchObject({
      code: ErrorCode.CHECKPOINT_CORRUPT,
    });
    expect(await readFile(file, 'utf-8')).toBe('{ "lastPage": ');
  });

  it('fails on a file with the wrong shape', async () => {
    await new CheckpointStore(file).load();
    await writeFile(file, JSON.stringify({ lastPage: -1 }));

    await expect(new CheckpointStore(file).load()).rejects.toBeInstanceOf(SyncError);
  });

  it('refuses to move lastPage backwards', async () => {
    const store = new CheckpointStore(file);
    const checkpoint = await store.load();
    checkpoint.lastPage = 5;
    await store.save(checkpoint);

    checkpoint.lastPage = 4;

    await expect(store.save(checkpoint)).rejects.toThrow('Refusing to move lastPage back from 5 to 4');
    expect(JSON.parse(await readFile(file, 'utf-8')).lastPage).toBe(5);
  });

  it('refuses to go below a lastPage loaded from disk', async () => {
    const first = new CheckpointStore(file);
    const checkpoint = await first.load();
    checkpoint.lastPage = 9;
    await first.save(checkpoint);

    const second = new CheckpointStore(file);
    const loaded = await second.load();
    loaded.lastPage = 1;

    await expect(second.save(loaded)).rejects.toMatchObject({ code: ErrorCode.CHECKPOINT_CORRUPT });
  });
});
