// src/core/__tests__/logger.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { HourlyFileSink, formatLine, hourlyLogPath, logger, maskToken } from '../logger.js';

describe('logger', () => {
  beforeEach(() => {
    logger.setLevel('info');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    logger.setLevel('info');
  });

  it('formats a line with level and category', () => {
    expect(formatLine('2026-01-01T00:00:00.000Z', 'warn', 'sync', 'Page 3 is empty')).toBe(
      '2026-01-01T00:00:00.000Z WARN  [sync] Page 3 is empty'
    );
  });

  it('drops messages below the current level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});
    const info = jest.spyOn(console, 'info').mockImplementation(() => {});

    logger.debug('sync', 'hidden');
    logger.info('sync', 'shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
    expect(String(info.mock.calls[0][0])).toMatch(/ INFO  \[sync\] shown$/);
  });

  it('routes errors to stderr', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    logger.setLevel('error');

    logger.error('records', 'Insert failed');

    expect(String(error.mock.calls[0][0])).toMatch(/ ERROR \[records\] Insert failed$/);
    expect(logger.getLevel()).toBe('error');
  });

  it('prints a banner as three lines', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => {});

    logger.banner('cli', 'Catalog sync started');

    expect(info).toHaveBeenCalledTimes(3);
    expect(String(info.mock.calls[1][0])).toMatch(/\[cli\] Catalog sync started$/);
  });
});

describe('maskToken', () => {
  it('keeps only a short prefix', () => {
    expect(maskToken('abcdefghijkl')).toBe('abcdefgh...');
    expect(maskToken('short')).toBe('***');
  });
});

describe('hourly log files', () => {
  const at = () => new Date(2026, 2, 1, 15, 5);
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'logs-'));
    jest.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(async () => {
    logger.setFileSink(undefined);
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('names files by local day and hour', () => {
    expect(hourlyLogPath('/logs', new Date(2026, 0, 9, 7, 59))).toBe(path.join('/logs', '20260109', '07.log'));
  });

  it('appends each logged line to the current hour file', async () => {
    logger.setFileSink(new HourlyFileSink(dir, at));

    logger.info('sync', 'first');
    logger.info('sync', 'second');

    const lines = (await readFile(path.join(dir, '20260301', '15.log'), 'utf-8')).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/ INFO  \[sync\] first$/);
    expect(lines[1]).toMatch(/ INFO  \[sync\] second$/);
    expect(lines[2]).toBe('');
  });

  it('falls back to the console alone when the directory cannot be written', async () => {
    const blocked = path.join(dir, 'blocked');
    await writeFile(blocked, 'not a directory');
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    logger.setFileSink(new HourlyFileSink(blocked, at));

    logger.info('sync', 'first');
    logger.info('sync', 'second');

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^Could not write to log directory .*blocked, file logging disabled: /);
  });
});
