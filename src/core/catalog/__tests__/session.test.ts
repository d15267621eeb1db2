// src/core/catalog/__tests__/session.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { CatalogSession } from '../session.js';
import { ErrorCode, SyncError } from '../../errors.js';
import { FakeCatalog, item } from '../../__tests__/fakes.js';

describe('CatalogSession', () => {
  let catalog: FakeCatalog;

  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    catalog = new FakeCatalog();
    catalog.pages.set(1, [item('A')]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('logs in when there is no token and retries the call', async () => {
    const session = new CatalogSession(catalog, undefined);

    const result = await session.call(() => catalog.listPage(1), 4);

    expect(result).toEqual({ kind: 'ok', value: [item('A')] });
    expect(catalog.logins).toBe(1);
    expect(catalog.listCalls).toEqual([1, 1]);
    expect(session.token).toBe('token-1');
  });

  it('reuses a cached token that is still valid', async () => {
    catalog.acceptToken('cached-token');
    const session = new CatalogSession(catalog, 'cached-token');

    await session.call(() => catalog.listPage(1), 4);

    expect(catalog.logins).toBe(0);
    expect(catalog.listCalls).toEqual([1]);
  });

  it('hands each new token to the refresh listener', async () => {
    const seen: string[] = [];
    const session = new CatalogSession(catalog, undefined, async (token) => {
      seen.push(token);
    });

    await session.call(() => catalog.listPage(1), 4);

    expect(seen).toEqual(['token-1']);
  });

  it('gives up with an auth error once every attempt found the session expired', async () => {
    catalog.alwaysExpired = true;
    const session = new CatalogSession(catalog, undefined);

    const result = await session.call(() => catalog.listPage(1), 4);

    expect(result.kind).toBe('fatal');
    if (result.kind === 'fatal') {
      expect(result.error.code).toBe(ErrorCode.AUTH_ERROR);
      expect(result.error.message).toBe('Session still expired after 4 attempts');
    }
    // no refresh after the final attempt
    expect(catalog.logins).toBe(3);
    expect(catalog.listCalls).toHaveLength(4);
  });

  it('logs the final expired attempt as exhausted rather than as a refresh', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});
    catalog.alwaysExpired = true;
    const session = new CatalogSession(catalog, undefined);

    await session.call(() => catalog.listPage(1), 2);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/\[catalog\] token expired; refreshing session \(attempt 1\/2\)$/);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(/\[catalog\] token expired; no attempts left \(2\/2\)$/);
  });

  it('stops at the first failed login', async () => {
    catalog.loginFails = true;
    const session = new CatalogSession(catalog, undefined);

    const result = await session.call(() => catalog.listPage(1), 4);

    expect(result.kind === 'fatal' && result.error.message).toBe('Login failed: bad password');
    expect(catalog.listCalls).toEqual([1]);
  });

  it('passes fatal results through without refreshing', async () => {
    catalog.acceptToken('cached-token');
    catalog.detailErrors.set('X', new SyncError(ErrorCode.TRANSPORT_ERROR, 'POST /api/video/detail returned HTTP 500', true));
    const session = new CatalogSession(catalog, 'cached-token');
    const refresh = jest.spyOn(session, 'refresh');

    const result = await session.call(() => catalog.fetchDetail('X'), 4);

    expect(result.kind === 'fatal' && result.error.code).toBe(ErrorCode.TRANSPORT_ERROR);
    expect(refresh).not.toHaveBeenCalled();
    expect(catalog.detailCalls).toEqual(['X']);
  });
});
