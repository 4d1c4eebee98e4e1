import { afterEach, describe, expect, test, vi } from 'vitest';
import { HttpError, MissingCredentialError } from '../src/lib/errors';
import { ModuleDef } from '../src/lib/schema';
import { type FetchFn, type FetchResponse, HttpApi, toHttpBaseUrl } from '../src/sdk/http_api';
import { anIdentity, readFixture } from './utils';

function respond(body: string, status: number = 200): FetchResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => body,
  };
}

function fakeFetch(body: string, status?: number) {
  return vi.fn<FetchFn>(async () => respond(body, status));
}

describe('toHttpBaseUrl', () => {
  test('maps ws schemes to http and ends the path with a slash', () => {
    expect(toHttpBaseUrl('ws://localhost:3000').toString()).toBe('http://localhost:3000/');
    expect(toHttpBaseUrl('wss://example.com/base').toString()).toBe('https://example.com/base/');
    expect(toHttpBaseUrl('https://example.com/').toString()).toBe('https://example.com/');
  });
});

describe('HttpApi', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('getSchema fetches and decodes the module definition', async () => {
    const fixture = readFixture('module_def.json');
    const fetch = fakeFetch(JSON.stringify(fixture));
    const api = new HttpApi({ uri: 'ws://localhost:3000', token: 'test-secret', fetch });

    const moduleDef = await api.getSchema('my db');

    expect(moduleDef).toEqual(ModuleDef.fromJson(fixture));
    expect(fetch).toHaveBeenCalledWith(
      'http://localhost:3000/v1/database/my%20db/schema?version=9',
      { method: 'GET', headers: { Authorization: 'Bearer test-secret' } }
    );
  });

  test('getSchema sends no credentials without a token', async () => {
    const fetch = fakeFetch(JSON.stringify(readFixture('module_def.json')));
    const api = new HttpApi({ uri: 'http://localhost:3000', fetch });

    await api.getSchema('chat', 8);

    expect(fetch).toHaveBeenCalledWith(
      'http://localhost:3000/v1/database/chat/schema?version=8',
      { method: 'GET', headers: {} }
    );
  });

  test('createIdentity returns the minted identity and token', async () => {
    const fetch = fakeFetch(`{"identity":"${anIdentity.toHexString()}","token":"test-token"}`);
    const api = new HttpApi({ uri: 'http://localhost:3000', token: 'test-secret', fetch });

    const created = await api.createIdentity();

    expect(created.identity).toEqual(anIdentity);
    expect(created.token).toBe('test-token');
    expect(fetch).toHaveBeenCalledWith('http://localhost:3000/v1/identity', {
      method: 'POST',
      headers: {},
    });
  });

  test('createWebSocketToken exchanges the configured token', async () => {
    const fetch = fakeFetch('{"token":"short-lived"}');
    const api = new HttpApi({ uri: 'http://localhost:3000', token: 'test-secret', fetch });

    await expect(api.createWebSocketToken()).resolves.toBe('short-lived');
    expect(fetch).toHaveBeenCalledWith('http://localhost:3000/v1/identity/websocket-token', {
      method: 'POST',
      headers: { Authorization: 'Bearer test-secret' },
    });
  });

  test('createWebSocketToken needs a token', async () => {
    const fetch = fakeFetch('{}');
    const api = new HttpApi({ uri: 'http://localhost:3000', fetch });

    await expect(api.createWebSocketToken()).rejects.toThrow(MissingCredentialError);
    await expect(api.createWebSocketToken()).rejects.toThrow(
      'An authentication token is required for createWebSocketToken'
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  test('an unsuccessful status is an HttpError', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const api = new HttpApi({
      uri: 'http://localhost:3000',
      fetch: fakeFetch('no such database', 404),
    });

    const pinging = api.ping();

    await expect(pinging).rejects.toThrow(
      'Unexpected status code 404 from http://localhost:3000/v1/ping: no such database'
    );
    await pinging.catch((e: unknown) => {
      expect(e).toBeInstanceOf(HttpError);
      if (e instanceof HttpError) {
        expect(e.status).toBe(404);
        expect(e.body).toBe('no such database');
      }
    });
  });
});
