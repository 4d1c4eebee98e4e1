import { HttpError, MissingCredentialError } from '../lib/errors';
import { Identity } from '../lib/identity';
import { JsonReader } from '../lib/json_reader';
import { ModuleDef, type RawModuleDef } from '../lib/schema';
import { clientLogger } from './logger';

/** The part of a fetch `Response` the client reads. */
export type FetchResponse = {
  ok: boolean;
  status: number;
  text(): Promise<string>;
};

export type FetchFn = (
  url: string,
  init: { method: string; headers: Record<string, string> }
) => Promise<FetchResponse>;

export type HttpApiOptions = {
  uri: string | URL;
  token?: string;
  fetch?: FetchFn;
};

export type CreatedIdentity = {
  identity: Identity;
  token: string;
};

/** The schema document version this client understands. */
export const SCHEMA_VERSION = 9;

/**
 * Convert a `ws(s)://` URI to the matching `http(s)://` one and make sure
 * the path ends in `/`, so that relative endpoint paths resolve beneath it.
 */
export function toHttpBaseUrl(uri: string | URL): URL {
  const url = new URL(uri.toString());
  if (url.protocol === 'ws:') url.protocol = 'http:';
  if (url.protocol === 'wss:') url.protocol = 'https:';
  if (!url.pathname.endsWith('/')) url.pathname = `${url.pathname}/`;
  return url;
}

/**
 * The plain HTTP endpoints the realtime client relies on.
 */
export class HttpApi {
  #baseUrl: URL;
  #token?: string;
  #fetch: FetchFn;

  constructor({ uri, token, fetch: fetchFn }: HttpApiOptions) {
    this.#baseUrl = toHttpBaseUrl(uri);
    this.#token = token;
    this.#fetch = fetchFn ?? ((url, init) => fetch(url, init));
  }

  get token(): string | undefined {
    return this.#token;
  }

  /**
   * Fetch and decode the module definition of a database.
   */
  async getSchema(
    nameOrIdentity: string,
    version: number = SCHEMA_VERSION
  ): Promise<RawModuleDef> {
    const url = new URL(
      `v1/database/${encodeURIComponent(nameOrIdentity)}/schema`,
      this.#baseUrl
    );
    url.searchParams.set('version', String(version));
    const body = await this.#request('GET', url, this.#token !== undefined);
    return ModuleDef.fromReader(JsonReader.parse(body));
  }

  /**
   * Ask the server to mint a new identity and its long-lived token.
   */
  async createIdentity(): Promise<CreatedIdentity> {
    const body = await this.#request('POST', new URL('v1/identity', this.#baseUrl), false);
    const reader = JsonReader.parse(body);
    return {
      identity: Identity.fromString(reader.field('identity').asString()),
      token: reader.field('token').asString(),
    };
  }

  /**
   * Exchange the configured token for a short-lived one, suitable for a
   * URL query parameter.
   */
  async createWebSocketToken(): Promise<string> {
    if (this.#token === undefined) {
      throw new MissingCredentialError('createWebSocketToken');
    }
    const url = new URL('v1/identity/websocket-token', this.#baseUrl);
    const body = await this.#request('POST', url, true);
    return JsonReader.parse(body).field('token').asString();
  }

  async ping(): Promise<void> {
    await this.#request('GET', new URL('v1/ping', this.#baseUrl), false);
  }

  async #request(method: string, url: URL, authenticated: boolean): Promise<string> {
    const headers: Record<string, string> = {};
    if (authenticated && this.#token !== undefined) {
      headers['Authorization'] = `Bearer ${this.#token}`;
    }
    clientLogger('debug', () => `${method} ${url.toString()}`);
    const response = await this.#fetch(url.toString(), { method, headers });
    const body = await response.text();
    if (!response.ok) {
      clientLogger('warn', () => `${method} ${url.toString()} failed with ${response.status}`);
      throw new HttpError(response.status, body, url.toString());
    }
    return body;
  }
}
