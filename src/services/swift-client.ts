/**
 * Minimal OpenStack Swift REST client.
 *
 * Authenticates against Keystone v2 (or uses a pre-issued storage URL and
 * token) and sends requests relative to the account's storage URL. Keystone
 * tokens are renewed shortly before they expire, and once more whenever the
 * storage answers 401 to a request that can be replayed.
 */

import { Readable } from 'stream';
import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { StoreError } from '../errors/migration.errors';
import { logger } from '../utils/logger';

export interface SwiftClientConfig {
  authUrl?: string;
  username?: string;
  password?: string;
  tenantName?: string;
  region?: string;
  /** Skip Keystone entirely when both are given. */
  storageUrl?: string;
  authToken?: string;
  dispatcher?: Dispatcher;
}

export type SwiftMethod = 'GET' | 'HEAD' | 'PUT';

export interface SwiftRequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | undefined>;
  /** A stream body is sent once; a 401 on it is returned, not retried. */
  body?: Uint8Array | Readable;
}

export interface SwiftResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

export interface SwiftStreamResponse {
  status: number;
  headers: Record<string, string>;
  body: Readable;
}

export interface SwiftSession {
  storageUrl: string;
  token: string;
  /** Only Keystone sessions can be renewed; a pre-issued token is used as is. */
  renewable: boolean;
  expiresAt?: number;
}

// Renew this long before Keystone's expiry so in-flight requests keep a valid token.
const TOKEN_RENEW_MARGIN_MS = 60 * 1000;

const KeystoneV2ResponseSchema = z.object({
  access: z.object({
    token: z.object({ id: z.string().min(1), expires: z.string().optional() }),
    serviceCatalog: z.array(
      z.object({
        type: z.string(),
        endpoints: z.array(
          z.object({
            publicURL: z.string().url(),
            region: z.string().optional(),
          })
        ),
      })
    ),
  }),
});

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

export function encodeObjectPath(name: string): string {
  return name.split('/').map(encodeURIComponent).join('/');
}

export class SwiftClient {
  private session?: SwiftSession;

  constructor(private readonly config: SwiftClientConfig) {}

  /** Sends a request and buffers the whole response body. */
  async send(method: SwiftMethod, path: string, options: SwiftRequestOptions = {}): Promise<SwiftResponse> {
    const response = await this.dispatch(method, path, options);
    try {
      const body = new Uint8Array(await response.body.arrayBuffer());
      return { status: response.statusCode, headers: flattenHeaders(response.headers), body };
    } catch (error) {
      throw StoreError.wrap(method, path, error);
    }
  }

  /** Sends a request and hands back the unread response body. */
  async open(method: SwiftMethod, path: string, options: SwiftRequestOptions = {}): Promise<SwiftStreamResponse> {
    const response = await this.dispatch(method, path, options);
    return { status: response.statusCode, headers: flattenHeaders(response.headers), body: response.body };
  }

  async authenticate(): Promise<SwiftSession> {
    if (this.session && !this.isExpiring(this.session)) {
      return this.session;
    }

    const { storageUrl, authToken } = this.config;
    if (storageUrl && authToken) {
      this.session = { storageUrl, token: authToken, renewable: false };
      return this.session;
    }

    this.session = await this.requestKeystoneToken();
    return this.session;
  }

  private isExpiring(session: SwiftSession): boolean {
    return session.expiresAt !== undefined && session.expiresAt - TOKEN_RENEW_MARGIN_MS <= Date.now();
  }

  private async dispatch(
    method: SwiftMethod,
    path: string,
    options: SwiftRequestOptions
  ): Promise<Dispatcher.ResponseData> {
    const session = await this.authenticate();
    const response = await this.request(session, method, path, options);
    if (response.statusCode !== 401 || !session.renewable) {
      return response;
    }

    this.session = undefined;
    if (options.body instanceof Readable) {
      return response;
    }

    logger.info('Swift token rejected, authenticating again', { method, path });
    try {
      await response.body.dump();
    } catch (error) {
      throw StoreError.wrap(method, path, error);
    }
    return this.request(await this.authenticate(), method, path, options);
  }

  private async request(
    session: SwiftSession,
    method: SwiftMethod,
    path: string,
    options: SwiftRequestOptions
  ): Promise<Dispatcher.ResponseData> {
    const url = new URL(`${session.storageUrl.replace(/\/+$/, '')}/${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }

    try {
      return await request(url, {
        method,
        headers: { ...options.headers, 'x-auth-token': session.token },
        body: options.body,
        dispatcher: this.config.dispatcher,
      });
    } catch (error) {
      throw StoreError.wrap(method, path, error);
    }
  }

  private async requestKeystoneToken(): Promise<SwiftSession> {
    const { authUrl, username, password, tenantName, region } = this.config;
    if (!authUrl || !username || !password) {
      throw new StoreError('Swift auth URL, user and password are required', 'auth', authUrl ?? '');
    }

    const target = `${authUrl.replace(/\/+$/, '')}/tokens`;
    let payload: unknown;
    try {
      const response = await request(target, {
        method: 'POST',
        headers: { 'content-type': 'application/json', accept: 'application/json' },
        body: JSON.stringify({
          auth: { tenantName, passwordCredentials: { username, password } },
        }),
        dispatcher: this.config.dispatcher,
      });
      if (response.statusCode >= 300) {
        await response.body.dump();
        throw new Error(`authentication rejected with status ${response.statusCode}`);
      }
      payload = await response.body.json();
    } catch (error) {
      throw StoreError.wrap('auth', target, error);
    }

    const parsed = KeystoneV2ResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new StoreError('Unexpected Keystone token response', 'auth', target, { cause: parsed.error });
    }

    const endpoints = parsed.data.access.serviceCatalog
      .filter((service) => service.type === 'object-store')
      .flatMap((service) => service.endpoints);
    const endpoint = endpoints.find((candidate) => !region || candidate.region === region);
    if (!endpoint) {
      throw new StoreError(
        `No object-store endpoint in service catalog${region ? ` for region ${region}` : ''}`,
        'auth',
        target
      );
    }

    const { id, expires } = parsed.data.access.token;
    const expiresAt = expires ? Date.parse(expires) : Number.NaN;
    return {
      storageUrl: endpoint.publicURL,
      token: id,
      renewable: true,
      expiresAt: Number.isNaN(expiresAt) ? undefined : expiresAt,
    };
  }
}
