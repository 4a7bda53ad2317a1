import { z } from 'zod';
import { StoreError } from '../errors/migration.errors';
import {
  ObjectMetadata,
  ObjectPayload,
  ObjectRef,
  ObjectStore,
  StoredObject,
} from '../types/migration.interface';
import { logger } from '../utils/logger';
import { normalizeChecksum } from '../utils/object-path';
import { SwiftClient, encodeObjectPath } from './swift-client';

export const SWIFT_DIRECTORY_CONTENT_TYPE = 'application/directory';

const DEFAULT_PAGE_SIZE = 10000;

const SwiftListingSchema = z.array(
  z.object({
    name: z.string(),
    hash: z.string(),
    bytes: z.number().int().nonnegative(),
    last_modified: z.string(),
    content_type: z.string(),
  })
);

export interface SwiftObjectStoreOptions {
  client: SwiftClient;
  container: string;
  pageSize?: number;
}

// Swift listings report UTC in microseconds without a zone designator.
export function parseSwiftTimestamp(value: string): Date {
  const millis = value.replace(/(\.\d{3})\d+/, '$1');
  return new Date(/(Z|[+-]\d\d:?\d\d)$/.test(millis) ? millis : `${millis}Z`);
}

function metadataHeaders(metadata: ObjectMetadata): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata)) {
    headers[`x-object-meta-${key}`] = value;
  }
  return headers;
}

export class SwiftObjectStore implements ObjectStore {
  readonly location: string;
  private readonly client: SwiftClient;
  private readonly pageSize: number;

  constructor(options: SwiftObjectStoreOptions) {
    this.client = options.client;
    this.location = options.container;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async *list(signal?: AbortSignal): AsyncGenerator<ObjectRef, void, undefined> {
    let marker: string | undefined;

    while (!signal?.aborted) {
      const response = await this.client.send('GET', encodeURIComponent(this.location), {
        query: { format: 'json', limit: String(this.pageSize), marker },
        headers: { accept: 'application/json' },
      });
      this.expect(response, [200, 204], 'list', this.location);

      if (response.status === 204 || response.body.byteLength === 0) {
        return;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(Buffer.from(response.body).toString('utf8'));
      } catch (error) {
        throw StoreError.wrap('list', this.location, error);
      }

      const parsed = SwiftListingSchema.safeParse(payload);
      if (!parsed.success) {
        throw new StoreError('Unexpected container listing', 'list', this.location, { cause: parsed.error });
      }

      for (const entry of parsed.data) {
        yield {
          name: entry.name,
          checksum: normalizeChecksum(entry.hash),
          size: entry.bytes,
          lastModified: parseSwiftTimestamp(entry.last_modified),
          contentType: entry.content_type,
        };
      }

      if (parsed.data.length < this.pageSize) {
        return;
      }
      marker = parsed.data[parsed.data.length - 1].name;
    }
  }

  async headMetadata(name: string): Promise<string | null> {
    const response = await this.client.send('HEAD', this.objectPath(name));
    if (response.status === 404) {
      return null;
    }
    this.expect(response, [200], 'head', name);
    return normalizeChecksum(response.headers['etag']);
  }

  async getObject(name: string): Promise<StoredObject> {
    const response = await this.client.open('GET', this.objectPath(name));
    const size = Number(response.headers['content-length']);
    if (response.status !== 200 || !Number.isInteger(size)) {
      response.body.destroy();
      this.expect(response, [200], 'get', name);
      throw new StoreError(`get ${name}: missing content length`, 'get', name);
    }

    const lastModified = response.headers['last-modified'];
    return {
      name,
      checksum: normalizeChecksum(response.headers['etag']),
      size,
      lastModified: lastModified ? new Date(lastModified) : new Date(0),
      contentType: response.headers['content-type'] ?? '',
      body: response.body,
    };
  }

  async putObject(
    name: string,
    payload: ObjectPayload,
    contentType: string,
    metadata: ObjectMetadata
  ): Promise<void> {
    const response = await this.client.send('PUT', this.objectPath(name), {
      headers: {
        'content-type': contentType,
        'content-length': String(payload.size),
        ...metadataHeaders(metadata),
      },
      body: payload.body,
    });
    this.expect(response, [201], 'put', name);
  }

  async newPlaceholder(name: string, metadata: ObjectMetadata): Promise<void> {
    const response = await this.client.send('PUT', this.objectPath(name), {
      headers: {
        'content-type': SWIFT_DIRECTORY_CONTENT_TYPE,
        'content-length': '0',
        ...metadataHeaders(metadata),
      },
      body: new Uint8Array(),
    });
    this.expect(response, [201], 'placeholder', name);
  }

  async containerExists(): Promise<boolean> {
    const response = await this.client.send('HEAD', encodeURIComponent(this.location));
    if (response.status === 404) {
      return false;
    }
    this.expect(response, [200, 204], 'head container', this.location);
    return true;
  }

  async createContainer(): Promise<void> {
    const response = await this.client.send('PUT', encodeURIComponent(this.location));
    this.expect(response, [201, 202], 'create container', this.location);
    logger.info(`${this.location}: Created container`);
  }

  private objectPath(name: string): string {
    return `${encodeURIComponent(this.location)}/${encodeObjectPath(name)}`;
  }

  private expect(response: { status: number }, statuses: number[], operation: string, target: string): void {
    if (!statuses.includes(response.status)) {
      throw new StoreError(
        `${operation} ${target}: unexpected status ${response.status}`,
        operation,
        target
      );
    }
  }
}
