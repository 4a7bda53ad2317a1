import { createHash } from 'node:crypto';
import { buffer } from 'node:stream/consumers';
import { Readable } from 'stream';
import { StoreError } from '../errors/migration.errors';
import {
  ObjectMetadata,
  ObjectPayload,
  ObjectRef,
  ObjectStore,
  StoredObject,
} from '../types/migration.interface';

export interface InMemoryObject {
  body: Uint8Array;
  contentType: string;
  metadata: ObjectMetadata;
  lastModified: Date;
}

export interface StoreCalls {
  list: number;
  head: string[];
  get: string[];
  put: string[];
  placeholder: string[];
}

export function md5(content: string | Uint8Array): string {
  return createHash('md5').update(content).digest('hex');
}

/** In-process ObjectStore for tests; records every call by kind. */
export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, InMemoryObject>();
  readonly calls: StoreCalls = { list: 0, head: [], get: [], put: [], placeholder: [] };
  readonly failures = new Map<string, Error>();
  exists = true;

  constructor(readonly location: string) {}

  seed(
    name: string,
    content = '',
    contentType = 'text/plain',
    lastModified = new Date('2024-01-01T00:00:00.000Z')
  ): this {
    this.objects.set(name, {
      body: new TextEncoder().encode(content),
      contentType,
      metadata: {},
      lastModified,
    });
    return this;
  }

  refOf(name: string): ObjectRef {
    const object = this.objects.get(name);
    if (!object) {
      throw new Error(`no such object ${name}`);
    }
    return {
      name,
      checksum: md5(object.body),
      size: object.body.byteLength,
      lastModified: object.lastModified,
      contentType: object.contentType,
    };
  }

  async *list(signal?: AbortSignal): AsyncGenerator<ObjectRef, void, undefined> {
    this.calls.list++;
    this.throwIfFailing('list');
    for (const name of [...this.objects.keys()].sort()) {
      if (signal?.aborted) {
        return;
      }
      yield this.refOf(name);
    }
  }

  async headMetadata(name: string): Promise<string | null> {
    this.calls.head.push(name);
    this.throwIfFailing(`head:${name}`);
    return this.objects.has(name) ? this.refOf(name).checksum : null;
  }

  async getObject(name: string): Promise<StoredObject> {
    this.calls.get.push(name);
    this.throwIfFailing(`get:${name}`);
    const object = this.objects.get(name);
    if (!object) {
      throw new StoreError(`get ${name}: not found`, 'get', name);
    }
    return { ...this.refOf(name), body: Readable.from([Buffer.from(object.body)]) };
  }

  async putObject(
    name: string,
    payload: ObjectPayload,
    contentType: string,
    metadata: ObjectMetadata
  ): Promise<void> {
    this.calls.put.push(name);
    this.throwIfFailing(`put:${name}`);
    const body = payload.body instanceof Readable ? new Uint8Array(await buffer(payload.body)) : payload.body;
    this.objects.set(name, { body, contentType, metadata, lastModified: new Date() });
  }

  async newPlaceholder(name: string, metadata: ObjectMetadata): Promise<void> {
    this.calls.placeholder.push(name);
    this.throwIfFailing(`placeholder:${name}`);
    this.objects.set(name, {
      body: new Uint8Array(),
      contentType: 'application/directory',
      metadata,
      lastModified: new Date(),
    });
  }

  async containerExists(): Promise<boolean> {
    this.throwIfFailing('containerExists');
    return this.exists;
  }

  async createContainer(): Promise<void> {
    this.throwIfFailing('createContainer');
    this.exists = true;
  }

  private throwIfFailing(key: string): void {
    const failure = this.failures.get(key);
    if (failure) {
      throw failure;
    }
  }
}

export async function* fromArray(items: ObjectRef[], pulled: string[] = []): AsyncGenerator<ObjectRef> {
  for (const item of items) {
    pulled.push(item.name);
    yield item;
  }
}

export function ref(name: string, checksum = md5(name), overrides: Partial<ObjectRef> = {}): ObjectRef {
  return {
    name,
    checksum,
    size: 0,
    lastModified: new Date('2024-01-01T00:00:00.000Z'),
    contentType: 'text/plain',
    ...overrides,
  };
}
