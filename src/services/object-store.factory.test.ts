import { describe, it, expect, afterEach, vi } from 'vitest';
import { S3Client } from '@aws-sdk/client-s3';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher } from 'undici';
import { loadMigrationConfig } from '../config/migration.config';
import { createObjectStores } from './object-store.factory';
import { S3ObjectStore } from './s3-object-store.service';
import { SwiftObjectStore } from './swift-object-store.service';

const source = {
  sourceEndpoint: 'https://ceph.test',
  sourceAccessKeyId: 'test-key',
  sourceSecretAccessKey: 'test-secret',
  sourceBucket: 'source-bucket',
};

vi.mock('../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('createObjectStores', () => {
  const originalDispatcher = getGlobalDispatcher();

  afterEach(() => {
    setGlobalDispatcher(originalDispatcher);
    vi.restoreAllMocks();
  });

  it('should pair an S3 source with a Swift destination', () => {
    const stores = createObjectStores(
      loadMigrationConfig({
        ...source,
        destinationBucket: 'backup',
        swiftAuthUrl: 'https://keystone.test/v2.0',
        swiftUser: 'migrator',
        swiftPassword: 'test-secret',
        swiftTenantName: 'tenant',
      })
    );

    expect(stores.source).toBeInstanceOf(S3ObjectStore);
    expect(stores.source.location).toBe('source-bucket');
    expect(stores.destination).toBeInstanceOf(SwiftObjectStore);
    expect(stores.destination.location).toBe('backup');
  });

  it('should build an S3 destination when asked to', () => {
    const stores = createObjectStores(
      loadMigrationConfig({
        ...source,
        destinationType: 's3',
        destinationAccessKeyId: 'test-key-dest',
        destinationSecretAccessKey: 'test-secret-dest',
        destinationBucket: 'destination-bucket',
      })
    );

    expect(stores.destination).toBeInstanceOf(S3ObjectStore);
    expect(stores.destination.location).toBe('destination-bucket');
  });

  it('should use a pre-issued Swift token and the page size without Keystone', async () => {
    const agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
    agent
      .get('http://swift.test')
      .intercept({
        path: (path: string) =>
          path.startsWith('/v1/AUTH_t/backup?') && new URLSearchParams(path.split('?')[1]).get('limit') === '2',
        method: 'GET',
        headers: { 'x-auth-token': 'test-token' },
      })
      .reply(204, '');

    const stores = createObjectStores(
      loadMigrationConfig({
        ...source,
        destinationBucket: 'backup',
        swiftStorageUrl: 'http://swift.test/v1/AUTH_t',
        swiftAuthToken: 'test-token',
        pageSize: 2,
      })
    );
    for await (const _item of stores.destination.list()) {
      // drain
    }

    agent.assertNoPendingInterceptors();
    await agent.close();
  });

  it('should pass the page size to S3 listings', async () => {
    const send = vi.spyOn(S3Client.prototype, 'send').mockResolvedValue({ Contents: [] } as never);

    const stores = createObjectStores(
      loadMigrationConfig({
        ...source,
        destinationType: 's3',
        destinationAccessKeyId: 'test-key-dest',
        destinationSecretAccessKey: 'test-secret-dest',
        destinationBucket: 'destination-bucket',
        pageSize: 250,
      })
    );
    for await (const _item of stores.source.list()) {
      // drain
    }

    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0][0].input).toEqual(
      expect.objectContaining({ Bucket: 'source-bucket', MaxKeys: 250 })
    );
  });
});
