import { MigrationConfig, S3StoreConfig } from '../config/migration.config';
import { ObjectStore } from '../types/migration.interface';
import { S3ObjectStore, createS3Client } from './s3-object-store.service';
import { SwiftClient } from './swift-client';
import { SwiftObjectStore } from './swift-object-store.service';

function createS3Store(config: S3StoreConfig, pageSize?: number): S3ObjectStore {
  return new S3ObjectStore({
    client: createS3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    }),
    bucket: config.bucket,
    pageSize,
  });
}

export function createObjectStores(config: MigrationConfig): {
  source: ObjectStore;
  destination: ObjectStore;
} {
  const { pageSize } = config;
  const source = createS3Store(config.source, pageSize);

  if (config.destination.kind === 's3') {
    return { source, destination: createS3Store(config.destination, pageSize) };
  }

  const { authUrl, username, password, tenantName, region, storageUrl, authToken, container } =
    config.destination;
  const client = new SwiftClient({ authUrl, username, password, tenantName, region, storageUrl, authToken });
  return { source, destination: new SwiftObjectStore({ client, container, pageSize }) };
}
