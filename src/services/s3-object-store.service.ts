import {
  S3Client,
  ListObjectsV2Command,
  GetObjectCommand,
  HeadObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
  PutObjectCommand,
  _Object,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { Readable } from 'stream';
import { StoreError, errorDetails } from '../errors/migration.errors';
import {
  ObjectMetadata,
  ObjectPayload,
  ObjectRef,
  ObjectStore,
  StoredObject,
} from '../types/migration.interface';
import { logger } from '../utils/logger';
import { normalizeChecksum } from '../utils/object-path';

export interface S3Config {
  region: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  credentials: {
    accessKeyId: string;
    secretAccessKey: string;
  };
}

export interface S3ObjectStoreOptions {
  client: S3Client;
  bucket: string;
  pageSize?: number;
}

export const S3_DIRECTORY_CONTENT_TYPE = 'application/x-directory';

// lib-storage refuses parts below 5 MiB.
const MIN_PART_SIZE = 1024 * 1024 * 5;
const MAX_PARTS = 10000;
/** Largest object S3 accepts in one PUT; anything bigger goes multipart. */
export const MAX_SINGLE_PUT_SIZE = 1024 * 1024 * 1024 * 5;

export function createS3Client(config: S3Config): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    credentials: {
      accessKeyId: config.credentials.accessKeyId,
      secretAccessKey: config.credentials.secretAccessKey,
    },
    // Ceph RGW rejects the aws-chunked CRC trailers newer SDKs add by default.
    requestChecksumCalculation: 'WHEN_REQUIRED',
    responseChecksumValidation: 'WHEN_REQUIRED',
  });
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'NotFound' || error.name === 'NoSuchKey' || error.name === 'NoSuchBucket')
  );
}

export class S3ObjectStore implements ObjectStore {
  readonly location: string;
  private readonly client: S3Client;
  private readonly pageSize?: number;

  constructor(options: S3ObjectStoreOptions) {
    this.client = options.client;
    this.location = options.bucket;
    this.pageSize = options.pageSize;
  }

  async *list(signal?: AbortSignal): AsyncGenerator<ObjectRef, void, undefined> {
    let continuationToken: string | undefined;

    do {
      if (signal?.aborted) {
        return;
      }

      let contents: _Object[];
      try {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.location,
            ContinuationToken: continuationToken,
            MaxKeys: this.pageSize,
          })
        );
        contents = response.Contents ?? [];
        continuationToken = response.NextContinuationToken;
      } catch (error) {
        logger.error('Error listing objects:', { bucket: this.location, ...errorDetails(error) });
        throw StoreError.wrap('list', this.location, error);
      }

      for (const item of contents) {
        const name = item.Key ?? '';
        const size = item.Size ?? 0;
        yield {
          name,
          checksum: normalizeChecksum(item.ETag),
          size,
          lastModified: item.LastModified ?? new Date(0),
          // Listings carry no content type; only empty objects can be folder placeholders.
          contentType: size === 0 ? await this.headContentType(name) : '',
        };
      }
    } while (continuationToken);
  }

  async headMetadata(name: string): Promise<string | null> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: this.location, Key: name })
      );
      return normalizeChecksum(response.ETag);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw StoreError.wrap('head', `${this.location}/${name}`, error);
    }
  }

  private async headContentType(name: string): Promise<string> {
    try {
      const response = await this.client.send(
        new HeadObjectCommand({ Bucket: this.location, Key: name })
      );
      return response.ContentType ?? '';
    } catch (error) {
      if (isNotFound(error)) {
        return '';
      }
      throw StoreError.wrap('head', `${this.location}/${name}`, error);
    }
  }

  async getObject(name: string): Promise<StoredObject> {
    try {
      const { Body, ContentType, ContentLength, ETag, LastModified } = await this.client.send(
        new GetObjectCommand({ Bucket: this.location, Key: name })
      );

      if (ContentLength === undefined) {
        throw new Error('Missing content length for source object');
      }
      if (!Body && ContentLength !== 0) {
        throw new Error('Empty object body received from source');
      }

      let body: Readable;
      if (!Body) {
        body = Readable.from([]);
      } else if (Body instanceof Readable) {
        body = Body;
      } else {
        body = Readable.from([Buffer.from(await Body.transformToByteArray())]);
      }

      return {
        name,
        checksum: normalizeChecksum(ETag),
        size: ContentLength,
        lastModified: LastModified ?? new Date(0),
        contentType: ContentType ?? '',
        body,
      };
    } catch (error) {
      throw StoreError.wrap('get', `${this.location}/${name}`, error);
    }
  }

  async putObject(
    name: string,
    payload: ObjectPayload,
    contentType: string,
    metadata: ObjectMetadata
  ): Promise<void> {
    logger.debug('Starting upload:', {
      key: name,
      bucket: this.location,
      contentType,
      size: payload.size,
    });

    try {
      if (payload.size <= MAX_SINGLE_PUT_SIZE) {
        // One PUT keeps the resulting ETag equal to the content MD5.
        await this.client.send(
          new PutObjectCommand({
            Bucket: this.location,
            Key: name,
            Body: payload.body,
            ContentType: contentType,
            ContentLength: payload.size,
            Metadata: metadata,
          })
        );
        return;
      }

      const upload = new Upload({
        client: this.client,
        params: {
          Bucket: this.location,
          Key: name,
          Body: payload.body,
          ContentType: contentType,
          Metadata: metadata,
        },
        queueSize: 4,
        partSize: Math.max(MIN_PART_SIZE, Math.ceil(payload.size / MAX_PARTS)),
        leavePartsOnError: false,
      });
      await upload.done();
    } catch (error) {
      throw StoreError.wrap('put', `${this.location}/${name}`, error);
    }
  }

  async newPlaceholder(name: string, metadata: ObjectMetadata): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.location,
          Key: name,
          Body: new Uint8Array(),
          ContentLength: 0,
          ContentType: S3_DIRECTORY_CONTENT_TYPE,
          Metadata: metadata,
        })
      );
    } catch (error) {
      throw StoreError.wrap('placeholder', `${this.location}/${name}`, error);
    }
  }

  async containerExists(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.location }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw StoreError.wrap('head bucket', this.location, error);
    }
  }

  async createContainer(): Promise<void> {
    try {
      await this.client.send(new CreateBucketCommand({ Bucket: this.location }));
    } catch (error) {
      throw StoreError.wrap('create bucket', this.location, error);
    }
  }
}
