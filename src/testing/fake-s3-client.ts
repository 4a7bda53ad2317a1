import { buffer } from 'node:stream/consumers';
import { Readable } from 'stream';
import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
} from '@aws-sdk/client-s3';
import { md5 } from './in-memory-object-store';

export interface FakeS3Object {
  body: Uint8Array;
  contentType: string;
  lastModified: Date;
}

const notFound = () => Object.assign(new Error('Not Found'), { name: 'NotFound' });

async function readBody(body: unknown): Promise<Uint8Array> {
  if (body === undefined) {
    return new Uint8Array();
  }
  if (body instanceof Readable) {
    return new Uint8Array(await buffer(body));
  }
  if (body instanceof Uint8Array) {
    return body;
  }
  if (typeof body === 'string') {
    return new TextEncoder().encode(body);
  }
  throw new Error('unsupported body type');
}

/**
 * Single-bucket stand-in for an S3Client. Answers the commands the object
 * store sends, with quoted MD5 ETags the way Ceph does for single-part puts.
 */
export class FakeS3Client {
  readonly objects = new Map<string, FakeS3Object>();
  /** One `<command> <key>` entry per request, e.g. `put a/file.txt`. */
  readonly sent: string[] = [];

  send = async (command: object): Promise<unknown> => {
    if (command instanceof ListObjectsV2Command) {
      this.sent.push('list');
      return {
        Contents: [...this.objects.keys()].sort().map((key) => {
          const object = this.get(key);
          return {
            Key: key,
            Size: object.body.byteLength,
            ETag: `"${md5(object.body)}"`,
            LastModified: object.lastModified,
          };
        }),
      };
    }

    if (command instanceof HeadObjectCommand) {
      this.sent.push(`head ${command.input.Key}`);
      const object = this.get(command.input.Key ?? '');
      return {
        ETag: `"${md5(object.body)}"`,
        ContentType: object.contentType,
        ContentLength: object.body.byteLength,
      };
    }

    if (command instanceof GetObjectCommand) {
      this.sent.push(`get ${command.input.Key}`);
      const object = this.get(command.input.Key ?? '');
      return {
        Body: Readable.from([Buffer.from(object.body)]),
        ETag: `"${md5(object.body)}"`,
        ContentType: object.contentType,
        ContentLength: object.body.byteLength,
        LastModified: object.lastModified,
      };
    }

    if (command instanceof PutObjectCommand) {
      this.sent.push(`put ${command.input.Key}`);
      this.objects.set(command.input.Key ?? '', {
        body: await readBody(command.input.Body),
        contentType: command.input.ContentType ?? 'binary/octet-stream',
        lastModified: new Date('2024-06-01T00:00:00.000Z'),
      });
      return { ETag: `"${md5(this.get(command.input.Key ?? '').body)}"` };
    }

    if (command instanceof HeadBucketCommand) {
      this.sent.push('head bucket');
      return {};
    }

    throw new Error('unsupported command');
  };

  private get(key: string): FakeS3Object {
    const object = this.objects.get(key);
    if (!object) {
      throw notFound();
    }
    return object;
  }
}
