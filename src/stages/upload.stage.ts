import { Stage } from '../pipeline/stage';
import { ObjectRef, PipelineContext } from '../types/migration.interface';
import { logger } from '../utils/logger';
import { DEFAULT_CONTENT_TYPE } from '../utils/object-path';

export const SOURCE_LAST_MODIFIED_META = 'source-last-modified';

export interface UploadStats {
  attempted: number;
  verified: number;
  mismatched: number;
}

/**
 * Copies each item from source to destination, then re-reads the destination
 * checksum. A mismatch is a warning only; the item still counts as attempted.
 */
export class UploadStage extends Stage {
  private uploadStats: UploadStats = { attempted: 0, verified: 0, mismatched: 0 };

  constructor(private readonly context: PipelineContext) {
    super('upload');
  }

  protected async beforeProcess(): Promise<void> {
    this.uploadStats = { attempted: 0, verified: 0, mismatched: 0 };
  }

  protected async process(item: ObjectRef): Promise<ObjectRef> {
    const { source, destination } = this.context;

    logger.debug('Getting object from source:', { key: item.name, source: source.location });
    const object = await source.getObject(item.name);
    const contentType = object.contentType || item.contentType || DEFAULT_CONTENT_TYPE;

    try {
      await destination.putObject(
        item.name,
        { body: object.body, size: object.size },
        contentType,
        { [SOURCE_LAST_MODIFIED_META]: item.lastModified.toISOString() }
      );
    } finally {
      object.body.destroy();
    }
    this.uploadStats.attempted++;
    logger.info(`Copied object: ${item.name}`, { size: object.size, contentType });

    const checksum = await destination.headMetadata(item.name);
    if (checksum !== item.checksum) {
      this.uploadStats.mismatched++;
      logger.warn('Checksum check failed.', {
        key: item.name,
        expected: item.checksum,
        actual: checksum,
      });
    } else {
      this.uploadStats.verified++;
      logger.info('Checksum check passed.', { key: item.name });
    }

    return item;
  }

  protected async afterProcess(): Promise<void> {
    logger.info('Upload complete', {
      destination: this.context.destination.location,
      ...this.uploadStats,
    });
  }

  getUploadStats(): UploadStats {
    return { ...this.uploadStats };
  }
}
