import { Stage } from '../pipeline/stage';
import { ObjectRef } from '../types/migration.interface';
import { logger } from '../utils/logger';

export class ObjectInfoStage extends Stage {
  constructor() {
    super('object-info');
  }

  protected async process(item: ObjectRef): Promise<ObjectRef> {
    logger.info(`Listed object: ${item.name}`, {
      md5: item.checksum,
      size: item.size,
      lastModified: item.lastModified.toISOString(),
    });
    return item;
  }
}
