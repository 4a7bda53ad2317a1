import { AlreadyExistsError } from '../errors/migration.errors';
import { Stage } from '../pipeline/stage';
import { ObjectRef, PipelineContext } from '../types/migration.interface';

export class ExistenceCheckStage extends Stage {
  constructor(private readonly context: PipelineContext) {
    super('existence-check');
  }

  protected async process(item: ObjectRef): Promise<ObjectRef> {
    const checksum = await this.destinationChecksum(item.name);
    if (checksum !== null && checksum === item.checksum) {
      throw new AlreadyExistsError(item.name);
    }
    return item;
  }

  private async destinationChecksum(name: string): Promise<string | null> {
    const existing = this.context.existing;
    if (existing) {
      return existing.files.get(name) ?? null;
    }
    return this.context.destination.headMetadata(name);
  }
}
