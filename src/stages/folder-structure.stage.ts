import { Stage } from '../pipeline/stage';
import { ObjectRef, PipelineContext } from '../types/migration.interface';
import { logger } from '../utils/logger';
import { folderPrefixes, toFolderName } from '../utils/object-path';

export interface FolderStructureOptions {
  /** Prefixes to treat as already present, in addition to any preload. */
  knownFolders?: Iterable<string>;
}

export interface FolderStructureStats {
  created: number;
  preexisting: number;
}

/**
 * Creates the placeholder for every missing parent prefix of an item, parents
 * before children. A prefix is created at most once per run.
 *
 * With a preloaded destination state the known-set is authoritative; without
 * one, each unknown prefix is checked once against the destination.
 */
export class FolderStructureStage extends Stage {
  private known = new Set<string>();
  private created = 0;
  private preexisting = 0;

  constructor(
    private readonly context: PipelineContext,
    private readonly options: FolderStructureOptions = {}
  ) {
    super('folder-structure');
  }

  protected async beforeProcess(): Promise<void> {
    this.known = new Set();
    for (const folder of this.context.existing?.folders ?? []) {
      this.known.add(toFolderName(folder));
    }
    for (const folder of this.options.knownFolders ?? []) {
      this.known.add(toFolderName(folder));
    }
    this.created = 0;
    this.preexisting = this.known.size;

    logger.debug('Folder structure seeded', {
      destination: this.context.destination.location,
      known: this.known.size,
      preloaded: this.context.existing !== undefined,
    });
  }

  protected async process(item: ObjectRef): Promise<ObjectRef> {
    for (const prefix of folderPrefixes(item.name)) {
      if (this.known.has(prefix)) {
        continue;
      }

      if (!this.context.existing && (await this.context.destination.headMetadata(prefix)) !== null) {
        this.known.add(prefix);
        this.preexisting++;
        continue;
      }

      await this.context.destination.newPlaceholder(prefix, {});
      this.known.add(prefix);
      this.created++;
      logger.info(`${prefix}: folder created.`);
    }
    return item;
  }

  protected async afterProcess(): Promise<void> {
    logger.info('Folder structure complete', {
      destination: this.context.destination.location,
      created: this.created,
      preexisting: this.preexisting,
    });
  }

  getFolderStats(): FolderStructureStats {
    return { created: this.created, preexisting: this.preexisting };
  }
}
