import { SetupError, errorDetails } from '../errors/migration.errors';
import { Filter } from '../pipeline/filter.stage';
import { Pipeline } from '../pipeline/pipeline';
import { ExistenceCheckStage } from '../stages/existence-check.stage';
import { FolderStructureStage } from '../stages/folder-structure.stage';
import { ObjectInfoStage } from '../stages/object-info.stage';
import { UploadStage } from '../stages/upload.stage';
import {
  IMigrationService,
  MigrationOptions,
  MigrationSummary,
  ObjectStore,
  PipelineContext,
} from '../types/migration.interface';
import { logger } from '../utils/logger';
import { PATH_SEPARATOR } from '../utils/object-path';
import { preloadExistingState } from './existing-state.service';

export class MigrationService implements IMigrationService {
  async migrate(options: MigrationOptions, signal?: AbortSignal): Promise<MigrationSummary> {
    const { source, destination } = options;

    logger.info('Starting migration with config:', {
      source: source.location,
      destination: destination.location,
      discovery: options.discovery,
      preload: options.preload,
      exclude: options.exclude,
    });

    await this.verifySource(source);
    await this.prepareDestination(destination, options.createDestination);

    const existing = options.preload
      ? await preloadExistingState(destination, options.discovery, signal)
      : undefined;

    const context: PipelineContext = {
      source,
      destination,
      discovery: options.discovery,
      existing,
    };

    const info = new ObjectInfoStage();
    const excludeFilters = options.exclude.map(
      (fragment) =>
        new Filter(`exclude keys containing '${fragment}'`, (item) => item.name.includes(fragment))
    );
    const folders = new FolderStructureStage(context, { knownFolders: options.knownFolders });
    const placeholderFilter = new Filter('exclude folder placeholder keys', (item) =>
      item.name.endsWith(PATH_SEPARATOR)
    );
    const existence = new ExistenceCheckStage(context);
    const upload = new UploadStage(context);

    const pipeline = new Pipeline(
      source.list(signal),
      [info, ...excludeFilters, folders, placeholderFilter, existence, upload],
      { signal }
    );
    const report = await pipeline.run();

    const uploadStats = upload.getUploadStats();
    const folderStats = folders.getFolderStats();
    const summary: MigrationSummary = {
      elapsedMs: report.elapsedMs,
      cancelled: report.cancelled,
      listed: info.getStats().processed,
      filtered: [...excludeFilters, placeholderFilter].reduce(
        (total, filter) => total + filter.getStats().skipped,
        0
      ),
      foldersCreated: folderStats.created,
      foldersExisting: folderStats.preexisting,
      skippedExisting: existence.getStats().skipped,
      uploaded: uploadStats.attempted,
      verified: uploadStats.verified,
      mismatched: uploadStats.mismatched,
      failed: pipeline.getStages().reduce((total, stage) => total + stage.getStats().failed, 0),
    };
    if (report.error) {
      summary.error = report.error.message;
    }

    return summary;
  }

  private async verifySource(source: ObjectStore): Promise<void> {
    let exists: boolean;
    try {
      exists = await source.containerExists();
    } catch (error) {
      logger.error('Error accessing source bucket:', { bucket: source.location, ...errorDetails(error) });
      throw new SetupError(`Failed to access source bucket: ${errorDetails(error).error}`, { cause: error });
    }

    if (!exists) {
      throw new SetupError(`Failed to access source bucket: ${source.location} not found`);
    }
    logger.info('Successfully connected to source bucket');
  }

  private async prepareDestination(destination: ObjectStore, create: boolean): Promise<void> {
    try {
      if (!(await destination.containerExists())) {
        if (!create) {
          throw new SetupError(
            `Failed to access destination bucket: ${destination.location} not found`
          );
        }
        await destination.createContainer();
      }
    } catch (error) {
      if (error instanceof SetupError) {
        throw error;
      }
      logger.error('Error accessing destination bucket:', {
        bucket: destination.location,
        ...errorDetails(error),
      });
      throw new SetupError(`Failed to access destination bucket: ${errorDetails(error).error}`, {
        cause: error,
      });
    }
    logger.info('Successfully connected to destination bucket');
  }
}
