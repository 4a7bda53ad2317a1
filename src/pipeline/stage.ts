import { ItemSkippedError, errorDetails } from '../errors/migration.errors';
import { ObjectRef, StageStats } from '../types/migration.interface';
import { logger } from '../utils/logger';

/**
 * One step of the migration pipeline.
 *
 * `apply` wraps an upstream sequence and yields each item returned by
 * `process`. A rejected `process` call drops that item only: skips are
 * logged at info level, anything else is logged as a failure and the
 * stage moves on to the next item.
 */
export abstract class Stage {
  protected stats: StageStats = { processed: 0, skipped: 0, failed: 0 };

  constructor(readonly name: string) {}

  protected async beforeProcess(): Promise<void> {}

  protected async afterProcess(): Promise<void> {}

  protected abstract process(item: ObjectRef): Promise<ObjectRef>;

  async *apply(items: AsyncIterable<ObjectRef>): AsyncGenerator<ObjectRef, void, undefined> {
    this.stats = { processed: 0, skipped: 0, failed: 0 };
    await this.beforeProcess();

    for await (const item of items) {
      let result: ObjectRef;
      try {
        result = await this.process(item);
      } catch (error) {
        this.reportFailure(item, error);
        continue;
      }
      this.stats.processed++;
      yield result;
    }

    await this.afterProcess();
  }

  getStats(): StageStats {
    return { ...this.stats };
  }

  private reportFailure(item: ObjectRef, error: unknown): void {
    if (error instanceof ItemSkippedError) {
      this.stats.skipped++;
      logger.info(`SKIPPED: ${error.message}`, { key: item.name, stage: this.name });
      return;
    }

    this.stats.failed++;
    logger.error(`Error processing object:`, {
      key: item.name,
      stage: this.name,
      ...errorDetails(error),
    });
  }
}
