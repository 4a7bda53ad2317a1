import { errorDetails } from '../errors/migration.errors';
import { ObjectRef, PipelineReport } from '../types/migration.interface';
import { logger } from '../utils/logger';
import { untilAborted } from './cancellation';
import { Stage } from './stage';

export interface PipelineOptions {
  signal?: AbortSignal;
}

export class Pipeline {
  private items: AsyncIterable<ObjectRef>;
  private readonly stages: Stage[] = [];
  private readonly signal?: AbortSignal;

  constructor(source: AsyncIterable<ObjectRef>, stages: Stage[] = [], options: PipelineOptions = {}) {
    this.signal = options.signal;
    this.items = untilAborted(source, options.signal);
    for (const stage of stages) {
      this.add(stage);
    }
  }

  add(stage: Stage): this {
    this.stages.push(stage);
    this.items = stage.apply(this.items);
    return this;
  }

  getStages(): readonly Stage[] {
    return this.stages;
  }

  /** Drains the chain; all useful work happens as stage side effects. */
  async run(): Promise<PipelineReport> {
    const startedAt = Date.now();
    let failure: Error | undefined;

    try {
      for await (const _item of this.items) {
        // drain
      }
    } catch (error) {
      failure = error instanceof Error ? error : new Error(String(error));
      logger.error('Pipeline stopped early:', errorDetails(error));
    }

    const elapsedMs = Date.now() - startedAt;
    const cancelled = this.signal?.aborted ?? false;

    logger.info(`Pipeline finished in ${(elapsedMs / 1000).toFixed(2)}s`, {
      cancelled,
      stages: this.stages.map((stage) => ({ stage: stage.name, ...stage.getStats() })),
    });

    return failure ? { elapsedMs, cancelled, error: failure } : { elapsedMs, cancelled };
  }
}
