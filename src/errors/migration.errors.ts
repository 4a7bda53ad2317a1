export class MigrationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fatal: raised before the pipeline starts. */
export class SetupError extends MigrationError {}

export class StoreError extends MigrationError {
  constructor(
    message: string,
    readonly operation: string,
    readonly target: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }

  static wrap(operation: string, target: string, error: unknown): StoreError {
    if (error instanceof StoreError) {
      return error;
    }
    const { error: message } = errorDetails(error);
    return new StoreError(`${operation} ${target}: ${message}`, operation, target, { cause: error });
  }
}

/** An expected per-item outcome; the item is dropped without counting as a failure. */
export class ItemSkippedError extends MigrationError {}

export class FilterSkipError extends ItemSkippedError {
  constructor(readonly filterName: string) {
    super(`by ${filterName} filter.`);
  }
}

export class AlreadyExistsError extends ItemSkippedError {
  constructor(readonly key: string) {
    super('File already exists');
  }
}

export class RunCancelledError extends MigrationError {}

export function errorDetails(error: unknown): { error: string; name: string } {
  return {
    error: error instanceof Error ? error.message : 'Unknown error',
    name: error instanceof Error ? error.name : 'UnknownError',
  };
}
