import { RunCancelledError, SetupError, errorDetails } from '../errors/migration.errors';
import { ExistingState, FolderDiscoveryMode, ObjectStore } from '../types/migration.interface';
import { logger } from '../utils/logger';
import { isFolderPlaceholder, toFolderName } from '../utils/object-path';

/**
 * Lists the whole destination once so stages can answer existence questions
 * locally. There is no per-item isolation here: any failure aborts the run.
 */
export async function preloadExistingState(
  store: ObjectStore,
  discovery: FolderDiscoveryMode,
  signal?: AbortSignal
): Promise<ExistingState> {
  const state: ExistingState = { folders: new Set(), files: new Map() };
  const startedAt = Date.now();

  logger.info('Loading existing objects from destination', {
    destination: store.location,
    discovery,
  });

  try {
    for await (const ref of store.list(signal)) {
      if (signal?.aborted) {
        break;
      }
      if (isFolderPlaceholder(ref, discovery)) {
        state.folders.add(toFolderName(ref.name));
      } else {
        state.files.set(ref.name, ref.checksum);
      }
    }
  } catch (error) {
    logger.error('Error loading destination state:', {
      destination: store.location,
      ...errorDetails(error),
    });
    throw new SetupError(`Failed to preload destination state: ${errorDetails(error).error}`, {
      cause: error,
    });
  }

  if (signal?.aborted) {
    throw new RunCancelledError('Cancelled while loading destination state');
  }

  logger.info('Destination state loaded', {
    destination: store.location,
    folders: state.folders.size,
    files: state.files.size,
    elapsedMs: Date.now() - startedAt,
  });
  return state;
}
