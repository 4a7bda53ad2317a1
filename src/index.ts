#!/usr/bin/env node
import dotenv from 'dotenv';
import { buildProgram } from './cli';
import { CliOptions, loadMigrationConfig } from './config/migration.config';
import { RunCancelledError, errorDetails } from './errors/migration.errors';
import { MigrationService } from './services/migration.service';
import { createObjectStores } from './services/object-store.factory';
import { logger } from './utils/logger';

dotenv.config();

async function main() {
  const program = buildProgram().parse(process.argv);
  const config = loadMigrationConfig(program.opts<CliOptions>());

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, finishing the current object (press Ctrl+C again to exit now)');
    controller.abort();
  });

  const { source, destination } = createObjectStores(config);

  logger.info('Starting migration with configuration:', {
    sourceBucket: config.source.bucket,
    sourceEndpoint: config.source.endpoint,
    destinationType: config.destination.kind,
    destination: destination.location,
  });

  const migrationService = new MigrationService();

  try {
    const summary = await migrationService.migrate(
      {
        source,
        destination,
        discovery: config.discovery,
        preload: config.preload,
        createDestination: config.createDestination,
        exclude: config.exclude,
        knownFolders: config.knownFolders,
      },
      controller.signal
    );

    logger.info('Migration completed', { summary });
    console.table(summary);

    if (summary.error) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof RunCancelledError) {
      logger.warn('Migration cancelled before any object was processed');
      return;
    }
    logger.error('Migration failed:', errorDetails(error));
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Migration failed:', errorDetails(error));
  process.exit(1);
});
