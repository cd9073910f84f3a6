#!/usr/bin/env node
/**
 * warehouse CLI
 * Server, database maintenance and feature extraction commands.
 */

import { cac } from 'cac';
import { config } from './config.js';
import { createSchema, dropSchema, closeDb, openDatabase } from './services/database.js';
import { FeatureStoreService } from './services/feature-store.js';
import {
  backupDatabase,
  listBackups,
  restoreDatabase,
} from './services/backup.js';
import { clearData, seedDatabase } from './cli/seed-database.js';
import { runDiagnostics } from './cli/diagnostics.js';
import * as logger from './cli/logger.js';

const cli = cac('warehouse');

cli.version('1.0.0');
cli.help();

/**
 * warehouse serve
 * Start the API server
 */
cli
  .command('serve', 'Start the API server')
  .option('-p, --port <port>', 'Server port', { default: config.PORT })
  .option('--host <host>', 'Bind address', { default: config.HOST })
  .action(async (options: { port: number; host: string }) => {
    logger.banner('server');
    try {
      const { startServer } = await import('./server.js');
      await startServer({ port: Number(options.port), host: options.host });
    } catch (err) {
      logger.status('fail', 'Failed to start server', logger.errorMessage(err));
      process.exit(1);
    }
  });

/**
 * warehouse init-db
 * Create missing tables; --reset drops everything first
 */
cli
  .command('init-db', 'Create database tables')
  .option('--reset', 'Drop all tables before creating them')
  .action(async (options: { reset?: boolean }) => {
    const db = openDatabase(config.DATABASE_PATH);
    const spinner = logger.spinner('Creating tables...');
    try {
      if (options.reset) {
        await dropSchema(db);
      }
      await createSchema(db);
      await new FeatureStoreService(db).init();
      spinner.succeed(`Database ready at ${config.DATABASE_PATH}`);
    } catch (err) {
      spinner.fail('Database initialization failed');
      logger.status('fail', logger.errorMessage(err));
      process.exitCode = 1;
    } finally {
      await closeDb(db);
    }
  });

/**
 * warehouse seed
 * Fill the database with sample data
 */
cli
  .command('seed', 'Seed the database with sample data')
  .option('--clear', 'Delete existing rows first')
  .option('--users <count>', 'Number of users', { default: 10 })
  .option('--seed <seed>', 'Faker seed for reproducible data')
  .action(async (options: { clear?: boolean; users: number; seed?: number }) => {
    logger.heading('Seeding database');
    logger.status('warn', 'If the server is running, stop it first to avoid SQLITE_BUSY errors.');

    const db = openDatabase(config.DATABASE_PATH);
    const spinner = logger.spinner('Generating sample data...');
    try {
      await createSchema(db);
      if (options.clear) {
        await clearData(db);
      }
      const summary = await seedDatabase(db, {
        counts: { users: Number(options.users) },
        seed: options.seed === undefined ? undefined : Number(options.seed),
      });
      spinner.succeed('Database seeding completed');

      logger.table(
        ['Entity', 'Created'],
        [
          ['Users', summary.users],
          ['Quotes', summary.quotes],
          ['Policies', summary.policies],
          ['Payments', summary.payments],
        ]
      );
    } catch (err) {
      spinner.fail('Seeding failed');
      logger.status('fail', logger.errorMessage(err));
      process.exitCode = 1;
    } finally {
      await closeDb(db);
    }
  });

/**
 * warehouse backup
 */
cli.command('backup', 'Create a timestamped backup of the database').action(async () => {
  try {
    const path = await backupDatabase(config.DATABASE_PATH, config.BACKUP_DIR, config.MAX_BACKUPS);
    logger.status('ok', `Database backed up to: ${path}`);
  } catch (err) {
    logger.status('fail', 'Backup failed', logger.errorMessage(err));
    process.exitCode = 1;
  }
});

/**
 * warehouse restore <file>
 */
cli.command('restore <file>', 'Restore the database from a backup').action(async (file: string) => {
  try {
    await restoreDatabase(file, config.DATABASE_PATH);
    logger.status('ok', `Database restored from: ${file}`);
  } catch (err) {
    logger.status('fail', 'Restore failed', logger.errorMessage(err));
    process.exitCode = 1;
  }
});

/**
 * warehouse backups
 */
cli.command('backups', 'List available backups, newest first').action(async () => {
  const backups = await listBackups(config.BACKUP_DIR);
  if (backups.length === 0) {
    logger.status('note', 'No backups found');
    return;
  }

  logger.table(
    ['#', 'File', 'Modified', 'Size (bytes)'],
    backups.map((backup, index) => [
      index + 1,
      backup.name,
      backup.modifiedAt.toISOString(),
      backup.size,
    ])
  );
});

/**
 * warehouse extract-features
 * Recompute the feature store for every entity
 */
cli.command('extract-features', 'Compute and store all features').action(async () => {
  const db = openDatabase(config.DATABASE_PATH);
  const spinner = logger.spinner('Extracting features...');
  try {
    const counts = await new FeatureStoreService(db).extractAll();
    spinner.succeed('Feature extraction completed');
    logger.table(['Feature', 'Extracted'], Object.entries(counts));
  } catch (err) {
    spinner.fail('Feature extraction failed');
    logger.status('fail', logger.errorMessage(err));
    process.exitCode = 1;
  } finally {
    await closeDb(db);
  }
});

/**
 * warehouse doctor
 * Run diagnostics
 */
cli.command('doctor', 'Run diagnostics').action(async () => {
  const healthy = await runDiagnostics(config);
  if (!healthy) {
    process.exitCode = 1;
  }
});

try {
  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
} catch (err) {
  logger.status('fail', logger.errorMessage(err));
  process.exit(1);
}
