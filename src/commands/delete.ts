import { Command } from 'commander';
import { prompts, logger } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { backupDatabase, databaseExists, deleteDatabase, loadDatabase } from '../lib/storage.js';
import { collapsePath } from '../lib/paths.js';
import { DatabaseNotFoundError, DeserializationError } from '../errors.js';
import type { DeleteOptions, GlobalOptions } from '../types.js';

export const runDelete = async (options: DeleteOptions & GlobalOptions): Promise<void> => {
  const { databasePath, config } = await resolveContext(options);

  if (!(await databaseExists(databasePath))) {
    throw new DatabaseNotFoundError();
  }

  logger.warning('You are about to delete the entire database!');
  try {
    const database = await loadDatabase(databasePath);
    logger.info(`Current database contains ${database.size} ${database.size === 1 ? 'entry' : 'entries'}`);
  } catch (error) {
    // A corrupted database can still be deleted
    if (!(error instanceof DeserializationError)) {
      throw error;
    }
    logger.warning('Current database could not be read; it may be corrupted');
  }

  const confirmed =
    options.yes ||
    (await prompts.confirm(
      'Are you sure you want to delete the ENTIRE database? This cannot be undone!'
    ));
  if (!confirmed) {
    prompts.cancel('Operation cancelled');
    return;
  }

  let createBackup = options.backup;
  if (createBackup === undefined) {
    createBackup = options.yes
      ? config.backup.beforeDelete
      : await prompts.confirm('Create a backup before deletion?', config.backup.beforeDelete);
  }

  if (createBackup) {
    const backup = await backupDatabase(databasePath);
    logger.success(`Database backup created: ${collapsePath(backup.backupPath)}`);
  }

  await deleteDatabase(databasePath);
  logger.success(`Database deleted: ${collapsePath(databasePath)}`);
};

export const deleteCommand = new Command('delete')
  .description('Delete the entire database')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('--backup', 'Create a backup before deleting')
  .option('--no-backup', 'Do not create a backup before deleting')
  .action(async (_options: DeleteOptions, command: Command) => {
    await runDelete(command.optsWithGlobals<DeleteOptions & GlobalOptions>());
  });
