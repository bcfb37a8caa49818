import { Command } from 'commander';
import { withSpinner, logger, createTable, formatBytes, formatCount, cmd } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { backupDatabase, listBackups } from '../lib/storage.js';
import { collapsePath } from '../lib/paths.js';
import { formatTimestamp } from '../lib/time.js';
import type { BackupResult } from '../lib/storage.js';
import type { GlobalOptions } from '../types.js';

export const runBackup = async (options: GlobalOptions): Promise<BackupResult> => {
  const { databasePath } = await resolveContext(options);

  return withSpinner('Creating database backup...', () => backupDatabase(databasePath), {
    successText: (result) => `Database backup created: ${collapsePath(result.backupPath)}`,
    failText: 'Backup failed',
  });
};

export const runListBackups = async (options: GlobalOptions): Promise<void> => {
  const { databasePath, config } = await resolveContext(options);
  const backups = await listBackups(databasePath);

  if (backups.length === 0) {
    logger.info('No backups found');
    logger.dim(`  Run ${cmd('crab backup')} to create one`);
    return;
  }

  logger.heading(`Backups (${formatCount(backups.length, 'file')}):`);
  console.log(
    createTable(backups, [
      { header: 'Name', value: (b) => b.name },
      { header: 'Created', value: (b) => formatTimestamp(b.timestamp, config.display.dateFormat) },
      { header: 'Size', value: (b) => formatBytes(b.size), align: 'right' },
    ])
  );
};

export const backupCommand = new Command('backup')
  .description('Create a timestamped backup of the database')
  .action(async (_options: GlobalOptions, command: Command) => {
    await runBackup(command.optsWithGlobals<GlobalOptions>());
  });

export const backupsCommand = new Command('backups')
  .description('List database backups, newest first')
  .action(async (_options: GlobalOptions, command: Command) => {
    await runListBackups(command.optsWithGlobals<GlobalOptions>());
  });
