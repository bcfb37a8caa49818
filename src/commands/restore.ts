import { Command } from 'commander';
import { isAbsolute, join, dirname } from 'path';
import { prompts, logger } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { restoreBackup } from '../lib/storage.js';
import { collapsePath, expandPath } from '../lib/paths.js';
import type { GlobalOptions, RestoreOptions } from '../types.js';

/**
 * A bare file name refers to a backup beside the database
 */
export const resolveBackupPath = (databasePath: string, backup: string): string => {
  if (isAbsolute(backup) || backup.startsWith('~') || backup.startsWith('.') || /[\\/]/.test(backup)) {
    return expandPath(backup);
  }
  return join(dirname(databasePath), backup);
};

export const runRestore = async (
  backup: string,
  options: RestoreOptions & GlobalOptions
): Promise<void> => {
  const { databasePath, config } = await resolveContext(options);
  const backupPath = resolveBackupPath(databasePath, backup);

  const confirmed =
    options.yes ||
    (await prompts.confirm(
      `Replace ${collapsePath(databasePath)} with ${collapsePath(backupPath)}?`
    ));
  if (!confirmed) {
    prompts.cancel('Operation cancelled');
    return;
  }

  const result = await restoreBackup(databasePath, backupPath, {
    backupCurrent: config.backup.beforeRestore,
  });

  if (result.safetyBackup) {
    logger.info(`Previous database saved to ${collapsePath(result.safetyBackup.backupPath)}`);
  }
  logger.success(`Restored ${result.entries} ${result.entries === 1 ? 'entry' : 'entries'} from ${collapsePath(backupPath)}`);
};

export const restoreCommand = new Command('restore')
  .description('Restore the database from a backup')
  .argument('<backup>', 'Backup file name (see `crab backups`) or path')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (backup: string, _options: RestoreOptions, command: Command) => {
    await runRestore(backup, command.optsWithGlobals<RestoreOptions & GlobalOptions>());
  });
