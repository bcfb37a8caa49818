import { Command } from 'commander';
import { logger, formatBytes, formatPath } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { databaseExists, getDatabaseInfo, loadDatabase } from '../lib/storage.js';
import { collapsePath } from '../lib/paths.js';
import { formatTimestamp } from '../lib/time.js';
import { DatabaseNotFoundError, StorageIoError } from '../errors.js';
import type { GlobalOptions } from '../types.js';

export const runInfo = async (options: GlobalOptions): Promise<void> => {
  const { databasePath, config } = await resolveContext(options);

  if (!(await databaseExists(databasePath))) {
    throw new DatabaseNotFoundError();
  }

  const database = await loadDatabase(databasePath);

  logger.heading('Database information:');
  logger.field('Version', database.version);
  logger.field('Entries', database.size.toString());

  // File metadata is informational only
  try {
    const info = await getDatabaseInfo(databasePath);
    logger.field('File size', formatBytes(info.size));
    logger.field(
      'Last modified',
      formatTimestamp(Math.floor(info.lastModified.getTime() / 1000), config.display.dateFormat)
    );
  } catch (error) {
    if (!(error instanceof StorageIoError)) {
      throw error;
    }
    logger.warning(`Failed to get file info: ${error.message}`);
  }

  logger.field('Location', formatPath(collapsePath(databasePath)));
};

export const infoCommand = new Command('info')
  .description('Show database information')
  .action(async (_options: GlobalOptions, command: Command) => {
    await runInfo(command.optsWithGlobals<GlobalOptions>());
  });
