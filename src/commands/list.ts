import { Command } from 'commander';
import { logger, formatCount, c } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { loadDatabase } from '../lib/storage.js';
import { CredentialsNotStoredError } from '../errors.js';
import type { GlobalOptions } from '../types.js';

export const runList = async (options: GlobalOptions): Promise<void> => {
  const { databasePath } = await resolveContext(options);
  const database = await loadDatabase(databasePath);
  const services = database.listServices();

  if (services.length === 0) {
    throw new CredentialsNotStoredError();
  }

  logger.heading(`Stored credentials (${formatCount(services.length, 'entry', 'entries')}):`);
  services.forEach((service, index) => {
    console.log(`  ${c.muted(`${index + 1}.`)} ${service}`);
  });
};

export const listCommand = new Command('list')
  .description('List stored services')
  .action(async (_options: GlobalOptions, command: Command) => {
    await runList(command.optsWithGlobals<GlobalOptions>());
  });
