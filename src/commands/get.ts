import { Command } from 'commander';
import { logger, maskSecret, c } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { loadDatabase } from '../lib/storage.js';
import { formatTimestamp } from '../lib/time.js';
import type { GetOptions, GlobalOptions } from '../types.js';

export const runGet = async (service: string, options: GetOptions & GlobalOptions): Promise<void> => {
  const { databasePath, config } = await resolveContext(options);
  const database = await loadDatabase(databasePath);
  const entry = database.getEntry(service);

  const reveal = options.reveal || config.display.revealSecrets;
  const dateFormat = config.display.dateFormat;

  logger.heading('Credential found:');
  logger.field('Service', entry.service);
  logger.field('Account', entry.account);
  logger.field('Secret', reveal ? entry.secret : c.muted(maskSecret(entry.secret)));
  logger.field('Created', formatTimestamp(entry.createdAt, dateFormat));
  logger.field('Updated', formatTimestamp(entry.updatedAt, dateFormat));
};

export const getCommand = new Command('get')
  .description('Show a stored credential')
  .argument('<service>', 'Service name')
  .option('-r, --reveal', 'Always print the secret, even when display.revealSecrets is false')
  .action(async (service: string, _options: GetOptions, command: Command) => {
    await runGet(service, command.optsWithGlobals<GetOptions & GlobalOptions>());
  });
