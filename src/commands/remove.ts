import { Command } from 'commander';
import { prompts, logger } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { loadDatabase, saveDatabase } from '../lib/storage.js';
import type { GlobalOptions, RemoveOptions } from '../types.js';

export const runRemove = async (
  service: string,
  options: RemoveOptions & GlobalOptions
): Promise<void> => {
  const { databasePath } = await resolveContext(options);
  const database = await loadDatabase(databasePath);

  // Throws CredentialNotFoundError before asking anything
  database.getEntry(service);

  const confirmed =
    options.yes || (await prompts.confirm(`Are you sure you want to remove '${service}'?`));
  if (!confirmed) {
    prompts.cancel('Operation cancelled');
    return;
  }

  if (database.removeEntry(service)) {
    await saveDatabase(databasePath, database);
    logger.success(`Credential for '${service}' removed successfully!`);
  }
};

export const removeCommand = new Command('remove')
  .description('Remove a stored credential')
  .argument('<service>', 'Service name')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (service: string, _options: RemoveOptions, command: Command) => {
    await runRemove(service, command.optsWithGlobals<RemoveOptions & GlobalOptions>());
  });
