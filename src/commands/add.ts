import { Command } from 'commander';
import { prompts, logger } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { loadDatabase, saveDatabase } from '../lib/storage.js';
import { CredentialEntry } from '../lib/entry.js';
import type { AddOptions, GlobalOptions } from '../types.js';

export const requireValue =
  (label: string) =>
  (value: string | undefined): string | undefined => {
    return value && value.trim().length > 0 ? undefined : `${label} is required`;
  };

export const runAdd = async (options: AddOptions & GlobalOptions): Promise<void> => {
  const { databasePath } = await resolveContext(options);
  const database = await loadDatabase(databasePath);

  prompts.intro('crab add');

  const service =
    options.service ??
    (await prompts.text('Service name', {
      placeholder: 'github',
      validate: requireValue('Service name'),
    }));

  if (database.findEntry(service)) {
    prompts.log.warning(`Service '${service}' already exists!`);
    const overwrite = await prompts.confirm('Do you want to overwrite it?');
    if (!overwrite) {
      prompts.cancel('Operation cancelled');
      return;
    }
  }

  const account =
    options.account ??
    (await prompts.text('Account name', {
      validate: requireValue('Account name'),
    }));

  const secret = await prompts.confirmedPassword('Secret');

  const replaced = database.upsertEntry(CredentialEntry.create(service, account, secret));
  await saveDatabase(databasePath, database);

  prompts.outro(
    replaced
      ? `Credential for '${service}' replaced successfully!`
      : `Credential for '${service}' added successfully!`
  );
  logger.debug(`Database now holds ${database.size} entries`);
};

export const addCommand = new Command('add')
  .description('Add a new credential')
  .option('-s, --service <name>', 'Service name (prompted if omitted)')
  .option('-a, --account <name>', 'Account name (prompted if omitted)')
  .action(async (_options: AddOptions, command: Command) => {
    await runAdd(command.optsWithGlobals<AddOptions & GlobalOptions>());
  });
