import { Command } from 'commander';
import { prompts } from '../ui/index.js';
import { resolveContext } from '../lib/context.js';
import { loadDatabase, saveDatabase } from '../lib/storage.js';
import { requireValue } from './add.js';
import type { GlobalOptions } from '../types.js';

export const runEdit = async (service: string, options: GlobalOptions): Promise<void> => {
  const { databasePath } = await resolveContext(options);
  const database = await loadDatabase(databasePath);
  const current = database.getEntry(service);

  prompts.intro('crab edit');
  prompts.note(`Service: ${current.service}\nAccount: ${current.account}`, 'Current values');

  const newService = await prompts.text('Service name', {
    initialValue: current.service,
    validate: requireValue('Service name'),
  });
  const newAccount = await prompts.text('Account', {
    initialValue: current.account,
    validate: requireValue('Account'),
  });
  const changeSecret = await prompts.confirm('Change secret?');
  const newSecret = changeSecret ? await prompts.confirmedPassword('New secret') : undefined;

  const serviceChanged = newService !== current.service;
  const accountChanged = newAccount !== current.account;

  if (!serviceChanged && !accountChanged && newSecret === undefined) {
    prompts.outro('No changes made');
    return;
  }

  // Only fields that actually changed refresh updatedAt
  database.updateEntry(service, (draft) => {
    if (serviceChanged) draft.updateService(newService);
    if (accountChanged) draft.updateAccount(newAccount);
    if (newSecret !== undefined) draft.updateSecret(newSecret);
  });

  await saveDatabase(databasePath, database);
  prompts.outro('Credential updated successfully!');
};

export const editCommand = new Command('edit')
  .description('Edit a stored credential')
  .argument('<service>', 'Service name')
  .action(async (service: string, _options: GlobalOptions, command: Command) => {
    await runEdit(service, command.optsWithGlobals<GlobalOptions>());
  });
