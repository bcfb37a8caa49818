import { Command } from 'commander';
import chalk from 'chalk';
import {
  addCommand,
  getCommand,
  listCommand,
  editCommand,
  removeCommand,
  infoCommand,
  backupCommand,
  backupsCommand,
  restoreCommand,
  deleteCommand,
} from './commands/index.js';
import { VERSION, DESCRIPTION, APP_NAME } from './constants.js';
import { customHelp } from './ui/banner.js';

export const createProgram = (): Command => {
  const program = new Command();

  program
    .name(APP_NAME)
    .description(DESCRIPTION)
    .version(VERSION, '-v, --version', 'Display version number')
    .option('-d, --dir <path>', 'Directory holding credentials.json (default: ~/.crab)')
    .configureOutput({
      outputError: (str, write) => write(chalk.red(str)),
    })
    .addHelpText('beforeAll', customHelp(VERSION))
    .helpOption('-h, --help', 'Display this help message')
    .showHelpAfterError(false);

  // The banner replaces commander's generated top-level help
  program.configureHelp({
    formatHelp: (cmd, helper) => (cmd === program ? '' : helper.formatHelp(cmd, helper)),
  });

  program.addCommand(addCommand);
  program.addCommand(getCommand);
  program.addCommand(listCommand);
  program.addCommand(editCommand);
  program.addCommand(removeCommand);
  program.addCommand(infoCommand);
  program.addCommand(backupCommand);
  program.addCommand(backupsCommand);
  program.addCommand(restoreCommand);
  program.addCommand(deleteCommand);

  return program;
};
