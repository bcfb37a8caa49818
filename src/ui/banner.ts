import chalk from 'chalk';
import boxen from 'boxen';
import { boxStyles, icons } from './theme.js';

export const customHelp = (version: string): string => {
  const title = boxen(chalk.cyan.bold('crab') + chalk.dim(` v${version}`), boxStyles.header);

  const quickStart = `
${icons.key} ${chalk.bold.cyan('Quick Start:')}
  ${chalk.cyan('crab add')}             Store a new credential
  ${chalk.cyan('crab get <service>')}   Show a stored credential
  ${chalk.cyan('crab list')}            List stored services
`;

  const commands = `
${chalk.bold.cyan('Commands:')}
  ${chalk.cyan('Credentials')}
    add               Add a credential (prompts for missing values)
    get <service>     Show a credential
    list              List stored services
    edit <service>    Edit a credential
    remove <service>  Remove a credential

  ${chalk.cyan('Database')}
    info              Show database information
    backup            Create a timestamped backup
    backups           List existing backups
    restore <backup>  Restore the database from a backup
    delete            Delete the entire database
`;

  const footer = `
${chalk.dim('Global options:')} ${chalk.cyan('-d, --dir <path>')} ${chalk.dim('use another crab directory')}
${chalk.dim(`${icons.pointer} Run`)} ${chalk.cyan('crab <command> --help')} ${chalk.dim('for detailed command info')}
`;

  return `${title}\n${quickStart}${commands}${footer}`;
};
