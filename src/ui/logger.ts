import chalk from 'chalk';

export interface Logger {
  info: (msg: string) => void;
  success: (msg: string) => void;
  warning: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
  field: (label: string, value: string) => void;
  blank: () => void;
  dim: (msg: string) => void;
  heading: (msg: string) => void;
}

export const logger: Logger = {
  info: (msg: string) => {
    console.log(chalk.blue('ℹ'), msg);
  },

  success: (msg: string) => {
    console.log(chalk.green('✓'), msg);
  },

  warning: (msg: string) => {
    console.log(chalk.yellow('⚠'), msg);
  },

  error: (msg: string) => {
    console.log(chalk.red('✗'), msg);
  },

  debug: (msg: string) => {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  field: (label: string, value: string) => {
    console.log(`  ${chalk.dim(`${label}:`)} ${value}`);
  },

  blank: () => {
    console.log();
  },

  dim: (msg: string) => {
    console.log(chalk.dim(msg));
  },

  heading: (msg: string) => {
    console.log(chalk.bold.cyan(msg));
  },
};

export const formatBytes = (bytes: number): string => {
  if (bytes < 1024) return `${bytes} bytes`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
};

export const maskSecret = (secret: string): string => {
  return '•'.repeat(Math.min(Math.max(secret.length, 8), 16));
};
