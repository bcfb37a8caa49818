import ora, { type Ora } from 'ora';
import chalk from 'chalk';

export interface SpinnerInstance {
  start: (text?: string) => void;
  stop: () => void;
  succeed: (text?: string) => void;
  fail: (text?: string) => void;
}

export const createSpinner = (initialText?: string): SpinnerInstance => {
  const spinner: Ora = ora({
    text: initialText,
    color: 'cyan',
    spinner: 'dots',
    // Keep piped output (scripts, tests) free of control sequences
    isEnabled: Boolean(process.stdout.isTTY),
  });

  return {
    start: (text?: string) => {
      if (text) spinner.text = text;
      spinner.start();
    },
    stop: () => {
      spinner.stop();
    },
    succeed: (text?: string) => {
      spinner.succeed(text ? chalk.green(text) : undefined);
    },
    fail: (text?: string) => {
      spinner.fail(text ? chalk.red(text) : undefined);
    },
  };
};

export const withSpinner = async <T>(
  text: string,
  fn: () => Promise<T>,
  options?: {
    successText?: string | ((result: T) => string);
    failText?: string;
  }
): Promise<T> => {
  const spinner = createSpinner(text);
  spinner.start();

  try {
    const result = await fn();
    const successText =
      typeof options?.successText === 'function' ? options.successText(result) : options?.successText;
    spinner.succeed(successText || text);
    return result;
  } catch (error) {
    spinner.fail(options?.failText || text);
    throw error;
  }
};
