import * as p from '@clack/prompts';
import chalk from 'chalk';
import { UserCancelledError } from '../errors.js';

/**
 * Thin wrapper over @clack/prompts. An interrupted prompt (Ctrl+C / Esc)
 * throws UserCancelledError so nothing after it touches the database.
 */
export const prompts = {
  intro: (title: string): void => {
    p.intro(chalk.bgCyan(chalk.black(` ${title} `)));
  },

  outro: (message: string): void => {
    p.outro(chalk.green(message));
  },

  confirm: async (message: string, initial = false): Promise<boolean> => {
    const result = await p.confirm({ message, initialValue: initial });
    if (p.isCancel(result)) {
      throw new UserCancelledError();
    }
    return result;
  },

  text: async (
    message: string,
    options?: {
      placeholder?: string;
      defaultValue?: string;
      initialValue?: string;
      validate?: (value: string | undefined) => string | undefined;
    }
  ): Promise<string> => {
    const result = await p.text({
      message,
      placeholder: options?.placeholder,
      defaultValue: options?.defaultValue,
      initialValue: options?.initialValue,
      validate: options?.validate,
    });
    if (p.isCancel(result)) {
      throw new UserCancelledError();
    }
    return result;
  },

  password: async (
    message: string,
    options?: { validate?: (value: string | undefined) => string | undefined }
  ): Promise<string> => {
    const result = await p.password({ message, validate: options?.validate });
    if (p.isCancel(result)) {
      throw new UserCancelledError();
    }
    return result;
  },

  /**
   * Ask for a secret twice; repeat until both entries match
   */
  confirmedPassword: async (message: string, confirmMessage = 'Confirm secret'): Promise<string> => {
    for (;;) {
      const first = await prompts.password(message);
      const second = await prompts.password(confirmMessage);
      if (first === second) {
        return first;
      }
      p.log.error("Secrets don't match");
    }
  },

  note: (message: string, title?: string): void => {
    p.note(message, title);
  },

  cancel: (message = 'Operation cancelled'): void => {
    p.cancel(message);
  },

  log: {
    info: (message: string): void => {
      p.log.info(message);
    },
    success: (message: string): void => {
      p.log.success(message);
    },
    warning: (message: string): void => {
      p.log.warning(message);
    },
    error: (message: string): void => {
      p.log.error(message);
    },
    message: (message: string): void => {
      p.log.message(message);
    },
  },
};
