/**
 * Design tokens for the crab CLI: colors, icons and small formatting helpers
 */

import chalk from 'chalk';
import figures from 'figures';

export const colors = {
  brand: chalk.cyan,
  brandBold: chalk.bold.cyan,

  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,

  muted: chalk.dim,
  bold: chalk.bold,
  highlight: chalk.bold.white,
};

export const c = colors;

export const icons = {
  pointer: figures.pointer,
  key: c.brand(figures.star),
};

/** Format a file path with brand color */
export const formatPath = (path: string): string => c.brand(path);

/** Format a count with proper pluralization: "3 entries" */
export const formatCount = (n: number, singular: string, plural?: string): string => {
  const word = n === 1 ? singular : plural || `${singular}s`;
  return `${c.bold(n.toString())} ${word}`;
};

/** Format a command suggestion */
export const cmd = (command: string): string => c.brand(`'${command}'`);

export const boxStyles = {
  header: {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: 'round' as const,
    borderColor: 'cyan' as const,
  },
};
