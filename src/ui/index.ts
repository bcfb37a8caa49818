/**
 * UI module exports for crab CLI
 */

export * from './theme.js';
export * from './banner.js';
export * from './logger.js';
export * from './prompts.js';
export * from './spinner.js';
export * from './table.js';
