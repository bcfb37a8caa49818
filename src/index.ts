import { createProgram } from './program.js';
import { handleError } from './errors.js';

// Global error handling
process.on('uncaughtException', handleError);
process.on('unhandledRejection', (reason) => {
  handleError(reason instanceof Error ? reason : new Error(String(reason)));
});

createProgram().parseAsync(process.argv).catch(handleError);
