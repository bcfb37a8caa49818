import { getCrabDir, getDatabasePath } from './paths.js';
import { loadConfig } from './config.js';
import type { CrabConfigOutput } from '../schemas/config.schema.js';
import type { GlobalOptions } from '../types.js';

/**
 * Everything a command needs to know about where it operates. Built once per
 * invocation and passed down explicitly.
 */
export interface CrabContext {
  crabDir: string;
  databasePath: string;
  config: CrabConfigOutput;
}

export const resolveContext = async (options: GlobalOptions = {}): Promise<CrabContext> => {
  const crabDir = getCrabDir(options.dir);
  const config = await loadConfig(crabDir);

  return {
    crabDir,
    databasePath: getDatabasePath(crabDir),
    config,
  };
};
