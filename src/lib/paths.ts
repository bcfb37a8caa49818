import { homedir } from 'os';
import { join, isAbsolute, resolve, sep } from 'path';
import { stat, access } from 'fs/promises';
import { constants } from 'fs';
import { CRAB_DIR_NAME, DATABASE_FILE } from '../constants.js';
import { PathResolutionError } from '../errors.js';

/**
 * The OS-reported home directory. There is deliberately no fallback to
 * environment variables beyond what `os.homedir()` itself consults.
 */
export const getHomeDir = (lookup: () => string = homedir): string => {
  let home: string;
  try {
    home = lookup();
  } catch (error) {
    throw new PathResolutionError(error instanceof Error ? error.message : String(error));
  }
  if (!home) {
    throw new PathResolutionError();
  }
  return home;
};

export const expandPath = (path: string): string => {
  if (path === '~') {
    return getHomeDir();
  }
  if (path.startsWith('~/')) {
    return join(getHomeDir(), path.slice(2));
  }
  if (path.startsWith('$HOME/')) {
    return join(getHomeDir(), path.slice(6));
  }
  return isAbsolute(path) ? path : resolve(path);
};

export const collapsePath = (path: string): string => {
  let home: string;
  try {
    home = getHomeDir();
  } catch {
    return path;
  }
  if (path === home || path.startsWith(home + sep)) {
    return '~' + path.slice(home.length);
  }
  return path;
};

export const getCrabDir = (customDir?: string): string => {
  return customDir ? expandPath(customDir) : join(getHomeDir(), CRAB_DIR_NAME);
};

export const getDatabasePath = (crabDir: string): string => {
  return join(crabDir, DATABASE_FILE);
};

/**
 * Resolve `<home>/.crab/credentials.json`, or `<customDir>/credentials.json`
 */
export const resolveDatabasePath = (customDir?: string): string => {
  return getDatabasePath(getCrabDir(customDir));
};

export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
};

export const isFile = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
};
