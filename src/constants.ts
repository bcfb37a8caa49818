import { join, dirname } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Read version from package.json at runtime
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJsonPath = join(__dirname, '..', 'package.json');

const readVersion = (): string => {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    // Bundled builds may not ship package.json next to the entry point
    if (process.env.DEBUG) {
      console.error(`Could not read ${packageJsonPath}:`, error);
    }
  }
  return '1.0.0';
};

export const VERSION = readVersion();
export const DESCRIPTION = 'A local credential manager for storing sensitive information';
export const APP_NAME = 'crab';

export const CRAB_DIR_NAME = '.crab';
export const DATABASE_FILE = 'credentials.json';
export const DATABASE_VERSION = '1.0';

export const BACKUP_PREFIX = 'credentials_';
export const BACKUP_SUFFIX = '.json.bak';

// Owner read/write only (rw-------)
export const DATABASE_FILE_MODE = 0o600;
// Owner read/write/execute only (rwx------)
export const CRAB_DIR_MODE = 0o700;
