/**
 * Credential database persistence
 *
 * Maps a CredentialDatabase to and from credentials.json and manages the
 * timestamped backups stored beside it. Every operation takes the resolved
 * database path, so callers decide the location once per invocation.
 *
 * Secrets are stored as plaintext JSON. The file is kept owner-only (0600)
 * inside an owner-only directory (0700); that is the only protection.
 */

import { readFile, writeFile, rename, rm, copyFile, chmod, stat, readdir } from 'fs/promises';
import { constants } from 'fs';
import { join, dirname, basename } from 'path';
import { ensureDir } from 'fs-extra';
import type { ZodError } from 'zod';
import { CredentialDatabase } from './database.js';
import { pathExists, isFile, resolveDatabasePath } from './paths.js';
import { nowSeconds } from './time.js';
import { logger } from '../ui/logger.js';
import { credentialDatabaseSchema } from '../schemas/database.schema.js';
import {
  BackupNotFoundError,
  DatabaseNotFoundError,
  DeserializationError,
  PathResolutionError,
  SerializationError,
  StorageIoError,
} from '../errors.js';
import {
  BACKUP_PREFIX,
  BACKUP_SUFFIX,
  CRAB_DIR_MODE,
  DATABASE_FILE_MODE,
} from '../constants.js';

export interface BackupResult {
  databasePath: string;
  backupPath: string;
  timestamp: number;
}

export interface BackupInfo {
  path: string;
  name: string;
  timestamp: number;
  size: number;
}

export interface DatabaseInfo {
  path: string;
  size: number;
  lastModified: Date;
}

export interface RestoreResult {
  databasePath: string;
  restoredFrom: string;
  entries: number;
  safetyBackup?: BackupResult;
}

const BACKUP_NAME_PATTERN = new RegExp(
  `^${BACKUP_PREFIX}(\\d+)(?:_(\\d+))?${BACKUP_SUFFIX.replace(/\./g, '\\.')}$`
);

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => {
  return error instanceof Error && 'code' in error;
};

const formatZodError = (error: ZodError): string => {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
};

// ============================================================================
// Serialization
// ============================================================================

/**
 * Parse file content into a database. Invalid JSON and schema violations both
 * throw DeserializationError; nothing is defaulted.
 */
export const parseDatabase = (content: string, source: string): CredentialDatabase => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new DeserializationError(
      source,
      error instanceof Error ? error.message : String(error),
      error
    );
  }

  const result = credentialDatabaseSchema.safeParse(raw);
  if (!result.success) {
    throw new DeserializationError(source, formatZodError(result.error), result.error);
  }

  return CredentialDatabase.fromJSON(result.data);
};

export const serializeDatabase = (database: CredentialDatabase): string => {
  try {
    return JSON.stringify(database.toJSON(), null, 2) + '\n';
  } catch (error) {
    throw new SerializationError(error instanceof Error ? error.message : String(error), error);
  }
};

// ============================================================================
// Permissions
// ============================================================================

const restrictFileMode = async (path: string): Promise<void> => {
  try {
    await chmod(path, DATABASE_FILE_MODE);
  } catch (error) {
    // chmod is not supported everywhere (Windows)
    logger.debug(`Could not restrict permissions on ${path}: ${String(error)}`);
  }
};

/**
 * Tighten the database file to 0600 if group or other have any access
 */
const checkFileMode = async (path: string): Promise<void> => {
  try {
    const stats = await stat(path);
    if ((stats.mode & 0o077) !== 0) {
      await chmod(path, DATABASE_FILE_MODE);
    }
  } catch (error) {
    logger.debug(`Could not check permissions on ${path}: ${String(error)}`);
  }
};

// ============================================================================
// File Operations
// ============================================================================

/**
 * Write `content` to a temp file beside `targetPath`, then rename it over the
 * target so readers never observe a partial file.
 */
const writeFileAtomic = async (targetPath: string, content: string): Promise<void> => {
  const dir = dirname(targetPath);

  try {
    await ensureDir(dir, CRAB_DIR_MODE);
  } catch (error) {
    throw new StorageIoError('create directory', dir, error);
  }

  const tempPath = join(dir, `.${basename(targetPath)}.${process.pid}.tmp`);
  try {
    await writeFile(tempPath, content, { encoding: 'utf-8', mode: DATABASE_FILE_MODE });
    await rename(tempPath, targetPath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.debug(`Could not remove temp file ${tempPath}: ${String(cleanupError)}`);
    });
    throw new StorageIoError('write', targetPath, error);
  }

  await restrictFileMode(targetPath);
};

/**
 * Whether the database file exists. Without an explicit path the default
 * location is used, and a home directory that cannot be resolved counts as
 * "no database".
 */
export const databaseExists = async (databasePath?: string): Promise<boolean> => {
  let path = databasePath;
  if (path === undefined) {
    try {
      path = resolveDatabasePath();
    } catch (error) {
      if (error instanceof PathResolutionError) {
        return false;
      }
      throw error;
    }
  }
  return isFile(path);
};

/**
 * Load the database. A missing file is an empty database, not an error.
 */
export const loadDatabase = async (databasePath: string): Promise<CredentialDatabase> => {
  if (!(await pathExists(databasePath))) {
    return new CredentialDatabase();
  }

  await checkFileMode(databasePath);

  let content: string;
  try {
    content = await readFile(databasePath, 'utf-8');
  } catch (error) {
    // Removed between the existence check and the read
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return new CredentialDatabase();
    }
    throw new StorageIoError('read', databasePath, error);
  }

  return parseDatabase(content, databasePath);
};

export const saveDatabase = async (
  databasePath: string,
  database: CredentialDatabase
): Promise<void> => {
  const content = serializeDatabase(database);
  await writeFileAtomic(databasePath, content);
  logger.debug(`Saved ${database.size} entries to ${databasePath}`);
};

export const deleteDatabase = async (databasePath: string): Promise<void> => {
  if (!(await isFile(databasePath))) {
    throw new DatabaseNotFoundError(databasePath);
  }

  try {
    await rm(databasePath);
  } catch (error) {
    throw new StorageIoError('delete', databasePath, error);
  }
};

export const getDatabaseInfo = async (databasePath: string): Promise<DatabaseInfo> => {
  try {
    const stats = await stat(databasePath);
    return {
      path: databasePath,
      size: stats.size,
      lastModified: stats.mtime,
    };
  } catch (error) {
    throw new StorageIoError('read metadata of', databasePath, error);
  }
};

// ============================================================================
// Backups
// ============================================================================

export const getBackupPath = (databasePath: string, timestamp: number, attempt = 0): string => {
  const suffix = attempt > 0 ? `_${attempt}` : '';
  return join(dirname(databasePath), `${BACKUP_PREFIX}${timestamp}${suffix}${BACKUP_SUFFIX}`);
};

/**
 * Copy the database to `credentials_<unixtime>.json.bak` beside it. Existing
 * backups are never overwritten; a second backup within the same second gets
 * a `_<n>` suffix.
 */
export const backupDatabase = async (databasePath: string): Promise<BackupResult> => {
  if (!(await isFile(databasePath))) {
    throw new DatabaseNotFoundError(databasePath);
  }

  const timestamp = nowSeconds();

  for (let attempt = 0; ; attempt++) {
    const backupPath = getBackupPath(databasePath, timestamp, attempt);
    if (await pathExists(backupPath)) {
      continue;
    }

    try {
      await copyFile(databasePath, backupPath, constants.COPYFILE_EXCL);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        continue;
      }
      throw new StorageIoError('back up', databasePath, error);
    }

    await restrictFileMode(backupPath);
    return { databasePath, backupPath, timestamp };
  }
};

/**
 * Backups beside the database, newest first
 */
export const listBackups = async (databasePath: string): Promise<BackupInfo[]> => {
  const dir = dirname(databasePath);

  if (!(await pathExists(dir))) {
    return [];
  }

  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    throw new StorageIoError('list', dir, error);
  }

  const backups: Array<BackupInfo & { attempt: number }> = [];
  for (const name of names) {
    const match = BACKUP_NAME_PATTERN.exec(name);
    if (!match) continue;

    const path = join(dir, name);
    const stats = await stat(path).catch((error: unknown) => {
      throw new StorageIoError('read metadata of', path, error);
    });
    if (!stats.isFile()) continue;

    backups.push({
      path,
      name,
      timestamp: Number(match[1]),
      attempt: match[2] ? Number(match[2]) : 0,
      size: stats.size,
    });
  }

  return backups
    .sort((a, b) => b.timestamp - a.timestamp || b.attempt - a.attempt)
    .map((backup) => ({
      path: backup.path,
      name: backup.name,
      timestamp: backup.timestamp,
      size: backup.size,
    }));
};

/**
 * Replace the database with a backup. The backup must parse as a valid
 * database; with `backupCurrent` the current file is backed up first.
 */
export const restoreBackup = async (
  databasePath: string,
  backupPath: string,
  options: { backupCurrent?: boolean } = {}
): Promise<RestoreResult> => {
  if (!(await isFile(backupPath))) {
    throw new BackupNotFoundError(backupPath);
  }

  let content: string;
  try {
    content = await readFile(backupPath, 'utf-8');
  } catch (error) {
    throw new StorageIoError('read', backupPath, error);
  }

  const restored = parseDatabase(content, backupPath);

  let safetyBackup: BackupResult | undefined;
  if (options.backupCurrent && (await isFile(databasePath))) {
    safetyBackup = await backupDatabase(databasePath);
  }

  await writeFileAtomic(databasePath, content);

  return {
    databasePath,
    restoredFrom: backupPath,
    entries: restored.size,
    safetyBackup,
  };
};
