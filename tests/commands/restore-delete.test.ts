import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { vol } from 'memfs';

vi.mock('../../src/ui/prompts.js', () => ({
  prompts: {
    intro: vi.fn(),
    outro: vi.fn(),
    confirm: vi.fn(),
    text: vi.fn(),
    password: vi.fn(),
    confirmedPassword: vi.fn(),
    note: vi.fn(),
    cancel: vi.fn(),
    log: { info: vi.fn(), success: vi.fn(), warning: vi.fn(), error: vi.fn(), message: vi.fn() },
  },
}));

vi.mock('../../src/lib/config.js', () => ({
  loadConfig: vi.fn(),
  clearConfigCache: vi.fn(),
}));

import { runRestore, resolveBackupPath } from '../../src/commands/restore.js';
import { runDelete } from '../../src/commands/delete.js';
import { prompts } from '../../src/ui/prompts.js';
import { loadConfig } from '../../src/lib/config.js';
import { loadDatabase } from '../../src/lib/storage.js';
import { defaultConfig } from '../../src/schemas/config.schema.js';
import { BackupNotFoundError, DatabaseNotFoundError, DeserializationError } from '../../src/errors.js';
import {
  TEST_CRAB_DIR,
  TEST_DB_PATH,
  captureOutput,
  listDir,
  writeRawFile,
  writeTestDatabase,
} from '../utils/testHelpers.js';
import { createMockDatabaseFile, createMockRecord } from '../utils/factories.js';

const NOW = new Date('2026-05-20T09:15:00.000Z');
const NOW_SECONDS = Math.floor(NOW.getTime() / 1000);
const BACKUP_PATH = `${TEST_CRAB_DIR}/credentials_100.json.bak`;

describe('resolveBackupPath', () => {
  it('resolves a bare name beside the database', () => {
    expect(resolveBackupPath(TEST_DB_PATH, 'credentials_100.json.bak')).toBe(BACKUP_PATH);
  });

  it('keeps absolute paths and expands ~', () => {
    expect(resolveBackupPath(TEST_DB_PATH, '/tmp/old.json')).toBe('/tmp/old.json');
    expect(resolveBackupPath(TEST_DB_PATH, '~/saved/old.json')).toBe('/test-home/saved/old.json');
  });
});

describe('restore command', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    vi.mocked(loadConfig).mockResolvedValue(defaultConfig);
    writeTestDatabase([createMockRecord({ service: 'current' })]);
    writeRawFile(
      BACKUP_PATH,
      JSON.stringify(createMockDatabaseFile([createMockRecord({ service: 'restored' })]))
    );
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('replaces the database and keeps a safety backup of the current one', async () => {
    const current = vol.readFileSync(TEST_DB_PATH, 'utf-8');
    const output = captureOutput();

    await runRestore('credentials_100.json.bak', { yes: true });

    expect((await loadDatabase(TEST_DB_PATH)).listServices()).toEqual(['restored']);
    const safetyPath = `${TEST_CRAB_DIR}/credentials_${NOW_SECONDS}.json.bak`;
    expect(vol.readFileSync(safetyPath, 'utf-8')).toBe(current);
    expect(output.lines()).toEqual([
      `ℹ Previous database saved to ~/.crab/credentials_${NOW_SECONDS}.json.bak`,
      '✓ Restored 1 entry from ~/.crab/credentials_100.json.bak',
    ]);
  });

  it('skips the safety backup when backup.beforeRestore is off', async () => {
    vi.mocked(loadConfig).mockResolvedValue({
      ...defaultConfig,
      backup: { beforeDelete: true, beforeRestore: false },
    });
    captureOutput();

    await runRestore('credentials_100.json.bak', { yes: true });

    expect(listDir(TEST_CRAB_DIR)).toEqual(['credentials.json', 'credentials_100.json.bak']);
  });

  it('does nothing when the confirmation is declined', async () => {
    const before = vol.readFileSync(TEST_DB_PATH, 'utf-8');
    vi.mocked(prompts.confirm).mockResolvedValueOnce(false);

    await runRestore('credentials_100.json.bak', {});

    expect(prompts.cancel).toHaveBeenCalledWith('Operation cancelled');
    expect(vol.readFileSync(TEST_DB_PATH, 'utf-8')).toBe(before);
  });

  it('rejects a missing backup', async () => {
    await expect(runRestore('credentials_999.json.bak', { yes: true })).rejects.toThrow(
      BackupNotFoundError
    );
  });

  it('rejects a corrupt backup without touching the database', async () => {
    const before = vol.readFileSync(TEST_DB_PATH, 'utf-8');
    writeRawFile(BACKUP_PATH, '{ not json');

    await expect(runRestore('credentials_100.json.bak', { yes: true })).rejects.toThrow(
      DeserializationError
    );
    expect(vol.readFileSync(TEST_DB_PATH, 'utf-8')).toBe(before);
  });
});

describe('delete command', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    vi.mocked(loadConfig).mockResolvedValue(defaultConfig);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('backs up and deletes with --yes when backup.beforeDelete is on', async () => {
    writeTestDatabase([createMockRecord()]);
    captureOutput();

    await runDelete({ yes: true });

    expect(listDir(TEST_CRAB_DIR)).toEqual([`credentials_${NOW_SECONDS}.json.bak`]);
  });

  it('deletes without a backup when --no-backup is given', async () => {
    writeTestDatabase([createMockRecord()]);
    captureOutput();

    await runDelete({ yes: true, backup: false });

    expect(listDir(TEST_CRAB_DIR)).toEqual([]);
  });

  it('asks about the backup interactively, defaulting to the config value', async () => {
    writeTestDatabase([createMockRecord()]);
    vi.mocked(prompts.confirm).mockResolvedValueOnce(true).mockResolvedValueOnce(false);
    captureOutput();

    await runDelete({});

    expect(prompts.confirm).toHaveBeenNthCalledWith(2, 'Create a backup before deletion?', true);
    expect(listDir(TEST_CRAB_DIR)).toEqual([]);
  });

  it('keeps the database when the confirmation is declined', async () => {
    writeTestDatabase([createMockRecord()]);
    vi.mocked(prompts.confirm).mockResolvedValueOnce(false);
    captureOutput();

    await runDelete({});

    expect(prompts.cancel).toHaveBeenCalledWith('Operation cancelled');
    expect(vol.existsSync(TEST_DB_PATH)).toBe(true);
  });

  it('can delete a corrupted database', async () => {
    writeRawFile(TEST_DB_PATH, '{ broken');
    const output = captureOutput();

    await runDelete({ yes: true, backup: false });

    expect(vol.existsSync(TEST_DB_PATH)).toBe(false);
    expect(output.lines()).toContain('⚠ Current database could not be read; it may be corrupted');
  });

  it('throws DatabaseNotFoundError when there is nothing to delete', async () => {
    await expect(runDelete({ yes: true })).rejects.toThrow(DatabaseNotFoundError);
  });
});
