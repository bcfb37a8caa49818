/**
 * Test helpers for sandboxed testing
 */

import { vi } from 'vitest';
import { vol } from 'memfs';
import { join } from 'path';
import type { CredentialRecord } from '../../src/schemas/database.schema.js';
import { createMockDatabaseFile } from './factories.js';

// Must match the os.homedir() mock in tests/setup.ts
export const TEST_HOME = '/test-home';
export const TEST_CRAB_DIR = '/test-home/.crab';
export const TEST_DB_PATH = '/test-home/.crab/credentials.json';

/**
 * Write a credentials.json with the given records into the test crab directory
 */
export const writeTestDatabase = (
  entries: CredentialRecord[] = [],
  options?: { dir?: string; version?: string }
): string => {
  const dir = options?.dir ?? TEST_CRAB_DIR;
  const path = join(dir, 'credentials.json');
  vol.mkdirSync(dir, { recursive: true });
  vol.writeFileSync(
    path,
    JSON.stringify(createMockDatabaseFile(entries, options?.version), null, 2)
  );
  return path;
};

export const writeRawFile = (path: string, content: string): void => {
  vol.mkdirSync(join(path, '..'), { recursive: true });
  vol.writeFileSync(path, content);
};

export const readJson = (path: string): unknown => {
  return JSON.parse(vol.readFileSync(path, 'utf-8').toString());
};

export const listDir = (dir: string): string[] => {
  return vol
    .readdirSync(dir)
    .map((name) => name.toString())
    .sort();
};

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export const stripAnsi = (text: string): string => text.replace(ANSI_PATTERN, '');

/**
 * Collect everything printed through console.log as plain text lines
 */
export const captureOutput = (): { lines: () => string[] } => {
  const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
  return {
    lines: () => spy.mock.calls.map((args) => stripAnsi(args.map(String).join(' '))),
  };
};
