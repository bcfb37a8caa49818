import { describe, it, expect } from 'vitest';
import { CredentialDatabase } from '../../src/lib/database.js';
import { CredentialEntry } from '../../src/lib/entry.js';
import { CredentialNotFoundError, DuplicateServiceError } from '../../src/errors.js';
import { createMockDatabaseFile, createMockRecord } from '../utils/factories.js';

const entry = (service: string, account = 'alice', secret = 'test-secret'): CredentialEntry =>
  CredentialEntry.create(service, account, secret);

describe('CredentialDatabase', () => {
  it('starts empty with the default version', () => {
    const database = new CredentialDatabase();

    expect(database.size).toBe(0);
    expect(database.isEmpty()).toBe(true);
    expect(database.version).toBe('1.0');
    expect(database.listServices()).toEqual([]);
  });

  describe('addEntry', () => {
    it('appends entries in insertion order', () => {
      const database = new CredentialDatabase();

      database.addEntry(entry('gitlab'));
      database.addEntry(entry('github'));
      database.addEntry(entry('aws'));

      expect(database.listServices()).toEqual(['gitlab', 'github', 'aws']);
      expect(database.size).toBe(3);
    });

    it('rejects a service that is already stored', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));

      expect(() => database.addEntry(entry('github', 'bob'))).toThrow(DuplicateServiceError);
      expect(database.size).toBe(1);
      expect(database.findEntry('github')?.account).toBe('alice');
    });

    it('treats service names case-sensitively', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));
      database.addEntry(entry('GitHub'));

      expect(database.listServices()).toEqual(['github', 'GitHub']);
    });
  });

  describe('upsertEntry', () => {
    it('appends when the service is absent', () => {
      const database = new CredentialDatabase();

      const replaced = database.upsertEntry(entry('github'));

      expect(replaced).toBeUndefined();
      expect(database.listServices()).toEqual(['github']);
    });

    it('replaces the existing entry in place and returns it', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));
      database.addEntry(entry('gitlab'));

      const replaced = database.upsertEntry(entry('github', 'bob', 'new-secret'));

      expect(replaced?.account).toBe('alice');
      expect(database.listServices()).toEqual(['github', 'gitlab']);
      expect(database.findEntry('github')?.account).toBe('bob');
      expect(database.findEntry('github')?.secret).toBe('new-secret');
    });

    it('collapses duplicates loaded from older files into one entry', () => {
      const database = CredentialDatabase.fromJSON(
        createMockDatabaseFile([
          createMockRecord({ service: 'github', account: 'first' }),
          createMockRecord({ service: 'aws' }),
          createMockRecord({ service: 'github', account: 'second' }),
        ])
      );

      database.upsertEntry(entry('github', 'bob'));

      expect(database.listServices()).toEqual(['github', 'aws']);
      expect(database.findEntry('github')?.account).toBe('bob');
    });
  });

  describe('findEntry / getEntry', () => {
    it('returns the matching entry or undefined', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));

      expect(database.findEntry('github')?.account).toBe('alice');
      expect(database.findEntry('gitlab')).toBeUndefined();
    });

    it('returns the first match when a legacy file holds duplicates', () => {
      const database = CredentialDatabase.fromJSON(
        createMockDatabaseFile([
          createMockRecord({ service: 'github', account: 'first' }),
          createMockRecord({ service: 'github', account: 'second' }),
        ])
      );

      expect(database.findEntry('github')?.account).toBe('first');
    });

    it('getEntry throws CredentialNotFoundError for a missing service', () => {
      const database = new CredentialDatabase();

      expect(() => database.getEntry('github')).toThrow(CredentialNotFoundError);
      expect(() => database.getEntry('github')).toThrow("No credential found for 'github'");
    });
  });

  describe('editEntry', () => {
    it('returns a live handle whose changes are visible to later lookups', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));

      const handle = database.editEntry('github');
      handle?.updateAccount('bob');

      expect(database.findEntry('github')?.account).toBe('bob');
    });

    it('returns undefined for a missing service', () => {
      expect(new CredentialDatabase().editEntry('github')).toBeUndefined();
    });
  });

  describe('updateEntry', () => {
    it('applies the mutator to a copy and stores it in the same position', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));
      database.addEntry(entry('gitlab'));
      const original = database.getEntry('github');

      const updated = database.updateEntry('github', (draft) => {
        draft.updateService('codeberg');
        draft.updateAccount('bob');
      });

      expect(updated.service).toBe('codeberg');
      expect(original.service).toBe('github');
      expect(database.listServices()).toEqual(['codeberg', 'gitlab']);
      expect(database.findEntry('codeberg')?.account).toBe('bob');
    });

    it('throws CredentialNotFoundError for a missing service', () => {
      const database = new CredentialDatabase();

      expect(() => database.updateEntry('github', () => {})).toThrow(CredentialNotFoundError);
    });

    it('rejects renaming onto another stored service and leaves the entry untouched', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));
      database.addEntry(entry('gitlab'));

      expect(() =>
        database.updateEntry('github', (draft) => {
          draft.updateService('gitlab');
        })
      ).toThrow(DuplicateServiceError);
      expect(database.listServices()).toEqual(['github', 'gitlab']);
    });

    it('leaves the stored entry untouched when the mutator throws', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));

      expect(() =>
        database.updateEntry('github', (draft) => {
          draft.updateAccount('bob');
          throw new Error('aborted');
        })
      ).toThrow('aborted');
      expect(database.getEntry('github').account).toBe('alice');
    });
  });

  describe('removeEntry', () => {
    it('returns false and keeps the count for an absent service', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));

      expect(database.removeEntry('gitlab')).toBe(false);
      expect(database.size).toBe(1);
    });

    it('returns true and decrements the count by one for a present service', () => {
      const database = new CredentialDatabase();
      database.addEntry(entry('github'));
      database.addEntry(entry('gitlab'));

      expect(database.removeEntry('github')).toBe(true);
      expect(database.size).toBe(1);
      expect(database.listServices()).toEqual(['gitlab']);
    });

    it('removes every duplicate of the service', () => {
      const database = CredentialDatabase.fromJSON(
        createMockDatabaseFile([
          createMockRecord({ service: 'github' }),
          createMockRecord({ service: 'aws' }),
          createMockRecord({ service: 'github' }),
        ])
      );

      expect(database.removeEntry('github')).toBe(true);
      expect(database.listServices()).toEqual(['aws']);
    });
  });

  describe('JSON mapping', () => {
    it('round-trips entries, order and version', () => {
      const file = createMockDatabaseFile(
        [
          createMockRecord({ service: 'gitlab', created_at: 1, updated_at: 2 }),
          createMockRecord({ service: 'github', created_at: 3, updated_at: 4 }),
        ],
        '1.1'
      );

      const database = CredentialDatabase.fromJSON(file);

      expect(database.version).toBe('1.1');
      expect(database.toJSON()).toEqual(file);
    });
  });
});
