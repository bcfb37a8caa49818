/**
 * In-memory credential database.
 *
 * Entries keep insertion order. Service names are unique (exact,
 * case-sensitive match): `addEntry` rejects a duplicate and `upsertEntry`
 * replaces it. Files written by older versions may still contain duplicates;
 * lookups then return the first match and `removeEntry` removes all of them.
 */

import { CredentialEntry } from './entry.js';
import { CredentialNotFoundError, DuplicateServiceError } from '../errors.js';
import { DATABASE_VERSION } from '../constants.js';
import type { CredentialDatabaseFile } from '../schemas/database.schema.js';

export type EntryMutator = (entry: CredentialEntry) => void;

export class CredentialDatabase {
  private entries: CredentialEntry[] = [];

  constructor(public version: string = DATABASE_VERSION) {}

  static fromJSON(data: CredentialDatabaseFile): CredentialDatabase {
    const database = new CredentialDatabase(data.version);
    database.entries = data.entries.map((record) => CredentialEntry.fromRecord(record));
    return database;
  }

  toJSON(): CredentialDatabaseFile {
    return {
      entries: this.entries.map((entry) => entry.toRecord()),
      version: this.version,
    };
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * Append an entry. Throws if the service is already stored.
   */
  addEntry(entry: CredentialEntry): void {
    if (this.findEntry(entry.service)) {
      throw new DuplicateServiceError(entry.service);
    }
    this.entries.push(entry);
  }

  /**
   * Insert or replace the entry for `entry.service`. A replaced entry keeps
   * its position. Returns the entry that was replaced, if any.
   */
  upsertEntry(entry: CredentialEntry): CredentialEntry | undefined {
    const index = this.indexOf(entry.service);
    if (index === -1) {
      this.entries.push(entry);
      return undefined;
    }

    const previous = this.entries[index];
    this.entries[index] = entry;
    // Drop any legacy duplicates behind the replaced one
    this.entries = this.entries.filter((e, i) => i <= index || e.service !== entry.service);
    return previous;
  }

  findEntry(service: string): CredentialEntry | undefined {
    return this.entries.find((entry) => entry.service === service);
  }

  getEntry(service: string): CredentialEntry {
    const entry = this.findEntry(service);
    if (!entry) {
      throw new CredentialNotFoundError(service);
    }
    return entry;
  }

  /**
   * Live handle to the stored entry. Changes made through it are visible to
   * later lookups. Prefer `updateEntry`, which also guards against renaming
   * onto an existing service.
   */
  editEntry(service: string): CredentialEntry | undefined {
    return this.findEntry(service);
  }

  /**
   * Apply `mutator` to a copy of the entry and store the result. The stored
   * entry is left untouched if the mutator throws or the rename collides.
   */
  updateEntry(service: string, mutator: EntryMutator): CredentialEntry {
    const index = this.indexOf(service);
    if (index === -1) {
      throw new CredentialNotFoundError(service);
    }

    const draft = this.entries[index].clone();
    mutator(draft);

    if (draft.service !== service && this.findEntry(draft.service)) {
      throw new DuplicateServiceError(draft.service);
    }

    this.entries[index] = draft;
    return draft;
  }

  removeEntry(service: string): boolean {
    const initialLength = this.entries.length;
    this.entries = this.entries.filter((entry) => entry.service !== service);
    return this.entries.length < initialLength;
  }

  listServices(): string[] {
    return this.entries.map((entry) => entry.service);
  }

  private indexOf(service: string): number {
    return this.entries.findIndex((entry) => entry.service === service);
  }
}
