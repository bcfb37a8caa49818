import { nowSeconds } from './time.js';
import type { CredentialRecord } from '../schemas/database.schema.js';

/**
 * A single stored credential.
 *
 * The update methods always refresh `updatedAt`, even when the new value equals
 * the old one. Callers that want "only touch on change" compare first.
 */
export class CredentialEntry {
  private constructor(
    public service: string,
    public account: string,
    public secret: string,
    public readonly createdAt: number,
    public updatedAt: number
  ) {}

  static create(service: string, account: string, secret: string): CredentialEntry {
    const now = nowSeconds();
    return new CredentialEntry(service, account, secret, now, now);
  }

  static fromRecord(record: CredentialRecord): CredentialEntry {
    return new CredentialEntry(
      record.service,
      record.account,
      record.secret,
      record.created_at,
      record.updated_at
    );
  }

  updateService(newService: string): void {
    this.service = newService;
    this.touch();
  }

  updateAccount(newAccount: string): void {
    this.account = newAccount;
    this.touch();
  }

  updateSecret(newSecret: string): void {
    this.secret = newSecret;
    this.touch();
  }

  clone(): CredentialEntry {
    return new CredentialEntry(this.service, this.account, this.secret, this.createdAt, this.updatedAt);
  }

  toRecord(): CredentialRecord {
    return {
      service: this.service,
      account: this.account,
      secret: this.secret,
      created_at: this.createdAt,
      updated_at: this.updatedAt,
    };
  }

  toJSON(): CredentialRecord {
    return this.toRecord();
  }

  // Clock skew must not push updatedAt below createdAt or backwards
  private touch(): void {
    this.updatedAt = Math.max(nowSeconds(), this.createdAt, this.updatedAt);
  }
}
