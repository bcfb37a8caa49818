/**
 * Zod schemas for the credential database file (credentials.json)
 */

import { z } from 'zod';

const timestampSchema = z.number().int().nonnegative();

/**
 * One persisted credential. Every field is required: a record missing a
 * field is a corrupted database, never something to default.
 */
export const credentialRecordSchema = z
  .object({
    service: z.string(),
    account: z.string(),
    secret: z.string(),
    created_at: timestampSchema,
    updated_at: timestampSchema,
  })
  .refine((record) => record.updated_at >= record.created_at, {
    message: 'updated_at precedes created_at',
    path: ['updated_at'],
  });

export const credentialDatabaseSchema = z.object({
  entries: z.array(credentialRecordSchema),
  version: z.string(),
});

export type CredentialRecord = z.infer<typeof credentialRecordSchema>;
export type CredentialDatabaseFile = z.infer<typeof credentialDatabaseSchema>;
