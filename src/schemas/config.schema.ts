import { z } from 'zod';

export const dateFormatSchema = z.enum(['local', 'iso']);

export const crabConfigSchema = z.object({
  backup: z
    .object({
      /** Default answer of the "backup before delete" prompt */
      beforeDelete: z.boolean().default(true),
      /** Back up the current database before restoring an older one */
      beforeRestore: z.boolean().default(true),
    })
    .default({}),

  display: z
    .object({
      /** Print secrets in `crab get`; when false they are masked unless --reveal is passed */
      revealSecrets: z.boolean().default(true),
      dateFormat: dateFormatSchema.default('local'),
    })
    .default({}),
});

export type CrabConfigInput = z.input<typeof crabConfigSchema>;
export type CrabConfigOutput = z.output<typeof crabConfigSchema>;
export type DateFormat = z.infer<typeof dateFormatSchema>;

export const defaultConfig: CrabConfigOutput = crabConfigSchema.parse({});
