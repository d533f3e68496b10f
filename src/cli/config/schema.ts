/* src/cli/config/schema.ts
 * Zod schema for shelf.config.* (all keys optional).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

const extensionKey = z
  .string()
  .regex(/^\.[^./\\\s]+$/, { message: 'interpreter keys look like ".py"' });

export const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict()
  .optional();
export type CliDefaults = z.infer<typeof cliDefaultsSchema>;

export const shelfConfigSchema = z
  .object({
    dataFile: z
      .string()
      .min(1, { message: 'dataFile must be a non-empty string' })
      .optional(),
    storageDir: z
      .string()
      .min(1, { message: 'storageDir must be a non-empty string' })
      .optional(),
    interpreters: z.record(extensionKey, z.string()).optional(),
    propagateExitCode: coerceBool,
    cliDefaults: cliDefaultsSchema,
  })
  .strict();
export type ShelfConfigFile = z.infer<typeof shelfConfigSchema>;
