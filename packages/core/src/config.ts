/**
 * Engine configuration
 */

import { z } from 'zod/v4';
import { DEFAULT_DEBOUNCE } from './link/schema.js';

export const SyncConfigSchema = z
  .object({
    /** Debounce given to newly linked targets (seconds) */
    defaultDebounce: z.number().min(0).default(DEFAULT_DEBOUNCE),
    /** Parent new mesh copies to their source so transforms follow without a rebuild */
    autoParent: z.boolean().default(true),
    /** Suffix appended to the source name when naming a new mesh copy */
    meshSuffix: z.string().min(1).default('_mesh'),
  })
  .strict();

export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type SyncConfigInput = z.input<typeof SyncConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid sync config: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and default a configuration object
 *
 * @throws ConfigError listing every issue as `path: message`
 */
export function resolveSyncConfig(input: unknown = {}): SyncConfig {
  const result = SyncConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return result.data;
}
