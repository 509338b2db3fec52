/**
 * Modifier schema table
 *
 * Which parameters of each modifier kind feed into a fingerprint, and how
 * each one is encoded. The table is a versioned JSON file, validated once
 * when this module loads; parameters are kept sorted by name so the hash
 * does not depend on declaration order.
 */

import { z } from 'zod/v4';
import rawSchema from './modifier-schema.json' with { type: 'json' };

export const ParamKindSchema = z.enum(['bool', 'int', 'float', 'enum', 'string', 'vector', 'ref', 'refs']);

export type ParamKind = z.infer<typeof ParamKindSchema>;

export const ModifierSchemaFileSchema = z
  .object({
    version: z.number().int().positive(),
    modifiers: z.record(z.string(), z.array(z.tuple([z.string().min(1), ParamKindSchema]))),
  })
  .strict();

export type ModifierSchemaFile = z.infer<typeof ModifierSchemaFileSchema>;

export interface ParamSpec {
  name: string;
  kind: ParamKind;
}

export interface ModifierSchemaTable {
  version: number;
  /** kind -> parameters sorted by name */
  kinds: ReadonlyMap<string, readonly ParamSpec[]>;
}

/**
 * Build a lookup table from a schema file.
 *
 * Throws when the file is malformed or lists a parameter twice for a kind.
 */
export function createModifierSchemaTable(file: unknown): ModifierSchemaTable {
  const parsed = ModifierSchemaFileSchema.safeParse(file);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid modifier schema: ${issues.join('; ')}`);
  }

  const kinds = new Map<string, readonly ParamSpec[]>();
  for (const [kind, params] of Object.entries(parsed.data.modifiers)) {
    const seen = new Set<string>();
    const specs: ParamSpec[] = [];
    for (const [name, paramKind] of params) {
      if (seen.has(name)) {
        throw new Error(`Invalid modifier schema: ${kind}.${name} listed twice`);
      }
      seen.add(name);
      specs.push({ name, kind: paramKind });
    }
    specs.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    kinds.set(kind, specs);
  }

  return { version: parsed.data.version, kinds };
}

/**
 * The table shipped with the package
 */
export const DEFAULT_MODIFIER_SCHEMA: ModifierSchemaTable = createModifierSchemaTable(rawSchema);
