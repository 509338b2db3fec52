/**
 * Link record - Zod schema
 *
 * The per-target record that ties a derived mesh to its source and
 * configures how it is kept up to date. The host persists it with the
 * document; everything else the engine keeps is runtime only.
 */

import { z } from 'zod/v4';

/**
 * Weak reference to a source object.
 *
 * `id` is the host's identity for the object and is tried first; `name` is
 * the stable name fallback for when identity did not survive a reload.
 */
export const SourceRefSchema = z
  .object({
    id: z.string(),
    name: z.string().min(1),
  })
  .strict();

export type SourceRef = z.infer<typeof SourceRefSchema>;

export const DEFAULT_DEBOUNCE = 0.25;

/**
 * Clamp a debounce duration (seconds) to be non-negative
 */
export function clampDebounce(seconds: number): number {
  return Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
}

export const LinkSchema = z
  .object({
    source: SourceRefSchema.nullable().default(null),
    autoUpdate: z.boolean().default(true),
    debounce: z.number().default(DEFAULT_DEBOUNCE).transform(clampDebounce),
    applyModifiers: z.boolean().default(true),
    preserveAllDataLayers: z.boolean().default(true),
    note: z.string().default(''),
  })
  .strict();

export type Link = z.infer<typeof LinkSchema>;
export type LinkInput = z.input<typeof LinkSchema>;

/**
 * Build a link record, filling defaults and clamping the debounce
 */
export function createLink(input: LinkInput = {}): Link {
  return LinkSchema.parse(input);
}
