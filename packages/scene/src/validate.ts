/**
 * Runtime Invariant Validation
 *
 * Validates a scene snapshot against the schema and against the
 * cross-record invariants the schema cannot express.
 */

import { SceneDocumentError } from './errors.js';
import { SceneSnapshotSchema, type SceneSnapshot } from './schema.js';
import type { SceneDocument } from './yjs.js';

// ============================================================================
// Validation Result
// ============================================================================

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

// ============================================================================
// Zod Schema Validation
// ============================================================================

/**
 * Validate a snapshot against the Zod schema
 */
export function validateSchema(snapshot: unknown): ValidationResult {
  const result = SceneSnapshotSchema.safeParse(snapshot);

  if (result.success) {
    return { ok: true, errors: [] };
  }

  const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return { ok: false, errors };
}

// ============================================================================
// Runtime Invariants
// ============================================================================

/**
 * Validate all runtime invariants on a parsed snapshot
 */
export function validateInvariants(snapshot: SceneSnapshot): ValidationResult {
  const errors: string[] = [];

  validateIdentityConsistency(snapshot, errors);
  validateOrderAgreement(snapshot, errors);
  validateUniqueNames(snapshot, errors);
  validateResourceRefs(snapshot, errors);

  return {
    ok: errors.length === 0,
    errors,
  };
}

/**
 * Map key vs record.id
 */
function validateIdentityConsistency(snapshot: SceneSnapshot, errors: string[]): void {
  for (const [key, obj] of Object.entries(snapshot.objects)) {
    if (obj.id !== key) {
      errors.push(`Identity mismatch: objects key '${key}' != object.id '${obj.id}'`);
    }
  }
}

/**
 * objectOrder and objects agree in both directions
 */
function validateOrderAgreement(snapshot: SceneSnapshot, errors: string[]): void {
  const seen = new Set<string>();
  for (const id of snapshot.objectOrder) {
    if (seen.has(id)) {
      errors.push(`objectOrder lists '${id}' twice`);
    }
    seen.add(id);
    if (!(id in snapshot.objects)) {
      errors.push(`objectOrder references missing object '${id}'`);
    }
  }
  for (const id of Object.keys(snapshot.objects)) {
    if (!seen.has(id)) {
      errors.push(`Object '${id}' is missing from objectOrder`);
    }
  }
}

function validateUniqueNames(snapshot: SceneSnapshot, errors: string[]): void {
  const names = new Map<string, string>();
  for (const obj of Object.values(snapshot.objects)) {
    const other = names.get(obj.name);
    if (other !== undefined) {
      errors.push(`Objects '${other}' and '${obj.id}' share the name '${obj.name}'`);
    }
    names.set(obj.name, obj.id);
  }
}

/**
 * Data and parent references point at existing records
 */
function validateResourceRefs(snapshot: SceneSnapshot, errors: string[]): void {
  const objectNames = new Set(Object.values(snapshot.objects).map((obj) => obj.name));

  for (const obj of Object.values(snapshot.objects)) {
    switch (obj.type) {
      case 'curve':
      case 'surface':
        if (obj.data !== null && !(obj.data in snapshot.curves)) {
          errors.push(`Object '${obj.name}' uses missing curve data '${obj.data}'`);
        }
        break;
      case 'mesh':
        if (obj.data !== null && !(obj.data in snapshot.meshes)) {
          errors.push(`Object '${obj.name}' uses missing mesh '${obj.data}'`);
        }
        if (obj.parent !== null && !objectNames.has(obj.parent)) {
          errors.push(`Object '${obj.name}' has missing parent '${obj.parent}'`);
        }
        break;
      case 'empty':
        break;
    }
  }
}

// ============================================================================
// Document Validation
// ============================================================================

/**
 * Validate a live document: schema first, invariants only if that passes
 */
export function validateDocument(doc: SceneDocument): ValidationResult {
  const parsed = SceneSnapshotSchema.safeParse(doc.root.toJSON());
  if (!parsed.success) {
    return { ok: false, errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) };
  }
  return validateInvariants(parsed.data);
}

/**
 * @throws SceneDocumentError listing every problem found
 */
export function assertValidDocument(doc: SceneDocument): void {
  const result = validateDocument(doc);
  if (!result.ok) {
    throw new SceneDocumentError(result.errors);
  }
}
