/**
 * Record <-> engine type conversion
 *
 * Records are read back through their Zod schema, so the engine only ever
 * sees values that match its types.
 */

import type * as Y from 'yjs';
import type { z } from 'zod/v4';
import { createMesh, type CurveData, type MeshArtifact, type SceneObject } from '@curvelink/core';
import { SceneDocumentError } from './errors.js';
import {
  CurveRecordSchema,
  MeshRecordSchema,
  ObjectRecordSchema,
  type CurveRecord,
  type MeshRecord,
  type ObjectRecord,
} from './schema.js';

function parseRecord<T>(schema: z.ZodType<T>, map: Y.Map<unknown>, label: string): T {
  const result = schema.safeParse(map.toJSON());
  if (!result.success) {
    throw new SceneDocumentError(
      result.error.issues.map((issue) => `${[label, ...issue.path.map(String)].join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

export function readObjectRecord(map: Y.Map<unknown>, id: string): ObjectRecord {
  return parseRecord(ObjectRecordSchema, map, `objects.${id}`);
}

export function readCurveRecord(map: Y.Map<unknown>, name: string): CurveRecord {
  return parseRecord(CurveRecordSchema, map, `curves.${name}`);
}

export function readMeshRecord(map: Y.Map<unknown>, name: string): MeshRecord {
  return parseRecord(MeshRecordSchema, map, `meshes.${name}`);
}

/**
 * Convert an object record to the engine's view of it.
 *
 * `curve` looks up curve data by name; a source whose curve data cannot be
 * found gets `data: null`.
 */
export function toSceneObject(record: ObjectRecord, curve: (name: string) => CurveData | undefined): SceneObject {
  switch (record.type) {
    case 'curve':
    case 'surface':
      return {
        id: record.id,
        name: record.name,
        type: record.type,
        data: record.data === null ? null : (curve(record.data) ?? null),
        modifiers: record.modifiers,
        mode: record.mode,
        visible: record.visible,
        selected: record.selected,
        matrixWorld: record.matrixWorld,
      };
    case 'mesh':
      return {
        id: record.id,
        name: record.name,
        type: 'mesh',
        data: record.data,
        link: record.link,
        parent: record.parent,
        visible: record.visible,
        selected: record.selected,
        matrixWorld: record.matrixWorld,
      };
    case 'empty':
      return record;
  }
}

export function toCurveData(name: string, record: CurveRecord): CurveData {
  return { name, settings: record.settings, splines: record.splines };
}

// ============================================================================
// Mesh resources
// ============================================================================

export function artifactToRecord(artifact: MeshArtifact, materials: Array<string | null> = []): MeshRecord {
  const layers: Record<string, number[]> = {};
  for (const [name, values] of Object.entries(artifact.layers)) {
    layers[name] = Array.from(values);
  }
  return {
    positions: Array.from(artifact.positions),
    normals: Array.from(artifact.normals),
    indices: Array.from(artifact.indices),
    layers,
    materials,
  };
}

export function recordToArtifact(record: MeshRecord): MeshArtifact {
  return createMesh(record.positions, record.normals, record.indices, record.layers);
}
