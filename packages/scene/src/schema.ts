/**
 * Scene document - Zod schemas
 *
 * These schemas define the persisted snapshot contract for the Yjs document.
 * Validation is performed on `root.toJSON()`, and on each record as it is
 * read back into engine types.
 */

import { z } from 'zod/v4';
import { LinkSchema } from '@curvelink/core';

// ============================================================================
// Shared Primitives
// ============================================================================

export const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);
export const Vec4Schema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const n = z.number();
export const Mat4Schema = z.tuple([n, n, n, n, n, n, n, n, n, n, n, n, n, n, n, n]);

export const InteractionModeSchema = z.enum(['object', 'edit']);

// ============================================================================
// Meta
// ============================================================================

export const SCHEMA_VERSION = 1;

export const SceneMetaSchema = z
  .object({
    schemaVersion: z.literal(SCHEMA_VERSION),
    name: z.string(),
    created: z.number(),
    modified: z.number(),
  })
  .strict();

export type SceneMeta = z.infer<typeof SceneMetaSchema>;

// ============================================================================
// Curve Data
// ============================================================================

export const CurveSettingsSchema = z
  .object({
    dimensions: z.enum(['2D', '3D']),
    resolutionU: z.number().int().min(0),
    resolutionV: z.number().int().min(0),
    renderResolutionU: z.number().int().min(0),
    renderResolutionV: z.number().int().min(0),
    bevelDepth: z.number(),
    bevelResolution: z.number().int().min(0),
    extrude: z.number(),
    offset: z.number(),
    twistSmooth: z.number(),
    useFillCaps: z.boolean(),
    useFillDeform: z.boolean(),
  })
  .strict();

export const BezierPointSchema = z
  .object({
    handleLeft: Vec3Schema,
    co: Vec3Schema,
    handleRight: Vec3Schema,
    tilt: z.number(),
    radius: z.number(),
  })
  .strict();

export const ControlPointSchema = z
  .object({
    co: z.union([Vec3Schema, Vec4Schema]),
    tilt: z.number(),
    radius: z.number(),
  })
  .strict();

const splineFlags = {
  cyclicU: z.boolean(),
  cyclicV: z.boolean(),
  orderU: z.number().int().min(1),
  orderV: z.number().int().min(1),
  resolutionU: z.number().int().min(0),
  resolutionV: z.number().int().min(0),
};

export const SplineSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('bezier'), ...splineFlags, bezierPoints: z.array(BezierPointSchema) }).strict(),
  z.object({ kind: z.literal('nurbs'), ...splineFlags, points: z.array(ControlPointSchema) }).strict(),
  z.object({ kind: z.literal('poly'), ...splineFlags, points: z.array(ControlPointSchema) }).strict(),
  z.object({ kind: z.literal('surface'), ...splineFlags, rows: z.array(z.array(ControlPointSchema)) }).strict(),
]);

/**
 * Curve-data resource as stored under `curves/<name>`; the name is the key
 */
export const CurveRecordSchema = z
  .object({
    settings: CurveSettingsSchema,
    splines: z.array(SplineSchema),
  })
  .strict();

export type CurveRecord = z.infer<typeof CurveRecordSchema>;

// ============================================================================
// Modifiers
// ============================================================================

export const EntityRefSchema = z.object({ name: z.string() }).strict();

export const ParamValueSchema = z.union([
  z.boolean(),
  z.number(),
  z.string(),
  z.array(z.number()),
  EntityRefSchema,
  z.array(EntityRefSchema),
  z.null(),
]);

export const ModifierSchema = z
  .object({
    kind: z.string().min(1),
    name: z.string(),
    showViewport: z.boolean(),
    showRender: z.boolean(),
    params: z.record(z.string(), ParamValueSchema),
  })
  .strict();

// ============================================================================
// Objects (discriminated on type)
// ============================================================================

const objectBase = {
  id: z.string().min(1),
  name: z.string().min(1),
  visible: z.boolean(),
  selected: z.boolean(),
  matrixWorld: Mat4Schema,
};

const sourceFields = {
  ...objectBase,
  /** Name of the curve-data resource */
  data: z.string().nullable(),
  modifiers: z.array(ModifierSchema),
  mode: InteractionModeSchema,
};

export const MeshObjectRecordSchema = z
  .object({
    ...objectBase,
    type: z.literal('mesh'),
    /** Name of the mesh resource */
    data: z.string().nullable(),
    link: LinkSchema.nullable(),
    parent: z.string().nullable(),
    parentInverse: Mat4Schema.nullable(),
  })
  .strict();

export const ObjectRecordSchema = z.discriminatedUnion('type', [
  z.object({ ...sourceFields, type: z.literal('curve') }).strict(),
  z.object({ ...sourceFields, type: z.literal('surface') }).strict(),
  MeshObjectRecordSchema,
  z.object({ ...objectBase, type: z.literal('empty') }).strict(),
]);

export type ObjectRecord = z.infer<typeof ObjectRecordSchema>;
export type MeshObjectRecord = z.infer<typeof MeshObjectRecordSchema>;

// ============================================================================
// Mesh Resources
// ============================================================================

export const MeshRecordSchema = z
  .object({
    positions: z.array(z.number()),
    normals: z.array(z.number()),
    indices: z.array(z.number().int().min(0)),
    layers: z.record(z.string(), z.array(z.number())),
    materials: z.array(z.string().nullable()),
  })
  .strict();

export type MeshRecord = z.infer<typeof MeshRecordSchema>;

// ============================================================================
// Full Snapshot
// ============================================================================

export const SceneSnapshotSchema = z
  .object({
    meta: SceneMetaSchema,
    objects: z.record(z.string(), ObjectRecordSchema),
    objectOrder: z.array(z.string()),
    curves: z.record(z.string(), CurveRecordSchema),
    meshes: z.record(z.string(), MeshRecordSchema),
  })
  .strict();

export type SceneSnapshot = z.infer<typeof SceneSnapshotSchema>;
