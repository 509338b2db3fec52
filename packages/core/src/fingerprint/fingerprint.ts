/**
 * Source fingerprinting
 *
 * A deterministic digest of everything about a source that affects its
 * tessellated shape. Object name, data name, selection, visibility,
 * transform and modifier labels are not part of it.
 */

import { isSourceObject, type SceneObject } from '../host/types.js';
import type {
  ControlPoint,
  CurveData,
  CurveSettings,
  EntityRef,
  Modifier,
  ParamValue,
  Spline,
  SplineFlags,
} from '../source/types.js';
import { DEFAULT_MODIFIER_SCHEMA, type ModifierSchemaTable, type ParamKind } from './modifierSchema.js';
import { FingerprintWriter, MISMATCH_TOKEN, MISSING_TOKEN, NONE_TOKEN } from './writer.js';

type ScalarKind = 'bool' | 'int' | 'float' | 'enum';

const CURVE_FIELDS: ReadonlyArray<readonly [keyof CurveSettings, ScalarKind]> = [
  ['dimensions', 'enum'],
  ['resolutionU', 'int'],
  ['resolutionV', 'int'],
  ['renderResolutionU', 'int'],
  ['renderResolutionV', 'int'],
  ['bevelDepth', 'float'],
  ['bevelResolution', 'int'],
  ['extrude', 'float'],
  ['offset', 'float'],
  ['twistSmooth', 'float'],
  ['useFillCaps', 'bool'],
  ['useFillDeform', 'bool'],
];

const SPLINE_FIELDS: ReadonlyArray<readonly [keyof SplineFlags, ScalarKind]> = [
  ['cyclicU', 'bool'],
  ['cyclicV', 'bool'],
  ['orderU', 'int'],
  ['orderV', 'int'],
  ['resolutionU', 'int'],
  ['resolutionV', 'int'],
];

/**
 * Compute the fingerprint of a scene object.
 *
 * Returns null when the object is not a curve/surface with readable curve
 * data, or when its modifier stack holds a kind the schema table does not
 * describe. Callers must treat null as "changed".
 */
export function fingerprint(
  obj: SceneObject,
  schema: ModifierSchemaTable = DEFAULT_MODIFIER_SCHEMA
): string | null {
  if (!isSourceObject(obj) || obj.data === null) {
    return null;
  }
  if (obj.modifiers.some((modifier) => !schema.kinds.has(modifier.kind))) {
    return null;
  }

  const writer = new FingerprintWriter();
  writeCurve(writer, obj.data);
  writer.int(obj.modifiers.length);
  for (const modifier of obj.modifiers) {
    writeModifier(writer, modifier, schema);
  }
  return writer.digest();
}

// ============================================================================
// Curve data
// ============================================================================

function writeCurve(writer: FingerprintWriter, data: CurveData): void {
  for (const [field, kind] of CURVE_FIELDS) {
    writeValue(writer, kind, data.settings[field]);
  }
  writer.endRecord();

  writer.int(data.splines.length);
  for (const spline of data.splines) {
    writeSpline(writer, spline);
  }
}

function writeSpline(writer: FingerprintWriter, spline: Spline): void {
  writer.text(spline.kind);
  for (const [field, kind] of SPLINE_FIELDS) {
    writeValue(writer, kind, spline[field]);
  }

  switch (spline.kind) {
    case 'bezier':
      writer.int(spline.bezierPoints.length);
      for (const point of spline.bezierPoints) {
        writer.floats(point.handleLeft).floats(point.co).floats(point.handleRight);
        writer.float(point.tilt).float(point.radius);
      }
      break;
    case 'nurbs':
    case 'poly':
      writer.int(spline.points.length);
      for (const point of spline.points) {
        writeControlPoint(writer, point);
      }
      break;
    case 'surface':
      writer.int(spline.rows.length);
      for (const row of spline.rows) {
        writer.int(row.length);
        for (const point of row) {
          writeControlPoint(writer, point);
        }
        writer.endRecord();
      }
      break;
  }
  writer.endRecord();
}

function writeControlPoint(writer: FingerprintWriter, point: ControlPoint): void {
  // Component count is part of the stream so (x,y,z) and (x,y,z,w) differ
  writer.int(point.co.length).floats(point.co);
  writer.float(point.tilt).float(point.radius);
}

// ============================================================================
// Modifier stack
// ============================================================================

function writeModifier(writer: FingerprintWriter, modifier: Modifier, schema: ModifierSchemaTable): void {
  writer.text(modifier.kind);
  writer.bool(modifier.showViewport);
  writer.bool(modifier.showRender);

  const listed = schema.kinds.get(modifier.kind) ?? [];
  for (const param of listed) {
    writer.text(param.name);
    if (!Object.hasOwn(modifier.params, param.name)) {
      writer.text(MISSING_TOKEN);
      continue;
    }
    writeValue(writer, param.kind, modifier.params[param.name]);
  }

  // Parameters the table does not describe still count, encoded by shape
  const known = new Set(listed.map((param) => param.name));
  const extra = Object.keys(modifier.params)
    .filter((name) => !known.has(name))
    .sort();
  writer.int(extra.length);
  for (const name of extra) {
    writer.text(name);
    writeUntypedValue(writer, modifier.params[name]);
  }
  writer.endRecord();
}

function isEntityRef(value: ParamValue): value is EntityRef {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberList(value: ParamValue): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

function isRefList(value: ParamValue): value is EntityRef[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'object' && item !== null);
}

/**
 * Encode one value according to its declared kind. A value of the wrong
 * shape is written as a marker so it still hashes deterministically.
 */
function writeValue(writer: FingerprintWriter, kind: ParamKind, value: ParamValue): void {
  switch (kind) {
    case 'bool':
      if (typeof value === 'boolean') {
        writer.bool(value);
        return;
      }
      break;
    case 'int':
      if (typeof value === 'number') {
        writer.int(value);
        return;
      }
      break;
    case 'float':
      if (typeof value === 'number') {
        writer.float(value);
        return;
      }
      break;
    case 'enum':
    case 'string':
      if (typeof value === 'string') {
        writer.text(value);
        return;
      }
      break;
    case 'vector':
      if (isNumberList(value)) {
        writer.int(value.length).floats(value);
        return;
      }
      break;
    case 'ref':
      if (value === null) {
        writer.text(NONE_TOKEN);
        return;
      }
      if (isEntityRef(value)) {
        writer.text(value.name);
        return;
      }
      break;
    case 'refs':
      if (isRefList(value)) {
        writer.int(value.length);
        for (const ref of value) {
          writer.text(ref.name);
        }
        return;
      }
      break;
  }
  writer.text(MISMATCH_TOKEN);
}

/**
 * Encode a value with no declared kind. A type tag precedes the value so
 * e.g. `1`, `true` and `"1"` differ.
 */
function writeUntypedValue(writer: FingerprintWriter, value: ParamValue): void {
  if (value === null) {
    writer.text(NONE_TOKEN);
  } else if (typeof value === 'boolean') {
    writer.text('b').bool(value);
  } else if (typeof value === 'number') {
    writer.text('f').float(value);
  } else if (typeof value === 'string') {
    writer.text('s').text(value);
  } else if (isNumberList(value)) {
    writer.text('v').int(value.length).floats(value);
  } else if (isRefList(value)) {
    writer.text('r').int(value.length);
    for (const ref of value) {
      writer.text(ref.name);
    }
  } else if (isEntityRef(value)) {
    writer.text('e').text(value.name);
  } else {
    writer.text(MISMATCH_TOKEN);
  }
}
