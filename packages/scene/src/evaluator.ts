/**
 * Control-net evaluator
 *
 * A small tessellator for hosts that have no curve evaluation of their own.
 * Bezier splines are sampled at their resolution; NURBS and poly splines
 * follow their control polygon; surfaces are triangulated over their
 * control net. A non-zero `extrude` turns curves into ribbons along Z.
 *
 * Only the array and triangulate modifiers are applied. Any other visible
 * modifier makes evaluation fail when modifiers are requested.
 */

import {
  add3,
  createMesh,
  cross3,
  mul3,
  normalize3,
  projectHomogeneous,
  sub3,
  type BezierSpline,
  type ControlPoint,
  type CurveData,
  type EvaluateOptions,
  type EvaluationService,
  type MeshArtifact,
  type Modifier,
  type ParamValue,
  type PointSpline,
  type SourceObject,
  type SurfaceSpline,
  type Vec3,
} from '@curvelink/core';

export interface Sample {
  co: Vec3;
  tilt: number;
  radius: number;
}

export class UnsupportedModifierError extends Error {
  constructor(readonly modifier: Modifier) {
    super(`Cannot evaluate modifier '${modifier.name}' (${modifier.kind})`);
    this.name = 'UnsupportedModifierError';
  }
}

export class ControlNetEvaluator implements EvaluationService {
  evaluate(source: SourceObject, options: EvaluateOptions): MeshArtifact {
    const builder = new MeshBuilder();
    if (source.data !== null) {
      addCurveData(builder, source.data);
    }
    if (options.applyModifiers) {
      for (const modifier of source.modifiers) {
        if (modifier.showViewport) {
          applyModifier(builder, modifier);
        }
      }
    }
    return builder.build(options.preserveAllDataLayers);
  }
}

// ============================================================================
// Mesh assembly
// ============================================================================

class MeshBuilder {
  positions: number[] = [];
  indices: number[] = [];
  tilt: number[] = [];
  radius: number[] = [];

  get vertexCount(): number {
    return this.positions.length / 3;
  }

  addVertex(sample: Sample): number {
    this.positions.push(sample.co[0], sample.co[1], sample.co[2]);
    this.tilt.push(sample.tilt);
    this.radius.push(sample.radius);
    return this.vertexCount - 1;
  }

  /**
   * Two triangles a-b-c and a-c-d
   */
  addQuad(a: number, b: number, c: number, d: number): void {
    this.indices.push(a, b, c, a, c, d);
  }

  position(index: number): Vec3 {
    return [this.positions[index * 3], this.positions[index * 3 + 1], this.positions[index * 3 + 2]];
  }

  build(preserveLayers: boolean): MeshArtifact {
    return createMesh(
      this.positions,
      this.computeNormals(),
      this.indices,
      preserveLayers ? { tilt: this.tilt, radius: this.radius } : {}
    );
  }

  /**
   * Area-weighted vertex normals; vertices without faces get a zero normal
   */
  private computeNormals(): number[] {
    const sums: Vec3[] = Array.from({ length: this.vertexCount }, () => [0, 0, 0]);
    for (let i = 0; i < this.indices.length; i += 3) {
      const [a, b, c] = [this.indices[i], this.indices[i + 1], this.indices[i + 2]];
      const pa = this.position(a);
      const face = cross3(sub3(this.position(b), pa), sub3(this.position(c), pa));
      for (const v of [a, b, c]) {
        sums[v] = add3(sums[v], face);
      }
    }
    return sums.flatMap((sum) => normalize3(sum));
  }
}

// ============================================================================
// Curve data
// ============================================================================

function addCurveData(builder: MeshBuilder, data: CurveData): void {
  for (const spline of data.splines) {
    const resolution = spline.resolutionU > 0 ? spline.resolutionU : data.settings.resolutionU;
    switch (spline.kind) {
      case 'bezier':
        addPath(builder, sampleBezier(spline, resolution), spline.cyclicU, data.settings.extrude);
        break;
      case 'nurbs':
      case 'poly':
        addPath(builder, samplePolygon(spline), spline.cyclicU, data.settings.extrude);
        break;
      case 'surface':
        addSurface(builder, spline);
        break;
    }
  }
}

function cubicBezier(p0: Vec3, p1: Vec3, p2: Vec3, p3: Vec3, t: number): Vec3 {
  const s = 1 - t;
  return add3(
    add3(mul3(p0, s * s * s), mul3(p1, 3 * s * s * t)),
    add3(mul3(p2, 3 * s * t * t), mul3(p3, t * t * t))
  );
}

export function sampleBezier(spline: BezierSpline, resolution: number): Sample[] {
  const points = spline.bezierPoints;
  if (points.length < 2) {
    return points.map((point) => ({ co: [point.co[0], point.co[1], point.co[2]], tilt: point.tilt, radius: point.radius }));
  }

  const steps = Math.max(1, Math.trunc(resolution));
  const segments = spline.cyclicU ? points.length : points.length - 1;
  const samples: Sample[] = [];
  for (let i = 0; i < segments; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    for (let k = 0; k < steps; k++) {
      const t = k / steps;
      samples.push({
        co: cubicBezier(a.co, a.handleRight, b.handleLeft, b.co, t),
        tilt: a.tilt + (b.tilt - a.tilt) * t,
        radius: a.radius + (b.radius - a.radius) * t,
      });
    }
  }
  if (!spline.cyclicU) {
    const last = points[points.length - 1];
    samples.push({ co: [last.co[0], last.co[1], last.co[2]], tilt: last.tilt, radius: last.radius });
  }
  return samples;
}

function toSample(point: ControlPoint): Sample {
  return { co: projectHomogeneous(point.co), tilt: point.tilt, radius: point.radius };
}

function samplePolygon(spline: PointSpline): Sample[] {
  return spline.points.map(toSample);
}

/**
 * Vertices along a path; with a non-zero extrude, a ribbon of quads
 * spanning [-extrude, +extrude] in Z
 */
function addPath(builder: MeshBuilder, samples: Sample[], cyclic: boolean, extrude: number): void {
  if (extrude === 0) {
    for (const sample of samples) {
      builder.addVertex(sample);
    }
    return;
  }

  const first = builder.vertexCount;
  for (const sample of samples) {
    builder.addVertex({ ...sample, co: add3(sample.co, [0, 0, -extrude]) });
    builder.addVertex({ ...sample, co: add3(sample.co, [0, 0, extrude]) });
  }
  const spans = cyclic && samples.length > 2 ? samples.length : samples.length - 1;
  for (let i = 0; i < spans; i++) {
    const j = (i + 1) % samples.length;
    builder.addQuad(first + 2 * i, first + 2 * j, first + 2 * j + 1, first + 2 * i + 1);
  }
}

/**
 * Triangulate the control net; U runs along each row, V across rows
 */
function addSurface(builder: MeshBuilder, spline: SurfaceSpline): void {
  const rows = spline.rows;
  const width = Math.min(...rows.map((row) => row.length));
  if (rows.length === 0 || width === 0) {
    return;
  }

  const first = builder.vertexCount;
  for (const row of rows) {
    for (let u = 0; u < width; u++) {
      builder.addVertex(toSample(row[u]));
    }
  }

  const at = (v: number, u: number): number => first + (v % rows.length) * width + (u % width);
  const spansU = spline.cyclicU && width > 2 ? width : width - 1;
  const spansV = spline.cyclicV && rows.length > 2 ? rows.length : rows.length - 1;
  for (let v = 0; v < spansV; v++) {
    for (let u = 0; u < spansU; u++) {
      builder.addQuad(at(v, u), at(v, u + 1), at(v + 1, u + 1), at(v + 1, u));
    }
  }
}

// ============================================================================
// Modifiers
// ============================================================================

function numberParam(params: Record<string, ParamValue>, name: string, fallback: number): number {
  const value = params[name];
  return typeof value === 'number' ? value : fallback;
}

function boolParam(params: Record<string, ParamValue>, name: string, fallback: boolean): boolean {
  const value = params[name];
  return typeof value === 'boolean' ? value : fallback;
}

function vectorParam(params: Record<string, ParamValue>, name: string, fallback: Vec3): Vec3 {
  const value = params[name];
  if (Array.isArray(value) && value.length === 3) {
    const [x, y, z] = value;
    if (typeof x === 'number' && typeof y === 'number' && typeof z === 'number') {
      return [x, y, z];
    }
  }
  return fallback;
}

function applyModifier(builder: MeshBuilder, modifier: Modifier): void {
  switch (modifier.kind) {
    case 'array':
      applyArray(builder, modifier.params);
      return;
    case 'triangulate':
      // Output is already triangles
      return;
    default:
      throw new UnsupportedModifierError(modifier);
  }
}

/**
 * Repeat the mesh `count` times, each copy shifted by the combined offset
 */
function applyArray(builder: MeshBuilder, params: Record<string, ParamValue>): void {
  const count = Math.max(1, Math.trunc(numberParam(params, 'count', 2)));
  let offset: Vec3 = [0, 0, 0];
  if (boolParam(params, 'useRelativeOffset', true)) {
    const relative = vectorParam(params, 'relativeOffsetDisplace', [1, 0, 0]);
    const size = boundsSize(builder);
    offset = add3(offset, [relative[0] * size[0], relative[1] * size[1], relative[2] * size[2]]);
  }
  if (boolParam(params, 'useConstantOffset', false)) {
    offset = add3(offset, vectorParam(params, 'constantOffsetDisplace', [0, 0, 0]));
  }

  const vertexCount = builder.vertexCount;
  const indices = [...builder.indices];
  for (let copy = 1; copy < count; copy++) {
    const shift = mul3(offset, copy);
    for (let v = 0; v < vertexCount; v++) {
      builder.addVertex({
        co: add3(builder.position(v), shift),
        tilt: builder.tilt[v],
        radius: builder.radius[v],
      });
    }
    builder.indices.push(...indices.map((index) => index + copy * vertexCount));
  }
}

function boundsSize(builder: MeshBuilder): Vec3 {
  if (builder.vertexCount === 0) {
    return [0, 0, 0];
  }
  let min = builder.position(0);
  let max = min;
  for (let v = 1; v < builder.vertexCount; v++) {
    const p = builder.position(v);
    min = [Math.min(min[0], p[0]), Math.min(min[1], p[1]), Math.min(min[2], p[2])];
    max = [Math.max(max[0], p[0]), Math.max(max[1], p[1]), Math.max(max[2], p[2])];
  }
  return sub3(max, min);
}

