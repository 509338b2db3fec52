/**
 * Parametric source data model
 *
 * Everything about a curve/surface that can influence its tessellated shape:
 * curve-level settings, splines with their control points, and the
 * modifier stack. The host owns these values; the engine only reads them.
 */

import type { Vec3, Vec4 } from '../num/vec3.js';

export type SplineKind = 'bezier' | 'nurbs' | 'poly' | 'surface';

export type CurveDimensions = '2D' | '3D';

/**
 * Curve-level tessellation settings
 */
export interface CurveSettings {
  dimensions: CurveDimensions;
  resolutionU: number;
  resolutionV: number;
  renderResolutionU: number;
  renderResolutionV: number;
  bevelDepth: number;
  bevelResolution: number;
  extrude: number;
  offset: number;
  twistSmooth: number;
  useFillCaps: boolean;
  useFillDeform: boolean;
}

/**
 * Bezier control point with both handles
 */
export interface BezierPoint {
  handleLeft: Vec3;
  co: Vec3;
  handleRight: Vec3;
  tilt: number;
  radius: number;
}

/**
 * NURBS/poly/surface control point; `co` carries the weight as 4th component
 */
export interface ControlPoint {
  co: Vec3 | Vec4;
  tilt: number;
  radius: number;
}

/**
 * Flags shared by every spline kind
 */
export interface SplineFlags {
  cyclicU: boolean;
  cyclicV: boolean;
  orderU: number;
  orderV: number;
  resolutionU: number;
  resolutionV: number;
}

export interface BezierSpline extends SplineFlags {
  kind: 'bezier';
  bezierPoints: BezierPoint[];
}

export interface PointSpline extends SplineFlags {
  kind: 'nurbs' | 'poly';
  points: ControlPoint[];
}

export interface SurfaceSpline extends SplineFlags {
  kind: 'surface';
  /** Control net, one array per row in U */
  rows: ControlPoint[][];
}

export type Spline = BezierSpline | PointSpline | SurfaceSpline;

/**
 * Shared curve-data resource. Several source objects may use the same one.
 */
export interface CurveData {
  name: string;
  settings: CurveSettings;
  splines: Spline[];
}

/**
 * Reference to another scene entity, by its stable name
 */
export interface EntityRef {
  name: string;
}

export type ParamValue =
  | boolean
  | number
  | string
  | number[]
  | EntityRef
  | EntityRef[]
  | null;

/**
 * One entry of a source's modifier stack
 */
export interface Modifier {
  kind: string;
  /** User-facing label; not shape relevant */
  name: string;
  showViewport: boolean;
  showRender: boolean;
  params: Record<string, ParamValue>;
}

/**
 * Default curve-level settings for a freshly created curve
 */
export function defaultCurveSettings(): CurveSettings {
  return {
    dimensions: '3D',
    resolutionU: 12,
    resolutionV: 12,
    renderResolutionU: 0,
    renderResolutionV: 0,
    bevelDepth: 0,
    bevelResolution: 4,
    extrude: 0,
    offset: 0,
    twistSmooth: 0,
    useFillCaps: false,
    useFillDeform: false,
  };
}

/**
 * Default spline flags for a spline of the given kind
 */
export function defaultSplineFlags(kind: SplineKind): SplineFlags {
  return {
    cyclicU: false,
    cyclicV: false,
    orderU: kind === 'poly' ? 2 : 4,
    orderV: kind === 'surface' ? 4 : 2,
    resolutionU: 12,
    resolutionV: 12,
  };
}
