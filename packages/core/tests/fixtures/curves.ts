/**
 * Curve data builders for tests
 */

import {
  defaultCurveSettings,
  defaultSplineFlags,
  type BezierPoint,
  type BezierSpline,
  type ControlPoint,
  type CurveData,
  type Modifier,
  type PointSpline,
  type SurfaceSpline,
} from "../../src/source/types.js";
import type { Vec3, Vec4 } from "../../src/num/vec3.js";

export function bezierPoint(co: Vec3): BezierPoint {
  return {
    handleLeft: [co[0] - 1, co[1], co[2]],
    co,
    handleRight: [co[0] + 1, co[1], co[2]],
    tilt: 0,
    radius: 1,
  };
}

export function controlPoint(co: Vec3 | Vec4): ControlPoint {
  return { co, tilt: 0, radius: 1 };
}

export function bezierSpline(points: Vec3[], cyclic = false): BezierSpline {
  return {
    kind: "bezier",
    ...defaultSplineFlags("bezier"),
    cyclicU: cyclic,
    bezierPoints: points.map(bezierPoint),
  };
}

export function nurbsSpline(points: Array<Vec3 | Vec4>, cyclic = false): PointSpline {
  return {
    kind: "nurbs",
    ...defaultSplineFlags("nurbs"),
    cyclicU: cyclic,
    points: points.map(controlPoint),
  };
}

export function surfaceSpline(rows: Vec4[][]): SurfaceSpline {
  return {
    kind: "surface",
    ...defaultSplineFlags("surface"),
    rows: rows.map((row) => row.map(controlPoint)),
  };
}

/**
 * A curve with a single open Bezier spline through (1,2,3) and (4,5,6)
 */
export function simpleCurve(name = "CurveData"): CurveData {
  return {
    name,
    settings: defaultCurveSettings(),
    splines: [
      bezierSpline([
        [1, 2, 3],
        [4, 5, 6],
      ]),
    ],
  };
}

export function arrayModifier(count: number, offsetObject: string | null = null): Modifier {
  return {
    kind: "array",
    name: "Array",
    showViewport: true,
    showRender: true,
    params: {
      count,
      fitType: "FIXED_COUNT",
      fitLength: 0,
      useRelativeOffset: true,
      relativeOffsetDisplace: [1, 0, 0],
      useConstantOffset: false,
      constantOffsetDisplace: [0, 0, 0],
      useObjectOffset: offsetObject !== null,
      offsetObject: offsetObject === null ? null : { name: offsetObject },
      useMergeVertices: false,
      mergeThreshold: 0.01,
      startCap: null,
      endCap: null,
      curve: null,
    },
  };
}
