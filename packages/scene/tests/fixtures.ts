/**
 * Spline builders for scene tests
 */

import { defaultSplineFlags, type BezierSpline, type PointSpline, type SurfaceSpline, type Vec3, type Vec4 } from "@curvelink/core";

export function polySpline(points: Array<Vec3 | Vec4>, cyclic = false): PointSpline {
  return {
    kind: "poly",
    ...defaultSplineFlags("poly"),
    cyclicU: cyclic,
    points: points.map((co) => ({ co, tilt: 0, radius: 1 })),
  };
}

/**
 * Straight Bezier segment from `from` to `to` with handles at thirds
 */
export function straightBezier(from: Vec3, to: Vec3, resolution = 4): BezierSpline {
  const third = (t: number): Vec3 => [
    from[0] + (to[0] - from[0]) * t,
    from[1] + (to[1] - from[1]) * t,
    from[2] + (to[2] - from[2]) * t,
  ];
  return {
    kind: "bezier",
    ...defaultSplineFlags("bezier"),
    resolutionU: resolution,
    bezierPoints: [
      { handleLeft: third(-1 / 3), co: from, handleRight: third(1 / 3), tilt: 0, radius: 1 },
      { handleLeft: third(2 / 3), co: to, handleRight: third(4 / 3), tilt: 1, radius: 3 },
    ],
  };
}

export function surfaceSpline(rows: Vec4[][]): SurfaceSpline {
  return {
    kind: "surface",
    ...defaultSplineFlags("surface"),
    rows: rows.map((row) => row.map((co) => ({ co, tilt: 0, radius: 1 }))),
  };
}
