/**
 * Artifact builder
 *
 * Asks the evaluation service for a tessellation and normalizes where the
 * result sits, so path-following setups stay put across regenerations.
 */

import type { EvaluateOptions, EvaluationService, SourceObject } from '../host/types.js';
import { translateMesh, type MeshArtifact } from '../mesh/types.js';
import { mul3, projectHomogeneous, type Vec3 } from '../num/vec3.js';
import type { Spline } from '../source/types.js';

/**
 * Evaluate `source` and normalize the placement of the result
 */
export function buildArtifact(
  evaluator: EvaluationService,
  source: SourceObject,
  options: EvaluateOptions
): MeshArtifact {
  const raw = evaluator.evaluate(source, options);
  return normalizePlacement(raw, source);
}

/**
 * First control point of a spline, in 3D
 */
function firstControlPoint(spline: Spline): Vec3 | null {
  switch (spline.kind) {
    case 'bezier': {
      const first = spline.bezierPoints[0];
      return first ? [first.co[0], first.co[1], first.co[2]] : null;
    }
    case 'nurbs':
    case 'poly': {
      const first = spline.points[0];
      return first ? projectHomogeneous(first.co) : null;
    }
    case 'surface': {
      const first = spline.rows[0]?.[0];
      return first ? projectHomogeneous(first.co) : null;
    }
  }
}

/**
 * Point that should end up at the artifact's local origin.
 *
 * Only defined when the source has exactly one open (non-cyclic in U)
 * spline; with none or several there is no unambiguous anchor.
 */
export function placementAnchor(source: SourceObject): Vec3 | null {
  if (source.data === null) {
    return null;
  }
  const open = source.data.splines.filter((spline) => !spline.cyclicU);
  if (open.length !== 1) {
    return null;
  }
  return firstControlPoint(open[0]);
}

/**
 * Translate the artifact so the placement anchor sits at the origin.
 * Returns the input untouched when there is no anchor.
 */
export function normalizePlacement(artifact: MeshArtifact, source: SourceObject): MeshArtifact {
  const anchor = placementAnchor(source);
  if (anchor === null) {
    return artifact;
  }
  return translateMesh(artifact, mul3(anchor, -1));
}
