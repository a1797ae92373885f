/**
 * Quadrilateral normalization for SOLID, TRACE and 3DFACE
 */

import type { PointLike, Vec3 } from '../num/vec3.js';
import { toVec3 } from '../num/vec3.js';
import type { AttributeSet } from './attributes.js';
import { ValueError } from './errors.js';

export type QuadrilateralPoints = [Vec3, Vec3, Vec3, Vec3];

/**
 * Expand 3 or 4 points to exactly 4.
 *
 * A triangle repeats its last vertex: [A, B, C] → [A, B, C, C]. Renderers rely
 * on that exact slot layout.
 */
export function normalizeQuad(points: readonly PointLike[]): QuadrilateralPoints {
  if (points.length !== 3 && points.length !== 4) {
    throw new ValueError('points', `expected 3 or 4 points, got ${points.length}`);
  }
  const [a, b, c] = points.map(toVec3);
  const d = toVec3(points[points.length - 1]);
  return [a, b, c, d];
}

/**
 * Vertex slots `vtx0` … `vtx3`
 */
export function quadAttributes(quad: QuadrilateralPoints): AttributeSet {
  return {
    vtx0: quad[0],
    vtx1: quad[1],
    vtx2: quad[2],
    vtx3: quad[3],
  };
}
