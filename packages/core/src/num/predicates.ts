/**
 * Geometric predicates
 *
 * Orientation tests use Shewchuk-style adaptive precision via
 * mourner/robust-predicates, so near-collinear inputs classify consistently.
 */

import { orient2d as robustOrient2d } from 'robust-predicates';
import type { Vec3 } from './vec3.js';
import type { NumericContext } from './tolerance.js';
import { isZero } from './tolerance.js';
import { dist3 } from './vec3.js';

/**
 * Exact sign of (b - a) × (c - a) in the xy-plane:
 * - positive: c is to the left (counter-clockwise)
 * - negative: c is to the right (clockwise)
 * - zero: collinear
 *
 * robust-predicates uses the opposite sign convention, hence the negation.
 */
export function orient2DRobust(a: Vec3, b: Vec3, c: Vec3): number {
  return -robustOrient2d(a[0], a[1], b[0], b[1], c[0], c[1]);
}

export type Side = 'left' | 'right' | 'on';

/**
 * Side of the directed line a → b on which c lies (xy-projection).
 * Points closer to the line than the length tolerance are `on` it.
 */
export function sideOfLine(a: Vec3, b: Vec3, c: Vec3, ctx: NumericContext): Side {
  const baseLength = dist3(a, b);
  if (isZero(baseLength, ctx)) {
    return 'on';
  }
  const det = orient2DRobust(a, b, c);
  if (Math.abs(det) < ctx.tol.length * baseLength) {
    return 'on';
  }
  return det > 0 ? 'left' : 'right';
}
