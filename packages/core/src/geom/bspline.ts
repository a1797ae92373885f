/**
 * B-spline control frames
 *
 * A control frame is the data a SPLINE entity stores: degree, control points,
 * knot vector and optional weights. Frames satisfy
 * `knots.length === controlPoints.length + degree + 1` and carry either no
 * weights or exactly one per control point.
 *
 * Open frames are clamped (first/last knot repeated degree + 1 times) and pass
 * through the first and last control point. Closed frames are periodic: the
 * first `degree` control points are repeated at the tail and the knots are
 * uniform, so the curve closes with C^(degree-1) continuity at the seam.
 */

import type { PointLike, Vec3 } from '../num/vec3.js';
import { toVec3 } from '../num/vec3.js';
import { ValueError } from '../entity/errors.js';

export interface BSplineFrame {
  degree: number;
  controlPoints: Vec3[];
  knots: number[];
  /** Empty for non-rational frames */
  weights: number[];
  /** Periodic frame, control points already wrapped */
  closed: boolean;
}

export function isRational(frame: BSplineFrame): boolean {
  return frame.weights.length > 0;
}

// ============================================================================
// Knot vectors
// ============================================================================

/**
 * Clamped integer knots: [0 × order, 1, 2, …, (count - order + 1) × order]
 */
export function openUniformKnots(count: number, order: number): number[] {
  const knots: number[] = [];
  const last = count - order + 1;
  for (let i = 0; i < order; i++) knots.push(0);
  for (let i = 1; i < last; i++) knots.push(i);
  for (let i = 0; i < order; i++) knots.push(last);
  return knots;
}

/**
 * Uniform knots 0, 1, …, count + order - 1
 */
export function uniformKnots(count: number, order: number): number[] {
  const knots: number[] = [];
  for (let i = 0; i < count + order; i++) knots.push(i);
  return knots;
}

/**
 * Clamped knots for interpolation, averaging `degree` consecutive parameters
 * for every interior knot.
 */
export function knotsFromParameters(t: readonly number[], degree: number): number[] {
  const n = t.length - 1;
  const knots: number[] = [];
  for (let i = 0; i <= degree; i++) knots.push(0);
  for (let j = 1; j <= n - degree; j++) {
    let sum = 0;
    for (let i = j; i < j + degree; i++) {
      sum += t[i];
    }
    knots.push(sum / degree);
  }
  for (let i = 0; i <= degree; i++) knots.push(1);
  return knots;
}

/**
 * Clamped knots for a least-squares fit with `count` control points over the
 * parameters `t`. Interior knots are spread so every knot span holds at least
 * one parameter.
 */
export function approximationKnots(t: readonly number[], count: number, degree: number): number[] {
  const m = t.length - 1;
  const n = count - 1;
  const d = (m + 1) / (n - degree + 1);
  const knots: number[] = [];
  for (let i = 0; i <= degree; i++) knots.push(0);
  for (let j = 1; j <= n - degree; j++) {
    const i = Math.floor(j * d);
    const alpha = j * d - i;
    knots.push((1 - alpha) * t[i - 1] + alpha * t[i]);
  }
  for (let i = 0; i <= degree; i++) knots.push(1);
  return knots;
}

// ============================================================================
// Frame construction
// ============================================================================

export function validateDegree(degree: number): void {
  if (!Number.isInteger(degree) || degree < 1) {
    throw new ValueError('degree', `degree must be an integer >= 1, got ${degree}`);
  }
}

/**
 * Throws unless there are at least 2 and at least degree + 1 points
 */
export function requirePointCount(count: number, degree: number, field = 'fitPoints'): void {
  if (count < 2 || count < degree + 1) {
    throw new ValueError(field, `insufficient fit points: ${count} given, degree ${degree} needs ${Math.max(2, degree + 1)}`);
  }
}

function checkKnots(knots: readonly number[], expected: number): number[] {
  if (knots.length !== expected) {
    throw new ValueError('knots', `expected ${expected} knot values, got ${knots.length}`);
  }
  for (let i = 1; i < knots.length; i++) {
    if (knots[i] < knots[i - 1]) {
      throw new ValueError('knots', `knot values must be non-decreasing (index ${i})`);
    }
  }
  return [...knots];
}

function checkWeights(weights: readonly number[], expected: number): number[] {
  if (weights.length !== expected) {
    throw new ValueError('weights', `expected ${expected} weights, got ${weights.length}`);
  }
  if (weights.some((w) => !(w > 0))) {
    throw new ValueError('weights', 'weights must be positive');
  }
  return [...weights];
}

/**
 * Clamped open frame; `knots` defaults to open uniform integer knots
 */
export function openFrame(
  controlPoints: readonly PointLike[],
  degree: number,
  knots?: readonly number[]
): BSplineFrame {
  validateDegree(degree);
  requirePointCount(controlPoints.length, degree, 'controlPoints');
  const count = controlPoints.length;
  return {
    degree,
    controlPoints: controlPoints.map(toVec3),
    knots: knots ? checkKnots(knots, count + degree + 1) : openUniformKnots(count, degree + 1),
    weights: [],
    closed: false,
  };
}

/**
 * Periodic closed frame over `controlPoints`; the first `degree` points are
 * appended again at the tail.
 */
export function closedFrame(controlPoints: readonly PointLike[], degree: number): BSplineFrame {
  validateDegree(degree);
  requirePointCount(controlPoints.length, degree, 'controlPoints');
  const points = controlPoints.map(toVec3);
  const wrapped = [...points, ...points.slice(0, degree).map((p): Vec3 => [p[0], p[1], p[2]])];
  return {
    degree,
    controlPoints: wrapped,
    knots: uniformKnots(wrapped.length, degree + 1),
    weights: [],
    closed: true,
  };
}

export function openRationalFrame(
  controlPoints: readonly PointLike[],
  weights: readonly number[],
  degree: number,
  knots?: readonly number[]
): BSplineFrame {
  const frame = openFrame(controlPoints, degree, knots);
  frame.weights = checkWeights(weights, frame.controlPoints.length);
  return frame;
}

export function closedRationalFrame(
  controlPoints: readonly PointLike[],
  weights: readonly number[],
  degree: number
): BSplineFrame {
  const checked = checkWeights(weights, controlPoints.length);
  const frame = closedFrame(controlPoints, degree);
  frame.weights = [...checked, ...checked.slice(0, degree)];
  return frame;
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Knot span index containing u (Piegl & Tiller A2.1).
 * `n` is the index of the last control point.
 */
export function findSpan(n: number, degree: number, u: number, knots: readonly number[]): number {
  if (u >= knots[n + 1]) return n;
  if (u <= knots[degree]) {
    // Skip repeated knots at the domain start
    let span = degree;
    while (span < n && knots[span + 1] <= u) span++;
    return span;
  }
  let low = degree;
  let high = n + 1;
  let mid = Math.floor((low + high) / 2);
  while (u < knots[mid] || u >= knots[mid + 1]) {
    if (u < knots[mid]) {
      high = mid;
    } else {
      low = mid;
    }
    mid = Math.floor((low + high) / 2);
  }
  return mid;
}

/**
 * Non-zero basis functions N[span-degree..span] at u (Piegl & Tiller A2.2)
 */
export function basisFunctions(span: number, u: number, degree: number, knots: readonly number[]): number[] {
  const N = [1];
  const left = [0];
  const right = [0];
  for (let j = 1; j <= degree; j++) {
    left.push(u - knots[span + 1 - j]);
    right.push(knots[span + j] - u);
    let saved = 0;
    for (let r = 0; r < j; r++) {
      const denom = right[r + 1] + left[j - r];
      const temp = denom === 0 ? 0 : N[r] / denom;
      N[r] = saved + right[r + 1] * temp;
      saved = left[j - r] * temp;
    }
    N.push(saved);
  }
  return N;
}

/**
 * Parameter domain [start, end] of the frame
 */
export function domain(frame: BSplineFrame): [number, number] {
  const { knots, degree } = frame;
  return [knots[degree], knots[knots.length - degree - 1]];
}

/**
 * Point on the curve at parameter u (clamped to the domain)
 */
export function evaluate(frame: BSplineFrame, u: number): Vec3 {
  const { degree, controlPoints, knots, weights } = frame;
  const [start, end] = domain(frame);
  const t = Math.min(Math.max(u, start), end);
  const n = controlPoints.length - 1;
  const span = findSpan(n, degree, t, knots);
  const N = basisFunctions(span, t, degree, knots);

  let x = 0;
  let y = 0;
  let z = 0;
  let w = 0;
  for (let j = 0; j <= degree; j++) {
    const idx = span - degree + j;
    const weight = weights.length > 0 ? weights[idx] : 1;
    const b = N[j] * weight;
    const p = controlPoints[idx];
    x += b * p[0];
    y += b * p[1];
    z += b * p[2];
    w += b;
  }
  return [x / w, y / w, z / w];
}
