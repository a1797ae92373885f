/**
 * Control frames from fit points
 *
 * `interpolate` solves for a clamped B-spline passing through every fit point
 * (global interpolation, Piegl & Tiller 9.2.1). `approximate` fits a curve with
 * fewer control points in the least-squares sense, interpolating only the end
 * points (Piegl & Tiller 9.4.1).
 *
 * CAD applications compute their own control points from fit points with
 * undisclosed algorithms; neither function reproduces those, the results are
 * just one valid spline through (or near) the fit points.
 */

import type { PointLike, Vec3 } from '../num/vec3.js';
import { toVec3, sub3, mul3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import { createNumericContext } from '../num/tolerance.js';
import type { Matrix } from '../num/linsolve.js';
import { gram, solveLinearSystem, zeros } from '../num/linsolve.js';
import { ValueError } from '../entity/errors.js';
import type { ParametrizationMethod } from './parametrize.js';
import { parametrize } from './parametrize.js';
import type { BSplineFrame } from './bspline.js';
import {
  approximationKnots,
  basisFunctions,
  findSpan,
  knotsFromParameters,
  requirePointCount,
  validateDegree,
} from './bspline.js';

export interface FitOptions {
  degree?: number;
  method?: ParametrizationMethod;
  /** Exponent for the centripetal method */
  power?: number;
  ctx?: NumericContext;
}

export const DEFAULT_FIT_OPTIONS: Required<Omit<FitOptions, 'ctx'>> = {
  degree: 3,
  method: 'distance',
  power: 0.5,
};

function resolveFitOptions(options?: FitOptions): Required<FitOptions> {
  return {
    degree: options?.degree ?? DEFAULT_FIT_OPTIONS.degree,
    method: options?.method ?? DEFAULT_FIT_OPTIONS.method,
    power: options?.power ?? DEFAULT_FIT_OPTIONS.power,
    ctx: options?.ctx ?? createNumericContext(),
  };
}

/**
 * Row of basis values for parameter u, spread over `columns` control points
 */
function basisRow(u: number, degree: number, knots: readonly number[], columns: number): number[] {
  const row = new Array<number>(columns).fill(0);
  const span = findSpan(columns - 1, degree, u, knots);
  const N = basisFunctions(span, u, degree, knots);
  for (let j = 0; j <= degree; j++) {
    row[span - degree + j] = N[j];
  }
  return row;
}

function toRows(points: readonly Vec3[]): Matrix {
  return points.map((p) => [p[0], p[1], p[2]]);
}

function fromRows(rows: Matrix): Vec3[] {
  return rows.map((r): Vec3 => [r[0], r[1], r[2]]);
}

/**
 * Clamped B-spline through all fit points
 */
export function interpolate(fitPoints: readonly PointLike[], options?: FitOptions): BSplineFrame {
  const { degree, method, power, ctx } = resolveFitOptions(options);
  validateDegree(degree);
  requirePointCount(fitPoints.length, degree);

  const points = fitPoints.map(toVec3);
  const t = parametrize(points, method, power, ctx);
  const knots = knotsFromParameters(t, degree);
  const count = points.length;

  const N = t.map((u) => basisRow(u, degree, knots, count));
  const solution = solveLinearSystem(N, toRows(points));
  if (!solution) {
    throw new ValueError('fitPoints', 'interpolation system is singular');
  }

  return {
    degree,
    controlPoints: fromRows(solution),
    knots,
    weights: [],
    closed: false,
  };
}

/**
 * Least-squares B-spline with `count` control points. The first and last
 * control point equal the first and last fit point.
 */
export function approximate(fitPoints: readonly PointLike[], count: number, options?: FitOptions): BSplineFrame {
  const { degree, method, power, ctx } = resolveFitOptions(options);
  validateDegree(degree);
  requirePointCount(fitPoints.length, degree);
  if (!Number.isInteger(count) || count < degree + 1 || count >= fitPoints.length) {
    throw new ValueError(
      'count',
      `control point count must be in [${degree + 1}, ${fitPoints.length - 1}], got ${count}`
    );
  }

  const points = fitPoints.map(toVec3);
  const t = parametrize(points, method, power, ctx);
  const knots = approximationKnots(t, count, degree);
  const m = points.length - 1;
  const n = count - 1;
  const first = points[0];
  const last = points[m];

  const controlPoints: Vec3[] = [first];
  if (n > 1) {
    // Interior fit points minus the contribution of the fixed end points
    const rows: number[][] = [];
    const residuals: Vec3[] = [];
    for (let k = 1; k < m; k++) {
      const row = basisRow(t[k], degree, knots, count);
      let r = sub3(points[k], mul3(first, row[0]));
      r = sub3(r, mul3(last, row[n]));
      rows.push(row.slice(1, n));
      residuals.push(r);
    }

    const rhs = zeros(n - 1, 3);
    for (let i = 0; i < n - 1; i++) {
      for (let k = 0; k < rows.length; k++) {
        for (let c = 0; c < 3; c++) {
          rhs[i][c] += rows[k][i] * residuals[k][c];
        }
      }
    }

    const solution = solveLinearSystem(gram(rows), rhs);
    if (!solution) {
      throw new ValueError('fitPoints', 'approximation system is singular');
    }
    controlPoints.push(...fromRows(solution));
  }
  controlPoints.push(last);

  return {
    degree,
    controlPoints,
    knots,
    weights: [],
    closed: false,
  };
}
