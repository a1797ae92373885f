/**
 * Parameter vectors over fit points
 *
 * The parameter vector t assigns each fit point a value in [0, 1]; t[0] = 0,
 * t[n] = 1 and the sequence is strictly increasing.
 *
 * - uniform:     t_i = i / n
 * - distance:    t_i proportional to the accumulated chord length
 * - centripetal: t_i proportional to the accumulated chord length ^ power
 *                (power = 0.5 is the classical centripetal method)
 */

import type { Vec3 } from '../num/vec3.js';
import { dist3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import { createNumericContext, isZero } from '../num/tolerance.js';
import { ValueError } from '../entity/errors.js';

export type ParametrizationMethod = 'uniform' | 'distance' | 'centripetal';

export const PARAMETRIZATION_METHODS: readonly ParametrizationMethod[] = ['uniform', 'distance', 'centripetal'];

export function parseMethod(name: string): ParametrizationMethod {
  for (const m of PARAMETRIZATION_METHODS) {
    if (m === name) return m;
  }
  throw new ValueError('method', `unknown method "${name}"`);
}

export function parametrize(
  points: readonly Vec3[],
  method: ParametrizationMethod,
  power = 0.5,
  ctx: NumericContext = createNumericContext()
): number[] {
  if (points.length < 2) {
    throw new ValueError('fitPoints', 'insufficient fit points');
  }
  switch (method) {
    case 'uniform':
      return uniformParameters(points.length);
    case 'distance':
      return accumulate(chordLengths(points, ctx));
    case 'centripetal':
      return accumulate(chordLengths(points, ctx).map((d) => d ** power));
    default:
      throw new ValueError('method', `unknown method "${String(method)}"`);
  }
}

function uniformParameters(count: number): number[] {
  const n = count - 1;
  const t: number[] = [];
  for (let i = 0; i <= n; i++) {
    t.push(i / n);
  }
  return t;
}

function chordLengths(points: readonly Vec3[], ctx: NumericContext): number[] {
  const lengths: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const d = dist3(points[i - 1], points[i]);
    if (isZero(d, ctx)) {
      throw new ValueError('fitPoints', `fit points ${i - 1} and ${i} coincide`);
    }
    lengths.push(d);
  }
  return lengths;
}

function accumulate(segments: readonly number[]): number[] {
  const total = segments.reduce((sum, s) => sum + s, 0);
  const t = [0];
  let acc = 0;
  for (let i = 0; i < segments.length - 1; i++) {
    acc += segments[i];
    t.push(acc / total);
  }
  // Pin the end exactly, independent of rounding in the sum
  t.push(1);
  return t;
}
