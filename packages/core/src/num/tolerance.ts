/**
 * Tolerance model and numeric context
 *
 * Lengths closer to zero than `tol.length` count as zero; `isZero` is the
 * single place that comparison is made.
 */

export interface Tolerances {
  /** Model-space length tolerance (absolute distance) */
  length: number;
  /** Angle tolerance in degrees */
  angle: number;
}

export interface NumericContext {
  tol: Tolerances;
}

/**
 * Default tolerances (drawing units)
 */
export const DEFAULT_TOLERANCES: Tolerances = {
  length: 1e-9,
  angle: 1e-9,
};

export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
      angle: tol?.angle ?? DEFAULT_TOLERANCES.angle,
    },
  };
}

/**
 * Check if a value is effectively zero (within length tolerance)
 */
export function isZero(value: number, ctx: NumericContext): boolean {
  return Math.abs(value) <= ctx.tol.length;
}

/**
 * Round to `digits` decimal places, mapping -0 to 0
 */
export function roundTo(value: number, digits: number): number {
  const f = 10 ** digits;
  const r = Math.round(value * f) / f;
  return r === 0 ? 0 : r;
}
