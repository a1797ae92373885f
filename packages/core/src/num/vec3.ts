/**
 * 3D vector operations
 *
 * Points and directions are plain `[x, y, z]` tuples. Every operation returns a
 * new tuple; inputs are never modified.
 */

export type Vec3 = [number, number, number];

/**
 * 2D or 3D point as accepted from callers. Missing z means 0.
 */
export type PointLike = readonly [number, number] | readonly [number, number, number];

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

export const ZERO3: Vec3 = [0, 0, 0];

/**
 * Promote a caller point to a fresh Vec3
 */
export function toVec3(p: PointLike): Vec3 {
  return [p[0], p[1], p.length === 3 ? p[2] : 0];
}

export function sub3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function mul3(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

export function dot3(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function length3(v: Vec3): number {
  return Math.sqrt(dot3(v, v));
}

/**
 * Scale a vector so that its length becomes `length`.
 * A negative length flips the direction. Zero input stays zero.
 */
export function normalizeTo3(v: Vec3, length: number): Vec3 {
  const len = length3(v);
  if (len === 0) {
    return [0, 0, 0];
  }
  return mul3(v, length / len);
}

export function dist3(a: Vec3, b: Vec3): number {
  return length3(sub3(a, b));
}

/**
 * Counter-clockwise orthogonal in the xy-plane: (-y, x, z)
 */
export function orthogonal3(v: Vec3): Vec3 {
  return [0 - v[1], v[0], v[2]];
}

/**
 * Angle of the xy-projection against the x-axis, in degrees (-180, 180]
 */
export function angleDeg3(v: Vec3): number {
  return (Math.atan2(v[1], v[0]) * 180) / Math.PI;
}
