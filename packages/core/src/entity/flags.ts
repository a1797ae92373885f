/**
 * Typed bitmask attribute values and the named bits they carry
 */

export interface Bitmask {
  readonly kind: 'bitmask';
  readonly bits: number;
}

export function bitmask(bits = 0): Bitmask {
  return { kind: 'bitmask', bits };
}

/**
 * Merge by OR: bits already set are never cleared
 */
export function orBits(a: Bitmask, b: Bitmask | number): Bitmask {
  return bitmask(a.bits | (typeof b === 'number' ? b : b.bits));
}

export function hasBits(mask: Bitmask, bits: number): boolean {
  return (mask.bits & bits) === bits;
}

export const PolylineFlags = {
  CLOSED: 1,
  MESH_CLOSED_M: 1,
  CURVE_FIT_VERTICES_ADDED: 2,
  SPLINE_FIT_VERTICES_ADDED: 4,
  POLYLINE_3D: 8,
  POLYMESH_3D: 16,
  MESH_CLOSED_N: 32,
  POLYFACE: 64,
  GENERATE_LINETYPE_PATTERN: 128,
} as const;

export const SplineFlags = {
  CLOSED: 1,
  PERIODIC: 2,
  RATIONAL: 4,
  PLANAR: 8,
  LINEAR: 16,
} as const;

export const LwpolylineFlags = {
  CLOSED: 1,
  PLINEGEN: 128,
} as const;

/**
 * DIMENSION `dimtype` values; the low bits select the variant
 */
export const DimensionType = {
  LINEAR: 0,
  ALIGNED: 1,
  ANGULAR: 2,
  DIAMETER: 3,
  RADIUS: 4,
  ANGULAR_3P: 5,
  ORDINATE: 6,
  BLOCK_EXCLUSIVE: 32,
  ORDINATE_TYPE: 64,
  USER_LOCATION_OVERRIDE: 128,
} as const;
