/**
 * Dimension requests
 *
 * A request is everything the style-override renderer needs to build the
 * dimension block later. This layer never renders.
 */

import type { PointLike, Vec3 } from '../num/vec3.js';
import type { Side } from '../num/predicates.js';
import type { AttributeSet } from '../entity/attributes.js';

export type DimensionKind =
  | 'linear'
  | 'aligned'
  | 'angular'
  | 'angular3p'
  | 'diameter'
  | 'radius'
  | 'ordinate';

/**
 * Dimension style variables (`dimse1`, `dimblk1`, `dimtxt`, …) overriding the
 * named style for one dimension only
 */
export type DimStyleOverrides = Record<string, string | number | boolean>;

interface DimensionRequestBase {
  /** Name of the dimension style table entry */
  dimstyle: string;
  override: DimStyleOverrides;
  /** Caller attributes for the DIMENSION entity */
  attribs: AttributeSet;
}

/**
 * Horizontal, vertical, rotated and aligned dimensions
 */
export interface LinearDimensionRequest extends DimensionRequestBase {
  kind: 'linear' | 'aligned';
  /** Any point on the dimension line or its extension */
  base: Vec3;
  p1: Vec3;
  p2: Vec3;
  /** Dimension line angle against the x-axis, degrees */
  angle: number;
  /** "<>" draws the measurement, " " suppresses the text */
  text: string;
  /**
   * Absolute text angle in degrees. When set it replaces the text direction
   * implied by `angle`, whatever that is.
   */
  textRotation?: number;
  /** User location of the text mid point */
  location?: Vec3;
  /** Side of the measured segment p1 → p2 on which `base` lies */
  side: Side;
}

/**
 * Variants whose geometry is resolved entirely by the renderer
 */
export interface DelegatedDimensionRequest extends DimensionRequestBase {
  kind: 'angular' | 'angular3p' | 'diameter' | 'radius' | 'ordinate';
}

export type DimensionRequest = LinearDimensionRequest | DelegatedDimensionRequest;

export interface DimensionStyleInput {
  dimstyle?: string;
  override?: DimStyleOverrides;
  attribs?: AttributeSet;
}

export interface LinearDimensionInput extends DimensionStyleInput {
  base: PointLike;
  p1: PointLike;
  p2: PointLike;
  location?: PointLike;
  text?: string;
  angle?: number;
  textRotation?: number;
}

export interface AlignedDimensionInput extends DimensionStyleInput {
  p1: PointLike;
  p2: PointLike;
  /** Offset of the dimension line; the sign picks the side */
  distance: number;
  text?: string;
}

export interface MultiPointLinearInput extends DimensionStyleInput {
  base: PointLike;
  points: readonly PointLike[];
  angle?: number;
  /** Suppress the first extension line and arrow of every continued dimension */
  avoidDoubleRendering?: boolean;
}
