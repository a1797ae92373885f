/**
 * Dimension geometry resolution
 */

import { angleDeg3, length3, normalizeTo3, orthogonal3, sub3, toVec3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import { createNumericContext, isZero } from '../num/tolerance.js';
import { sideOfLine } from '../num/predicates.js';
import type { AttributeSet } from '../entity/attributes.js';
import { assemble } from '../entity/attributes.js';
import { ValueError } from '../entity/errors.js';
import { DimensionType, bitmask } from '../entity/flags.js';
import { templateFor } from '../entity/templates.js';
import type {
  AlignedDimensionInput,
  DelegatedDimensionRequest,
  DimensionKind,
  DimensionRequest,
  DimensionStyleInput,
  LinearDimensionInput,
  LinearDimensionRequest,
} from './types.js';

export const DEFAULT_DIMSTYLE = 'Standard';

/**
 * `dimtype` variant per kind. Aligned dimensions are stored as rotated linear
 * dimensions.
 */
const DIMTYPE: Readonly<Record<DimensionKind, number>> = {
  linear: DimensionType.LINEAR,
  aligned: DimensionType.LINEAR,
  angular: DimensionType.ANGULAR,
  angular3p: DimensionType.ANGULAR_3P,
  diameter: DimensionType.DIAMETER,
  radius: DimensionType.RADIUS,
  ordinate: DimensionType.ORDINATE,
};

export function resolveLinear(
  input: LinearDimensionInput,
  ctx: NumericContext = createNumericContext()
): LinearDimensionRequest {
  const base = toVec3(input.base);
  const p1 = toVec3(input.p1);
  const p2 = toVec3(input.p2);
  const request: LinearDimensionRequest = {
    kind: 'linear',
    base,
    p1,
    p2,
    angle: input.angle ?? 0,
    text: input.text ?? '<>',
    dimstyle: input.dimstyle ?? DEFAULT_DIMSTYLE,
    override: { ...input.override },
    attribs: { ...input.attribs },
    side: sideOfLine(p1, p2, base, ctx),
  };
  if (input.textRotation !== undefined) {
    request.textRotation = input.textRotation;
  }
  if (input.location !== undefined) {
    request.location = toVec3(input.location);
  }
  return request;
}

/**
 * Linear dimension along p1 → p2. The base point is the perpendicular of the
 * measurement direction scaled to `distance`; a negative distance puts the
 * dimension line on the other side.
 */
export function resolveAligned(
  input: AlignedDimensionInput,
  ctx: NumericContext = createNumericContext()
): LinearDimensionRequest {
  const p1 = toVec3(input.p1);
  const p2 = toVec3(input.p2);
  const direction = sub3(p2, p1);
  if (isZero(length3(direction), ctx)) {
    throw new ValueError('p2', 'measurement points coincide');
  }
  const request = resolveLinear(
    {
      base: normalizeTo3(orthogonal3(direction), input.distance),
      p1,
      p2,
      angle: angleDeg3(direction),
      text: input.text,
      dimstyle: input.dimstyle,
      override: input.override,
      attribs: input.attribs,
    },
    ctx
  );
  return { ...request, kind: 'aligned' };
}

export function resolveDimension(
  kind: DelegatedDimensionRequest['kind'],
  input: DimensionStyleInput = {}
): DelegatedDimensionRequest {
  return {
    kind,
    dimstyle: input.dimstyle ?? DEFAULT_DIMSTYLE,
    override: { ...input.override },
    attribs: { ...input.attribs },
  };
}

/**
 * DIMENSION entity attributes for a request. Type flag, style and geometry
 * always win over caller attributes; caller `dimtype` bits are kept. Only
 * linear and aligned requests carry `text` and `angle`.
 */
export function dimensionAttributes(request: DimensionRequest): AttributeSet {
  const enforced: AttributeSet = {
    dimtype: bitmask(DIMTYPE[request.kind] | DimensionType.BLOCK_EXCLUSIVE),
    dimstyle: request.dimstyle,
  };
  if (request.kind === 'linear' || request.kind === 'aligned') {
    enforced.defpoint = request.base;
    enforced.text = request.text;
    enforced.defpoint2 = request.p1;
    enforced.defpoint3 = request.p2;
    enforced.angle = request.angle;
    if (request.textRotation !== undefined) {
      enforced.text_rotation = request.textRotation;
    }
  }
  return assemble(templateFor('DIMENSION'), request.attribs, enforced);
}
