/**
 * Continued linear dimensions over a run of measurement points
 */

import { toVec3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import { createNumericContext } from '../num/tolerance.js';
import { ValueError } from '../entity/errors.js';
import { resolveLinear } from './resolve.js';
import type { DimStyleOverrides, LinearDimensionRequest, MultiPointLinearInput } from './types.js';

/**
 * Arrow block name meaning "no arrow"
 */
export const ARROW_NONE = '_NONE';

type ArrowName = string | number | boolean | undefined;

/**
 * Arrow blocks of both dimension line ends. Ticks (`dimtsz` > 0) draw no
 * arrow block; `dimblk1`/`dimblk2` apply only with separate arrows (`dimsah`),
 * otherwise both ends use `dimblk`.
 */
function arrowNames(override: DimStyleOverrides): [ArrowName, ArrowName] {
  const tickSize = override.dimtsz;
  if (typeof tickSize === 'number' && tickSize !== 0) {
    return [undefined, undefined];
  }
  if (override.dimsah === true || override.dimsah === 1) {
    return [override.dimblk1, override.dimblk2];
  }
  return [override.dimblk, override.dimblk];
}

/**
 * One linear request per consecutive point pair.
 *
 * With `avoidDoubleRendering` (default) every dimension after the first drops
 * its first extension line (`dimse1`), which coincides with the second one of
 * its predecessor. When the first dimension has symmetric arrows its
 * successors drop the first arrow as well. A first arrow that is not named in
 * the override (left to the named style) is dropped too.
 */
export function resolveMultiPointLinear(
  input: MultiPointLinearInput,
  ctx: NumericContext = createNumericContext()
): LinearDimensionRequest[] {
  if (input.points.length < 2) {
    throw new ValueError('points', `at least 2 points required, got ${input.points.length}`);
  }
  const avoid = input.avoidDoubleRendering ?? true;
  const override = { ...input.override };
  const [blk1, blk2] = arrowNames(override);
  const suppressArrow1 = blk1 === undefined || blk1 === blk2;

  const points = input.points.map(toVec3);
  const requests: LinearDimensionRequest[] = [];
  for (let i = 0; i < points.length - 1; i++) {
    const dimOverride: DimStyleOverrides = { ...override };
    if (avoid && i > 0) {
      dimOverride.dimse1 = 1;
      if (suppressArrow1) {
        dimOverride.dimblk1 = ARROW_NONE;
      }
    }
    requests.push(
      resolveLinear(
        {
          base: input.base,
          p1: points[i],
          p2: points[i + 1],
          angle: input.angle,
          dimstyle: input.dimstyle,
          override: dimOverride,
          attribs: input.attribs,
        },
        ctx
      )
    );
  }
  return requests;
}
