/**
 * Per-kind default attribute templates
 *
 * Templates are frozen at module load. `templateFor` hands out a deep copy, so
 * no two calls ever see the same default instance.
 */

import type { AttributeSet } from './attributes.js';
import { cloneAttributes } from './attributes.js';
import { bitmask } from './flags.js';
import type { EntityKind } from './version.js';

function deepFreeze<T extends object>(value: T): Readonly<T> {
  Object.values(value).forEach((inner: unknown) => {
    if (typeof inner === 'object' && inner !== null) {
      deepFreeze(inner);
    }
  });
  return Object.freeze(value);
}

const ORIGIN = [0, 0, 0];

const TEMPLATES: Readonly<Partial<Record<EntityKind, Readonly<AttributeSet>>>> = deepFreeze({
  TEXT: { insert: ORIGIN, height: 1, rotation: 0 },
  ATTRIB: { insert: ORIGIN, height: 1, rotation: 0 },
  SHAPE: { insert: ORIGIN, size: 1 },
  ELLIPSE: { major_axis: [1, 0, 0], ratio: 1, start_param: 0, end_param: 2 * Math.PI },
  POLYLINE: { flags: bitmask(), elevation: ORIGIN },
  LWPOLYLINE: { flags: bitmask(), const_width: 0 },
  SPLINE: { flags: bitmask(), degree: 3, knot_tolerance: 1e-10, control_point_tolerance: 1e-10 },
  HATCH: { solid_fill: 1, pattern_name: 'SOLID', color: 7 },
  DIMENSION: { dimtype: bitmask() },
  INSERT: { xscale: 1, yscale: 1, zscale: 1, rotation: 0 },
  IMAGE: { flags: bitmask(3), clipping: 0, brightness: 50, contrast: 50, fade: 0 },
  PDFUNDERLAY: { rotation: 0, flags: bitmask(2), contrast: 100, fade: 0 },
  DWFUNDERLAY: { rotation: 0, flags: bitmask(2), contrast: 100, fade: 0 },
  DGNUNDERLAY: { rotation: 0, flags: bitmask(2), contrast: 100, fade: 0 },
});

/**
 * Fresh, mutable copy of the default attributes of `kind`
 */
export function templateFor(kind: EntityKind): AttributeSet {
  return cloneAttributes(TEMPLATES[kind] ?? {});
}
