/**
 * Attribute instances for an automatically filled block reference
 */

import type { Vec3 } from '../num/vec3.js';
import type { AttributeSet, AttributeValue } from '../entity/attributes.js';
import { cloneAttributes, isBitmask } from '../entity/attributes.js';
import { ValueError } from '../entity/errors.js';

/**
 * Fields of an attribute definition that never carry over to an instance.
 * A copied handle would make two entities share one identity.
 */
export const TRANSIENT_ATTDEF_FIELDS: readonly string[] = ['prompt', 'handle'];

export interface AttribRequest {
  tag: string;
  text: string;
  /** Offset from the block base point */
  insert: Vec3;
  /** Remaining attributes copied from the definition; `text` is replaced */
  attribs: AttributeSet;
}

function asPoint(value: AttributeValue | undefined, tag: string): Vec3 {
  if (typeof value === 'object' && !isBitmask(value) && (value.length === 2 || value.length === 3)) {
    const [x, y, z = 0] = value;
    if (typeof x === 'number' && typeof y === 'number' && typeof z === 'number') {
      return [x, y, z];
    }
  }
  throw new ValueError('insert', `attribute definition "${tag}" has no insert point`);
}

function textFor(values: Readonly<Record<string, string>>, tag: string): string {
  if (!Object.hasOwn(values, tag)) {
    return '';
  }
  const text: unknown = values[tag];
  if (typeof text !== 'string') {
    throw new ValueError('values', `value of tag "${tag}" is not a string`);
  }
  return text;
}

/**
 * One ATTRIB request per attribute definition, in definition order.
 * Tags missing from `values` get an empty string; only own properties of
 * `values` count.
 */
export function composeAutoAttribs(
  attdefs: readonly Readonly<AttributeSet>[],
  values: Readonly<Record<string, string>>
): AttribRequest[] {
  return attdefs.map((attdef) => {
    const attribs = cloneAttributes(attdef);
    for (const field of TRANSIENT_ATTDEF_FIELDS) {
      delete attribs[field];
    }
    const { tag, insert, ...rest } = attribs;
    if (typeof tag !== 'string') {
      throw new ValueError('tag', 'attribute definition without tag');
    }
    return {
      tag,
      text: textFor(values, tag),
      insert: asPoint(insert, tag),
      attribs: rest,
    };
  });
}
