/**
 * Attribute sets and the attribute assembler
 */

import type { Bitmask } from './flags.js';
import { orBits } from './flags.js';

export type AttributeValue =
  | number
  | string
  | boolean
  | Bitmask
  | readonly number[]
  | readonly (readonly number[])[]
  | readonly string[];

export type AttributeSet = Record<string, AttributeValue>;

export function isBitmask(value: AttributeValue | undefined): value is Bitmask {
  return typeof value === 'object' && 'kind' in value && value.kind === 'bitmask';
}

/**
 * Deep copy; the result shares no arrays with the input
 */
export function cloneAttributes(attribs: Readonly<AttributeSet>): AttributeSet {
  return structuredClone({ ...attribs });
}

function mergeInto(target: AttributeSet, source: Readonly<AttributeSet>): void {
  for (const [key, value] of Object.entries(source)) {
    const current = target[key];
    if (isBitmask(current) && (isBitmask(value) || typeof value === 'number')) {
      target[key] = orBits(current, value);
    } else if (isBitmask(value) && typeof current === 'number') {
      target[key] = orBits(value, current);
    } else {
      target[key] = structuredClone(value);
    }
  }
}

/**
 * Merge attribute layers into a new set.
 *
 * Precedence is defaults < overrides < enforced. Where one side of a key holds
 * a bitmask and the other a bitmask or plain number, the bits are OR-ed, so
 * flags set by a lower layer survive.
 */
export function assemble(
  defaults: Readonly<AttributeSet>,
  overrides: Readonly<AttributeSet> = {},
  enforced: Readonly<AttributeSet> = {}
): AttributeSet {
  const result = cloneAttributes(defaults);
  mergeInto(result, overrides);
  mergeInto(result, enforced);
  return result;
}

/**
 * Split a pseudo-attribute (an option, not an entity attribute) off the caller
 * overrides. The input is left untouched.
 */
export function takeOption(
  overrides: Readonly<AttributeSet>,
  key: string
): [AttributeValue | undefined, AttributeSet] {
  const { [key]: value, ...rest } = overrides;
  return [value, rest];
}

export function takeBooleanOption(
  overrides: Readonly<AttributeSet>,
  key: string
): [boolean, AttributeSet] {
  const [value, rest] = takeOption(overrides, key);
  return [value === true || value === 1, rest];
}
