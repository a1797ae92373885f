import { describe, it, expect } from 'vitest';
import { assemble, cloneAttributes, isBitmask, takeBooleanOption, takeOption } from './attributes.js';
import type { AttributeSet } from './attributes.js';
import { bitmask, hasBits, orBits, SplineFlags } from './flags.js';

describe('flags', () => {
  it('should OR bitmasks with bitmasks and numbers', () => {
    expect(orBits(bitmask(1), bitmask(4))).toEqual(bitmask(5));
    expect(orBits(bitmask(2), 2)).toEqual(bitmask(2));
  });

  it('should test for all given bits', () => {
    const mask = bitmask(SplineFlags.CLOSED | SplineFlags.PERIODIC);
    expect(hasBits(mask, SplineFlags.PERIODIC)).toBe(true);
    expect(hasBits(mask, SplineFlags.PERIODIC | SplineFlags.RATIONAL)).toBe(false);
  });
});

describe('assemble', () => {
  it('should apply defaults < overrides < enforced', () => {
    const result = assemble({ a: 1, b: 1, c: 1 }, { b: 2, c: 2 }, { c: 3 });
    expect(result).toEqual({ a: 1, b: 2, c: 3 });
  });

  it('should OR bitmask values instead of replacing them', () => {
    const result = assemble({ flags: bitmask(2) }, { flags: 8 }, { flags: bitmask(1) });
    expect(result.flags).toEqual(bitmask(11));
  });

  it('should OR an enforced bitmask into a plain number override', () => {
    const result = assemble({}, { flags: 4 }, { flags: bitmask(1) });
    expect(result.flags).toEqual(bitmask(5));
  });

  it('should replace non-bitmask values', () => {
    const result = assemble({ layer: '0' }, { layer: 'WALLS' });
    expect(result.layer).toBe('WALLS');
  });

  it('should not share arrays with any input', () => {
    const defaults: AttributeSet = { center: [0, 0, 0] };
    const overrides: AttributeSet = { insert: [1, 2, 3] };
    const result = assemble(defaults, overrides);
    expect(result.center).toEqual([0, 0, 0]);
    expect(result.center).not.toBe(defaults.center);
    expect(result.insert).not.toBe(overrides.insert);
  });

  it('should leave its inputs untouched', () => {
    const defaults: AttributeSet = { flags: bitmask(1) };
    assemble(defaults, { flags: bitmask(2) });
    expect(defaults.flags).toEqual(bitmask(1));
  });
});

describe('cloneAttributes', () => {
  it('should deep copy nested arrays', () => {
    const source: AttributeSet = { vertices: [[0, 0], [1, 1]] };
    const copy = cloneAttributes(source);
    expect(copy).toEqual(source);
    expect(copy.vertices).not.toBe(source.vertices);
  });
});

describe('isBitmask', () => {
  it('should tell bitmasks from other values', () => {
    expect(isBitmask(bitmask())).toBe(true);
    expect(isBitmask(3)).toBe(false);
    expect(isBitmask([1, 2])).toBe(false);
    expect(isBitmask(undefined)).toBe(false);
  });
});

describe('options', () => {
  it('should split an option off the overrides', () => {
    const overrides: AttributeSet = { layer: 'A', closed: true };
    const [closed, rest] = takeBooleanOption(overrides, 'closed');
    expect(closed).toBe(true);
    expect(rest).toEqual({ layer: 'A' });
    expect(overrides).toEqual({ layer: 'A', closed: true });
  });

  it('should treat 1 as true and absence as false', () => {
    expect(takeBooleanOption({ m_close: 1 }, 'm_close')[0]).toBe(true);
    expect(takeBooleanOption({}, 'm_close')[0]).toBe(false);
    expect(takeBooleanOption({ m_close: 'yes' }, 'm_close')[0]).toBe(false);
  });

  it('should return undefined for a missing option', () => {
    const [value, rest] = takeOption({ color: 1 }, 'name');
    expect(value).toBeUndefined();
    expect(rest).toEqual({ color: 1 });
  });
});
