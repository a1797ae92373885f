import { describe, it, expect } from 'vitest';
import { ARROW_NONE, resolveMultiPointLinear } from './multiPoint.js';
import type { PointLike } from '../num/vec3.js';

const points: PointLike[] = [
  [0, 0],
  [3, 0],
  [7, 0],
];

describe('resolveMultiPointLinear', () => {
  it('should create one dimension per consecutive point pair', () => {
    const requests = resolveMultiPointLinear({ base: [0, 2], points });
    expect(requests).toHaveLength(2);
    expect(requests[0].p1).toEqual([0, 0, 0]);
    expect(requests[0].p2).toEqual([3, 0, 0]);
    expect(requests[1].p1).toEqual([3, 0, 0]);
    expect(requests[1].p2).toEqual([7, 0, 0]);
    expect(requests.every((r) => r.kind === 'linear')).toBe(true);
  });

  it('should suppress the first extension line and arrow of continued dimensions', () => {
    const requests = resolveMultiPointLinear({ base: [0, 2], points });
    expect(requests[0].override).toEqual({});
    expect(requests[1].override).toEqual({ dimse1: 1, dimblk1: ARROW_NONE });
  });

  it('should keep separate asymmetric arrows', () => {
    const requests = resolveMultiPointLinear({
      base: [0, 2],
      points,
      override: { dimsah: 1, dimblk1: 'DOT', dimblk2: 'OPEN' },
    });
    expect(requests[1].override).toEqual({ dimsah: 1, dimblk1: 'DOT', dimblk2: 'OPEN', dimse1: 1 });
  });

  it('should ignore dimblk1 without separate arrows', () => {
    const requests = resolveMultiPointLinear({ base: [0, 2], points, override: { dimblk1: 'DOT' } });
    expect(requests[1].override).toEqual({ dimblk1: ARROW_NONE, dimse1: 1 });
  });

  it('should drop a first arrow left to the named style', () => {
    const requests = resolveMultiPointLinear({
      base: [0, 2],
      points,
      override: { dimsah: true, dimblk2: 'OPEN' },
    });
    expect(requests[1].override).toEqual({ dimsah: true, dimblk2: 'OPEN', dimse1: 1, dimblk1: ARROW_NONE });
  });

  it('should treat ticks as having no arrow blocks', () => {
    const requests = resolveMultiPointLinear({
      base: [0, 2],
      points,
      override: { dimtsz: 0.2, dimsah: 1, dimblk1: 'DOT', dimblk2: 'OPEN' },
    });
    expect(requests[1].override.dimblk1).toBe(ARROW_NONE);
  });

  it('should treat a shared dimblk as symmetric', () => {
    const requests = resolveMultiPointLinear({ base: [0, 2], points, override: { dimblk: 'DOT' } });
    expect(requests[1].override).toEqual({ dimblk: 'DOT', dimse1: 1, dimblk1: ARROW_NONE });
  });

  it('should leave every dimension complete when double rendering is allowed', () => {
    const requests = resolveMultiPointLinear({
      base: [0, 2],
      points,
      avoidDoubleRendering: false,
      override: { dimtxt: 0.25 },
    });
    expect(requests[1].override).toEqual({ dimtxt: 0.25 });
    expect(requests[1].override).not.toBe(requests[0].override);
  });

  it('should require at least two points', () => {
    expect(() => resolveMultiPointLinear({ base: [0, 2], points: [[0, 0]] })).toThrow(
      'points: at least 2 points required, got 1'
    );
  });
});
