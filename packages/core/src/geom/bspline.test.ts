/**
 * Tests for B-spline knot vectors, control frames and evaluation
 */

import { describe, it, expect } from 'vitest';
import {
  openUniformKnots,
  uniformKnots,
  knotsFromParameters,
  approximationKnots,
  openFrame,
  closedFrame,
  openRationalFrame,
  closedRationalFrame,
  evaluate,
  domain,
  isRational,
} from './bspline.js';
import type { PointLike } from '../num/vec3.js';
import { ValueError } from '../entity/errors.js';

const square: PointLike[] = [
  [0, 0],
  [10, 0],
  [10, 10],
  [0, 10],
];

describe('bspline', () => {
  describe('knot vectors', () => {
    it('should clamp open uniform knots', () => {
      expect(openUniformKnots(5, 4)).toEqual([0, 0, 0, 0, 1, 2, 2, 2, 2]);
      expect(openUniformKnots(4, 4)).toEqual([0, 0, 0, 0, 1, 1, 1, 1]);
    });

    it('should count up for uniform knots', () => {
      expect(uniformKnots(3, 2)).toEqual([0, 1, 2, 3, 4]);
    });

    it('should average parameters for interpolation knots', () => {
      expect(knotsFromParameters([0, 0.25, 0.5, 0.75, 1], 3)).toEqual([0, 0, 0, 0, 0.5, 1, 1, 1, 1]);
    });

    it('should spread approximation knots between parameters', () => {
      // 7 parameters, 4 control points, degree 2: d = 3.5, one interior knot
      const t = [0, 0.1, 0.2, 0.5, 0.6, 0.9, 1];
      const knots = approximationKnots(t, 4, 2);
      expect(knots).toHaveLength(4 + 2 + 1);
      // i = 3, alpha = 0.5: halfway between t[2] and t[3]
      expect(knots[3]).toBeCloseTo(0.35, 14);
    });
  });

  describe('open frames', () => {
    it('should satisfy the knot count invariant', () => {
      const frame = openFrame(square, 3);
      expect(frame.knots).toHaveLength(frame.controlPoints.length + frame.degree + 1);
      expect(frame.weights).toEqual([]);
      expect(frame.closed).toBe(false);
      expect(isRational(frame)).toBe(false);
    });

    it('should pass through the first and last control point', () => {
      const frame = openFrame(square, 2);
      const [start, end] = domain(frame);
      expect(evaluate(frame, start)).toEqual([0, 0, 0]);
      const last = evaluate(frame, end);
      expect(last[0]).toBeCloseTo(0, 12);
      expect(last[1]).toBeCloseTo(10, 12);
    });

    it('should accept explicit knots of the right length', () => {
      const frame = openFrame(square, 3, [0, 0, 0, 0, 2, 2, 2, 2]);
      expect(frame.knots).toEqual([0, 0, 0, 0, 2, 2, 2, 2]);
    });

    it('should reject wrong knot counts and decreasing knots', () => {
      expect(() => openFrame(square, 3, [0, 0, 0, 1, 1, 1])).toThrow(ValueError);
      expect(() => openFrame(square, 3, [0, 0, 0, 0, 1, 1, 0.5, 1])).toThrow('non-decreasing');
    });

    it('should reject fewer than degree + 1 control points', () => {
      expect(() => openFrame(square.slice(0, 3), 3)).toThrow('insufficient fit points');
    });

    it('should reject degree 0', () => {
      expect(() => openFrame(square, 0)).toThrow('degree must be an integer >= 1');
    });
  });

  describe('closed frames', () => {
    it('should repeat the first degree control points at the tail', () => {
      const frame = closedFrame(square, 3);
      expect(frame.controlPoints).toHaveLength(7);
      expect(frame.controlPoints.slice(4)).toEqual([
        [0, 0, 0],
        [10, 0, 0],
        [10, 10, 0],
      ]);
      expect(frame.knots).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(frame.closed).toBe(true);
    });

    it('should not alias wrapped control points', () => {
      const frame = closedFrame(square, 3);
      expect(frame.controlPoints[4]).not.toBe(frame.controlPoints[0]);
    });

    it('should close the curve at the seam', () => {
      const frame = closedFrame(square, 3);
      const [start, end] = domain(frame);
      const a = evaluate(frame, start);
      const b = evaluate(frame, end);
      expect(b[0]).toBeCloseTo(a[0], 12);
      expect(b[1]).toBeCloseTo(a[1], 12);
      // (P0 + 4 P1 + P2) / 6
      expect(a[0]).toBeCloseTo(50 / 6, 12);
      expect(a[1]).toBeCloseTo(10 / 6, 12);
    });

    it('should reject fewer than degree + 1 control points', () => {
      expect(() => closedFrame(square.slice(0, 2), 2)).toThrow('insufficient fit points');
    });
  });

  describe('rational frames', () => {
    it('should evaluate a quarter circle exactly', () => {
      const frame = openRationalFrame(
        [
          [1, 0],
          [1, 1],
          [0, 1],
        ],
        [1, Math.SQRT1_2, 1],
        2
      );
      expect(isRational(frame)).toBe(true);
      const p = evaluate(frame, 0.5);
      expect(p[0]).toBeCloseTo(Math.SQRT1_2, 12);
      expect(p[1]).toBeCloseTo(Math.SQRT1_2, 12);
    });

    it('should require one weight per control point', () => {
      expect(() => openRationalFrame(square, [1, 1, 1], 3)).toThrow('expected 4 weights');
    });

    it('should reject non-positive weights', () => {
      expect(() => openRationalFrame(square, [1, 0, 1, 1], 3)).toThrow('weights must be positive');
    });

    it('should wrap weights with the control points', () => {
      const frame = closedRationalFrame(square, [1, 2, 3, 4], 3);
      expect(frame.weights).toEqual([1, 2, 3, 4, 1, 2, 3]);
      expect(frame.weights).toHaveLength(frame.controlPoints.length);
    });
  });
});
