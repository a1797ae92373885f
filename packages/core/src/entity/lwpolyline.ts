/**
 * LWPOLYLINE point formats
 *
 * Caller points are value tuples whose meaning is given by a format string
 * over the letters x, y, s (start width), e (end width) and b (bulge).
 * Stored points are always [x, y, start_width, end_width, bulge].
 */

import { ValueError } from './errors.js';

export const LWPOLYLINE_FORMAT = 'xyseb';

export type LwpolylinePoint = [number, number, number, number, number];

export function validateFormat(format: string): void {
  const letters = format.toLowerCase();
  const seen = new Set<string>();
  for (const c of letters) {
    if (!LWPOLYLINE_FORMAT.includes(c) || seen.has(c)) {
      throw new ValueError('format', `invalid point format "${format}"`);
    }
    seen.add(c);
  }
  if (!seen.has('x') || !seen.has('y')) {
    throw new ValueError('format', `point format "${format}" needs x and y`);
  }
}

/**
 * Reorder caller values into stored order; missing values are 0
 */
export function formatPoint(values: readonly number[], format: string): LwpolylinePoint {
  const point: LwpolylinePoint = [0, 0, 0, 0, 0];
  const letters = format.toLowerCase();
  for (let i = 0; i < letters.length && i < values.length; i++) {
    point[LWPOLYLINE_FORMAT.indexOf(letters[i])] = values[i];
  }
  return point;
}

export function formatPoints(points: readonly (readonly number[])[], format = LWPOLYLINE_FORMAT): LwpolylinePoint[] {
  validateFormat(format);
  return points.map((p) => formatPoint(p, format));
}
