/**
 * Shared utility functions
 */

import type { Extent } from '../types/index.js';

// ============================================================================
// Numeric Utilities
// ============================================================================

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Round to the nearest integer, ties to the even neighbour (2.5 → 2, 3.5 → 4)
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

// ============================================================================
// Array Utilities
// ============================================================================

/**
 * Evenly spaced samples over [start, stop], both endpoints included.
 * The last sample is exactly `stop`; a single sample is `start`.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];

  const step = (stop - start) / (count - 1);
  const result: number[] = [];
  for (let i = 0; i < count - 1; i++) {
    result.push(start + i * step);
  }
  result.push(stop);
  return result;
}

/**
 * Check that a sequence is strictly increasing or strictly decreasing
 */
export function isStrictlyMonotonic(values: readonly number[]): boolean {
  if (values.length < 2) return true;
  const ascending = values[1] > values[0];
  for (let i = 1; i < values.length; i++) {
    const diff = values[i] - values[i - 1];
    if (ascending ? !(diff > 0) : !(diff < 0)) return false;
  }
  return true;
}

/**
 * Min and max over the finite entries; NaN bounds when there are none
 */
export function finiteExtent(values: Iterable<number>): Extent {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (!Number.isFinite(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (min > max) return { min: NaN, max: NaN };
  return { min, max };
}
