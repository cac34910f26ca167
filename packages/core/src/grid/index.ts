/**
 * Axis sampling and Cartesian mesh construction
 */

import { linspace } from '@lightfluid/shared';
import type { AxisSpec } from '../schema/index.js';

/** Pairwise mesh of two axes, meshgrid layout: rows follow axis B, columns axis A */
export interface Mesh {
  /** a[i][j] = axisA[j] */
  a: number[][];
  /** b[i][j] = axisB[i] */
  b: number[][];
  rows: number;
  cols: number;
}

/**
 * Sample an axis spec into an evenly spaced, strictly increasing sequence
 */
export function createAxis(spec: AxisSpec): number[] {
  return linspace(spec.min, spec.max, spec.count);
}

/**
 * Symmetric axis [-extent, extent]
 */
export function symmetricAxisSpec(extent: number, count: number): AxisSpec {
  return { min: -extent, max: extent, count };
}

/**
 * Combine two axes into a Cartesian mesh of |A| × |B| points
 */
export function createMesh(axisA: readonly number[], axisB: readonly number[]): Mesh {
  const a: number[][] = [];
  const b: number[][] = [];
  for (const valueB of axisB) {
    a.push([...axisA]);
    b.push(axisA.map(() => valueB));
  }
  return { a, b, rows: axisB.length, cols: axisA.length };
}
