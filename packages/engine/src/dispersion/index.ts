/**
 * Bogoliubov dispersion of a fluid of light
 *
 * Spatial mode, axes (kx, ky) in rad/m:
 *   K = sqrt(kx² + ky²)
 *   Ω = sqrt((K²/2k0)² + K²·Δn)                        Ω_free = K²/2k0
 *
 * Spatio-temporal mode, axes (kx in rad/m, Δω in rad/s):
 *   K = |kx|
 *   Ω = sqrt((K²/2k0 + D0·Δω²)² + K²·Δn + Δω²·D0·k0·Δn)  Ω_free = K²/2k0 + D0·Δω²
 *
 * The spatio-temporal branch has no ky dependence. With D0 < 0 its radicand
 * can go negative (modulational instability); those points evaluate to NaN.
 */

import { HEALING_LABEL_SCALE, MODE_AXES, finiteExtent, isModeAxis, roundHalfEven } from '@lightfluid/shared';
import type { AxisName, DispersionMode, ModeAxis } from '@lightfluid/shared';
import { InvalidParameterError, parsePhysicalParameters } from '@lightfluid/core';
import type { PhysicalParameters, PhysicalParametersInput } from '@lightfluid/core';

// ============================================================================
// Result Types
// ============================================================================

/** Dispersion evaluated over a mesh; values[i][j] belongs to (axisA[j], axisB[i]) */
export interface DispersionField {
  mode: DispersionMode;
  axisA: number[];
  axisB: number[];
  rows: number;
  cols: number;
  values: number[][];
  /** Smallest finite value, NaN when there is none */
  min: number;
  /** Largest finite value, NaN when there is none */
  max: number;
}

// ============================================================================
// Scalar Formulas
// ============================================================================

/** Ω at (kx, ky) */
export function bogoliubovSpatial(kx: number, ky: number, params: PhysicalParameters): number {
  const K2 = kx * kx + ky * ky;
  const kinetic = K2 / (2 * params.k0);
  return Math.sqrt(kinetic * kinetic + K2 * params.deltaN);
}

/** Non-interacting (parabolic) reference at (kx, ky) */
export function freeSpatial(kx: number, ky: number, params: PhysicalParameters): number {
  return (kx * kx + ky * ky) / (2 * params.k0);
}

/** Ω at (kx, Δω), Δω in rad/s */
export function bogoliubovSpatioTemporal(kx: number, domega: number, params: PhysicalParameters): number {
  const { k0, deltaN, d0 } = params;
  const K = Math.abs(kx);
  const w2 = domega * domega;
  const free = (K * K) / (2 * k0) + d0 * w2;
  const radicand = free * free + K * K * deltaN + w2 * d0 * k0 * deltaN;
  return radicand < 0 ? NaN : Math.sqrt(radicand);
}

/** Non-interacting reference at (kx, Δω) */
export function freeSpatioTemporal(kx: number, domega: number, params: PhysicalParameters): number {
  const K = Math.abs(kx);
  return (K * K) / (2 * params.k0) + params.d0 * domega * domega;
}

/**
 * Ω at (a, b) on the axes of `mode`. Parameters are trusted here; the grid
 * and cut entry points validate them first.
 */
export function dispersionAt(mode: DispersionMode, params: PhysicalParameters, a: number, b: number): number {
  return mode === 'spatial' ? bogoliubovSpatial(a, b, params) : bogoliubovSpatioTemporal(a, b, params);
}

/** Ω_free at (a, b) on the axes of `mode` */
export function freeDispersionAt(mode: DispersionMode, params: PhysicalParameters, a: number, b: number): number {
  return mode === 'spatial' ? freeSpatial(a, b, params) : freeSpatioTemporal(a, b, params);
}

// ============================================================================
// Grid & Cut Evaluation
// ============================================================================

/**
 * Evaluate Ω over the mesh of two axes.
 * @throws InvalidParameterError when k0 ≤ 0, Δn < 0 or a parameter is not finite
 */
export function evaluateGrid(
  mode: DispersionMode,
  params: PhysicalParametersInput,
  axisA: readonly number[],
  axisB: readonly number[]
): DispersionField {
  const p = parsePhysicalParameters(params);
  const values = axisB.map((b) => axisA.map((a) => dispersionAt(mode, p, a, b)));
  const { min, max } = finiteExtent(values.flat());
  return {
    mode,
    axisA: [...axisA],
    axisB: [...axisB],
    rows: axisB.length,
    cols: axisA.length,
    values,
    min,
    max,
  };
}

/** The axis that varies along a cut fixing `fixedAxis` */
export function varyingAxisOf<M extends DispersionMode>(mode: M, fixedAxis: ModeAxis<M>): ModeAxis<M>;
export function varyingAxisOf(mode: DispersionMode, fixedAxis: AxisName): AxisName;
export function varyingAxisOf(mode: DispersionMode, fixedAxis: AxisName): AxisName {
  const [axisA, axisB] = MODE_AXES[mode];
  if (!isModeAxis(mode, fixedAxis)) {
    throw new InvalidParameterError('fixedAxis', `"${fixedAxis}" is not an axis of ${mode} mode`);
  }
  return fixedAxis === axisA ? axisB : axisA;
}

function evaluateAlongCut(
  formula: typeof dispersionAt,
  mode: DispersionMode,
  params: PhysicalParametersInput,
  fixedAxis: AxisName,
  fixedValue: number,
  samples: readonly number[]
): number[] {
  const p = parsePhysicalParameters(params);
  const fixesA = varyingAxisOf(mode, fixedAxis) !== MODE_AXES[mode][0];
  return samples.map((s) => (fixesA ? formula(mode, p, fixedValue, s) : formula(mode, p, s, fixedValue)));
}

/**
 * Evaluate Ω along a line where `fixedAxis` is held at `fixedValue` and the
 * other axis of the mode runs over `samples`.
 * @throws InvalidParameterError on invalid parameters or an axis foreign to the mode
 */
export function evaluateCut<M extends DispersionMode>(
  mode: M,
  params: PhysicalParametersInput,
  fixedAxis: ModeAxis<M>,
  fixedValue: number,
  samples: readonly number[]
): number[] {
  return evaluateAlongCut(dispersionAt, mode, params, fixedAxis, fixedValue, samples);
}

/**
 * Non-interacting reference along the same cut as evaluateCut
 */
export function evaluateFreeCut<M extends DispersionMode>(
  mode: M,
  params: PhysicalParametersInput,
  fixedAxis: ModeAxis<M>,
  fixedValue: number,
  samples: readonly number[]
): number[] {
  return evaluateAlongCut(freeDispersionAt, mode, params, fixedAxis, fixedValue, samples);
}

// ============================================================================
// Derived Quantities
// ============================================================================

/**
 * Healing-length wavenumber label k_ξ = round(k0·sqrt(Δn)·1e-3), in mm⁻¹,
 * ties to even. Display only; never fed back into the formula.
 */
export function healingWavenumber(k0: number, deltaN: number): number {
  const p = parsePhysicalParameters({ k0, deltaN });
  return roundHalfEven(p.k0 * Math.sqrt(p.deltaN) * HEALING_LABEL_SCALE);
}
