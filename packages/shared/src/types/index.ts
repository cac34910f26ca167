/**
 * Shared type definitions
 */

// ============================================================================
// Dispersion Modes & Axes
// ============================================================================

/** Formula variant, selected by which axes are active */
export type DispersionMode = 'spatial' | 'spatiotemporal';

/** Axis identifiers: transverse wavevectors (rad/m) and frequency shift (rad/s) */
export type AxisName = 'kx' | 'ky' | 'domega';

/** Ordered (axis A, axis B) pair for each mode */
export interface ModeAxes {
  spatial: readonly ['kx', 'ky'];
  spatiotemporal: readonly ['kx', 'domega'];
}

/** Axes that belong to a given mode */
export type ModeAxis<M extends DispersionMode> = ModeAxes[M][number];

export const MODE_AXES: { readonly [M in DispersionMode]: ModeAxes[M] } = {
  spatial: ['kx', 'ky'],
  spatiotemporal: ['kx', 'domega'],
};

/** Type guard for the axes of a mode */
export function isModeAxis<M extends DispersionMode>(mode: M, axis: string): axis is ModeAxis<M> {
  const axes: readonly AxisName[] = MODE_AXES[mode];
  return axes.some((name) => name === axis);
}

// ============================================================================
// Unit Types (Branded for type safety)
// ============================================================================

/** Wavenumber in rad/m */
export type PerMeter = number & { readonly __brand: 'PerMeter' };

/** Wavenumber in mm⁻¹ (display unit) */
export type PerMillimeter = number & { readonly __brand: 'PerMillimeter' };

/** Angular frequency in rad/s */
export type RadPerSecond = number & { readonly __brand: 'RadPerSecond' };

/** Frequency shift in MHz (display unit) */
export type Megahertz = number & { readonly __brand: 'Megahertz' };

// ============================================================================
// Result Types
// ============================================================================

/** Warning severity levels */
export type WarningSeverity = 'info' | 'warning' | 'error';

/** Computation warning */
export interface ComputeWarning {
  code: string;
  message: string;
  severity: WarningSeverity;
  context?: Record<string, unknown>;
}

/** Timing information for performance diagnostics */
export interface ComputeTimings {
  totalMs: number;
  validateMs?: number;
  computeMs?: number;
  pointCount?: number;
}

/** Finite range of a data set */
export interface Extent {
  min: number;
  max: number;
}

// ============================================================================
// Helper creators
// ============================================================================

/** Create a branded PerMeter value */
export function perMeter(value: number): PerMeter {
  return value as PerMeter;
}

/** Create a branded PerMillimeter value */
export function perMillimeter(value: number): PerMillimeter {
  return value as PerMillimeter;
}

/** Create a branded RadPerSecond value */
export function radPerSecond(value: number): RadPerSecond {
  return value as RadPerSecond;
}

/** Create a branded Megahertz value */
export function megahertz(value: number): Megahertz {
  return value as Megahertz;
}
