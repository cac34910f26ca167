/**
 * Physical units and conversions between display and SI units
 */

import {
  PER_MM_IN_PER_M,
  MHZ_IN_RAD_PER_S,
  DELTA_N_SLIDER_UNIT,
  GVD_SLIDER_UNIT,
  CENTRAL_WAVELENGTH,
  perMeter,
  perMillimeter,
  radPerSecond,
  megahertz,
} from '@lightfluid/shared';
import type { PerMeter, PerMillimeter, RadPerSecond, Megahertz } from '@lightfluid/shared';

// ============================================================================
// Wavevector
// ============================================================================

/**
 * Central wavevector k0 = 2π/λ0 (rad/m)
 * @param wavelengthM - Central wavelength in meters
 */
export function centralWavevector(wavelengthM: number = CENTRAL_WAVELENGTH): PerMeter {
  return perMeter((2 * Math.PI) / wavelengthM);
}

/** mm⁻¹ → m⁻¹ */
export function perMmToPerM(value: number): PerMeter {
  return perMeter(value * PER_MM_IN_PER_M);
}

/** m⁻¹ → mm⁻¹ */
export function perMToPerMm(value: number): PerMillimeter {
  return perMillimeter(value / PER_MM_IN_PER_M);
}

// ============================================================================
// Frequency Shift
// ============================================================================

/**
 * MHz → rad/s, the ×1e6 conversion the spatio-temporal formula expects
 */
export function mhzToAngular(value: number): RadPerSecond {
  return radPerSecond(value * MHZ_IN_RAD_PER_S);
}

/** rad/s → MHz */
export function angularToMhz(value: number): Megahertz {
  return megahertz(value / MHZ_IN_RAD_PER_S);
}

// ============================================================================
// Slider Scales
// ============================================================================

/** Nonlinear index slider (×1e-5) → Δn */
export function deltaNFromSlider(value: number): number {
  return value * DELTA_N_SLIDER_UNIT;
}

/** GVD slider (×1e-15) → D0 in s²/m */
export function gvdFromSlider(value: number): number {
  return value * GVD_SLIDER_UNIT;
}
