/**
 * Dispersion API - request/response contract between the evaluator and a
 * presentation layer
 */

import {
  CENTRAL_WAVELENGTH,
  DEFAULT_DELTA_N,
  DEFAULT_GVD,
  DEFAULT_K_EXTENT,
  DEFAULT_DOMEGA_EXTENT_MHZ,
  DEFAULT_SAMPLE_COUNT,
} from '@lightfluid/shared';
import type { AxisName, ComputeTimings, ComputeWarning, DispersionMode, ModeAxis } from '@lightfluid/shared';
import { centralWavevector, mhzToAngular, symmetricAxisSpec } from '@lightfluid/core';
import type { DispersionConfig, PhysicalParameters, PhysicalParametersInput } from '@lightfluid/core';
import type { DispersionField } from '../dispersion/index.js';

// ============================================================================
// Request Types
// ============================================================================

/** Evaluate Ω over the mesh of two axes (SI units) */
export interface DispersionGridRequest<M extends DispersionMode = DispersionMode> {
  kind: 'grid';
  mode: M;
  params: PhysicalParametersInput;
  axisA: readonly number[];
  axisB: readonly number[];
}

/** Evaluate Ω and Ω_free along one axis with the other held fixed */
export interface DispersionCutRequest<M extends DispersionMode = DispersionMode> {
  kind: 'cut';
  mode: M;
  params: PhysicalParametersInput;
  fixedAxis: ModeAxis<M>;
  fixedValue: number;
  samples: readonly number[];
}

// ============================================================================
// Response Types
// ============================================================================

/** Cut result */
export interface CutResult {
  mode: DispersionMode;
  fixedAxis: AxisName;
  fixedValue: number;
  varyingAxis: AxisName;
  samples: number[];
  values: number[];
  free: number[];
  min: number;
  max: number;
}

interface DispersionResponseBase {
  /** k_ξ label for the request's parameters (mm⁻¹) */
  healingWavenumber: number;
  timings: ComputeTimings;
  warnings: ComputeWarning[];
}

export interface DispersionGridResponse extends DispersionResponseBase {
  kind: 'grid';
  result: DispersionField;
}

export interface DispersionCutResponse extends DispersionResponseBase {
  kind: 'cut';
  result: CutResult;
}

// ============================================================================
// Engine Interface
// ============================================================================

/** Synchronous, stateless dispersion engine */
export interface DispersionEngineApi {
  computeGrid(request: DispersionGridRequest): DispersionGridResponse;
  computeCut(request: DispersionCutRequest): DispersionCutResponse;
  healingWavenumber(params: PhysicalParametersInput): number;
}

// ============================================================================
// Configuration Helpers
// ============================================================================

/**
 * Get default page configuration for a mode
 */
export function getDefaultDispersionConfig(mode: DispersionMode): DispersionConfig {
  if (mode === 'spatiotemporal') {
    return {
      mode: 'spatiotemporal',
      wavelength: CENTRAL_WAVELENGTH,
      deltaN: DEFAULT_DELTA_N,
      d0: DEFAULT_GVD,
      axisA: symmetricAxisSpec(DEFAULT_K_EXTENT, DEFAULT_SAMPLE_COUNT),
      // Δω range is given in MHz and stored in rad/s
      axisB: symmetricAxisSpec(mhzToAngular(DEFAULT_DOMEGA_EXTENT_MHZ), DEFAULT_SAMPLE_COUNT),
    };
  }

  return {
    mode: 'spatial',
    wavelength: CENTRAL_WAVELENGTH,
    deltaN: DEFAULT_DELTA_N,
    d0: 0,
    axisA: symmetricAxisSpec(DEFAULT_K_EXTENT, DEFAULT_SAMPLE_COUNT),
    axisB: symmetricAxisSpec(DEFAULT_K_EXTENT, DEFAULT_SAMPLE_COUNT),
  };
}

/** Partial config; axes may be overridden field by field */
export type DispersionConfigOverride = Partial<Omit<DispersionConfig, 'axisA' | 'axisB'>> & {
  axisA?: Partial<DispersionConfig['axisA']>;
  axisB?: Partial<DispersionConfig['axisB']>;
};

/**
 * Merge a partial override into a config
 */
export function mergeDispersionConfig(defaults: DispersionConfig, override?: DispersionConfigOverride): DispersionConfig {
  if (!override) return defaults;

  return {
    mode: override.mode ?? defaults.mode,
    wavelength: override.wavelength ?? defaults.wavelength,
    deltaN: override.deltaN ?? defaults.deltaN,
    d0: override.d0 ?? defaults.d0,
    axisA: { ...defaults.axisA, ...override.axisA },
    axisB: { ...defaults.axisB, ...override.axisB },
  };
}

/**
 * Physical parameters described by a config
 */
export function configToParameters(config: DispersionConfig): PhysicalParameters {
  return {
    k0: centralWavevector(config.wavelength),
    deltaN: config.deltaN,
    d0: config.d0,
  };
}
