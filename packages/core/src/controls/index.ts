/**
 * Page controls (sliders and the cut direction switch) and their resolution
 * into SI physical parameters
 */

import { clamp } from '@lightfluid/shared';
import type { AxisName, DispersionMode } from '@lightfluid/shared';
import {
  SpatialControlValuesSchema,
  SpatioTemporalControlValuesSchema,
  type CutMode,
} from '../schema/index.js';
import { InvalidParameterError } from '../errors/index.js';
import { deltaNFromSlider, gvdFromSlider, mhzToAngular, perMmToPerM } from '../units/index.js';

// ============================================================================
// Control Definitions
// ============================================================================

// Definitions are frozen: they are shared by every page render and session.

export interface SliderControl {
  readonly kind: 'slider';
  readonly id: 'deltaN' | 'gvd' | 'kx' | 'domega';
  readonly label: string;
  readonly min: number;
  readonly max: number;
  readonly step: number;
  readonly defaultValue: number;
}

export interface ChoiceOption {
  readonly label: string;
  readonly value: CutMode;
}

export interface ChoiceControl {
  readonly kind: 'choice';
  readonly id: 'cutMode';
  readonly label: string;
  readonly options: readonly ChoiceOption[];
  readonly defaultValue: CutMode;
}

export type ControlDefinition = SliderControl | ChoiceControl;

export const DELTA_N_CONTROL = Object.freeze<SliderControl>({
  kind: 'slider',
  id: 'deltaN',
  label: 'Nonlinear Index (Δn) [×10⁻⁵] (log scale)',
  min: 0.1,
  max: 10,
  step: 0.1,
  defaultValue: 1,
});

export const GVD_CONTROL = Object.freeze<SliderControl>({
  kind: 'slider',
  id: 'gvd',
  label: 'Group Velocity Dispersion (GVD) D₀ [×10⁻¹⁵ s²/m]',
  min: 1,
  max: 100,
  step: 1,
  defaultValue: 10,
});

export const KX_CONTROL = Object.freeze<SliderControl>({
  kind: 'slider',
  id: 'kx',
  label: 'Fixed kx Value (in mm⁻¹)',
  min: 0,
  max: 30,
  step: 1,
  defaultValue: 10,
});

export const DOMEGA_CONTROL = Object.freeze<SliderControl>({
  kind: 'slider',
  id: 'domega',
  label: 'Fixed Δω Value (in MHz)',
  min: 0,
  max: 100,
  step: 1,
  defaultValue: 0,
});

export const CUT_MODE_CONTROL = Object.freeze<ChoiceControl>({
  kind: 'choice',
  id: 'cutMode',
  label: 'Cut Direction:',
  options: Object.freeze([
    Object.freeze<ChoiceOption>({ label: 'Fixed kx', value: 'fix_kx' }),
    Object.freeze<ChoiceOption>({ label: 'Fixed Δω', value: 'fix_domega' }),
  ]),
  defaultValue: 'fix_kx',
});

/** Controls shown on each page, in display order */
export const PAGE_CONTROLS: { readonly [M in DispersionMode]: readonly ControlDefinition[] } = Object.freeze({
  spatial: Object.freeze([DELTA_N_CONTROL, KX_CONTROL]),
  spatiotemporal: Object.freeze([DELTA_N_CONTROL, GVD_CONTROL, CUT_MODE_CONTROL, KX_CONTROL, DOMEGA_CONTROL]),
});

// ============================================================================
// Resolution
// ============================================================================

/** Control values converted to SI and to a cut selection */
export interface ResolvedControls {
  deltaN: number;
  /** s²/m; the spatial formula does not read it */
  d0: number;
  fixedAxis: AxisName;
  /** rad/m for kx, rad/s for domega */
  fixedValue: number;
}

/** SI values used in place of slider defaults when a control value is missing */
export type ControlFallback = Partial<Pick<ResolvedControls, 'deltaN' | 'd0'>>;

function sliderValue(control: SliderControl, value: number | undefined): number {
  return value === undefined ? control.defaultValue : clamp(value, control.min, control.max);
}

function resolveDeltaN(value: number | undefined, fallback: ControlFallback): number {
  if (value === undefined && fallback.deltaN !== undefined) return fallback.deltaN;
  return deltaNFromSlider(sliderValue(DELTA_N_CONTROL, value));
}

/**
 * Resolve display-unit control values for a page.
 * Missing values take the fallback, else the slider default; numbers are
 * clamped into the slider range; values of the wrong type raise
 * InvalidParameterError.
 */
export function resolveControls(
  page: DispersionMode,
  values: unknown = {},
  fallback: ControlFallback = {}
): ResolvedControls {
  if (page === 'spatial') {
    const parsed = SpatialControlValuesSchema.safeParse(values);
    if (!parsed.success) throw InvalidParameterError.fromZod(parsed.error, 'controls');
    const { deltaN, kx } = parsed.data;
    return {
      deltaN: resolveDeltaN(deltaN, fallback),
      d0: fallback.d0 ?? 0,
      fixedAxis: 'kx',
      fixedValue: perMmToPerM(sliderValue(KX_CONTROL, kx)),
    };
  }

  const parsed = SpatioTemporalControlValuesSchema.safeParse(values);
  if (!parsed.success) throw InvalidParameterError.fromZod(parsed.error, 'controls');
  const { deltaN, gvd, cutMode = CUT_MODE_CONTROL.defaultValue, kx, domega } = parsed.data;
  const common = {
    deltaN: resolveDeltaN(deltaN, fallback),
    d0: gvd === undefined && fallback.d0 !== undefined ? fallback.d0 : gvdFromSlider(sliderValue(GVD_CONTROL, gvd)),
  };
  if (cutMode === 'fix_kx') {
    return { ...common, fixedAxis: 'kx', fixedValue: perMmToPerM(sliderValue(KX_CONTROL, kx)) };
  }
  return { ...common, fixedAxis: 'domega', fixedValue: mhzToAngular(sliderValue(DOMEGA_CONTROL, domega)) };
}

/**
 * Controls to display for the given values; the spatio-temporal page shows
 * only the slider matching the selected cut direction
 */
export function visibleControls(page: DispersionMode, values: { cutMode?: CutMode } = {}): ControlDefinition[] {
  const controls = [...PAGE_CONTROLS[page]];
  if (page === 'spatial') return controls;
  const hidden = (values.cutMode ?? CUT_MODE_CONTROL.defaultValue) === 'fix_kx' ? 'domega' : 'kx';
  return controls.filter((control) => control.id !== hidden);
}
