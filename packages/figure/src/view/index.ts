/**
 * Dispersion view pipeline: control values in, figure out.
 * One synchronous call per control change; nothing is cached between calls.
 */

import { MODE_AXES } from '@lightfluid/shared';
import type { ComputeWarning, DispersionMode } from '@lightfluid/shared';
import { createAxis, parseDispersionConfig, resolveControls, visibleControls } from '@lightfluid/core';
import type { ControlDefinition, DispersionConfig, PhysicalParameters } from '@lightfluid/core';
import {
  DispersionEngine,
  configToParameters,
  getDefaultDispersionConfig,
  mergeDispersionConfig,
} from '@lightfluid/engine';
import type { DispersionConfigOverride, DispersionEngineApi } from '@lightfluid/engine';
import { buildDispersionFigure, type DispersionFigure } from '../figure/index.js';

export interface DispersionViewDefinition {
  mode: DispersionMode;
  title: string;
}

export const DISPERSION_VIEWS: { readonly [M in DispersionMode]: DispersionViewDefinition } = {
  spatial: { mode: 'spatial', title: 'Bogoliubov Dispersion off k=0' },
  spatiotemporal: { mode: 'spatiotemporal', title: 'Bogoliubov Dispersion with Temporal Dimension' },
};

export interface RenderOptions {
  engine?: DispersionEngineApi;
  /** Grid, wavelength, and Δn/D0 for controls left unset; the page fixes the mode */
  config?: Omit<DispersionConfigOverride, 'mode'>;
}

export interface DispersionViewResult {
  view: DispersionViewDefinition;
  figure: DispersionFigure;
  params: PhysicalParameters;
  healingWavenumber: number;
  controls: ControlDefinition[];
  warnings: ComputeWarning[];
}

const defaultEngine = new DispersionEngine();

/**
 * Render one page for the given control values (display units).
 * @throws InvalidParameterError on malformed control values or config
 */
export function renderDispersionView(
  page: DispersionMode,
  controlValues: unknown = {},
  options: RenderOptions = {}
): DispersionViewResult {
  const engine = options.engine ?? defaultEngine;
  const config: DispersionConfig = parseDispersionConfig(
    mergeDispersionConfig(getDefaultDispersionConfig(page), { ...options.config, mode: page })
  );
  const resolved = resolveControls(page, controlValues, { deltaN: config.deltaN, d0: config.d0 });
  const params: PhysicalParameters = { ...configToParameters(config), deltaN: resolved.deltaN, d0: resolved.d0 };

  const axisA = createAxis(config.axisA);
  const axisB = createAxis(config.axisB);
  const grid = engine.computeGrid({ kind: 'grid', mode: page, params, axisA, axisB });
  const cut = engine.computeCut({
    kind: 'cut',
    mode: page,
    params,
    fixedAxis: resolved.fixedAxis,
    fixedValue: resolved.fixedValue,
    samples: resolved.fixedAxis === MODE_AXES[page][0] ? axisB : axisA,
  });

  const warnings = [...grid.warnings, ...cut.warnings];
  for (const warning of warnings) {
    console.warn(`[DispersionView] ${warning.code}: ${warning.message}`);
  }

  return {
    view: DISPERSION_VIEWS[page],
    figure: buildDispersionFigure({ grid: grid.result, cut: cut.result, healingWavenumber: grid.healingWavenumber }),
    params,
    healingWavenumber: grid.healingWavenumber,
    controls: visibleControls(page, { cutMode: resolved.fixedAxis === 'domega' ? 'fix_domega' : 'fix_kx' }),
    warnings,
  };
}
