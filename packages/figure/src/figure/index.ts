/**
 * Plotly figure data for a dispersion surface and its cut
 *
 * Layout is a one-row, two-column subplot grid: a 3D scene holding the surface
 * and the cut line, and an xy panel comparing the interacting and free curves
 * along the cut.
 */

import type { Layout, PlotData } from 'plotly.js';
import { MODE_AXES } from '@lightfluid/shared';
import type { AxisName } from '@lightfluid/shared';
import { angularToMhz, createMesh, perMToPerMm } from '@lightfluid/core';
import type { CutResult, DispersionField } from '@lightfluid/engine';

// Column widths 0.7 / 0.3 with 0.05 spacing
const SCENE_DOMAIN_END = 0.665;
const XY_DOMAIN_START = 0.715;

const AXIS_TITLES: Record<AxisName, string> = {
  kx: 'Wavevector k_x (mm⁻¹)',
  ky: 'Wavevector k_y (mm⁻¹)',
  domega: 'Frequency Shift Δω (MHz)',
};

export interface DispersionFigureInput {
  grid: DispersionField;
  cut: CutResult;
  /** k_ξ label (mm⁻¹) */
  healingWavenumber: number;
}

export interface DispersionFigure {
  data: Partial<PlotData>[];
  layout: Partial<Layout>;
}

/** Convert SI axis samples to display units: mm⁻¹ for wavevectors, MHz for Δω */
export function toDisplayUnits(axis: AxisName, value: number): number {
  return axis === 'domega' ? angularToMhz(value) : perMToPerMm(value);
}

export function axisTitle(axis: AxisName): string {
  return AXIS_TITLES[axis];
}

export function figureTitle(healingWavenumber: number): string {
  return `Bogoliubov Dispersion - k_xi = ${healingWavenumber} mm⁻¹`;
}

/**
 * Build surface, 3D cut line, and the 2D interacting/free comparison
 */
export function buildDispersionFigure(input: DispersionFigureInput): DispersionFigure {
  const { grid, cut, healingWavenumber } = input;
  const [nameA, nameB] = MODE_AXES[grid.mode];

  const mesh = createMesh(
    grid.axisA.map((v) => toDisplayUnits(nameA, v)),
    grid.axisB.map((v) => toDisplayUnits(nameB, v))
  );
  const cutSamples = cut.samples.map((v) => toDisplayUnits(cut.varyingAxis, v));
  const fixedLine = cut.samples.map(() => toDisplayUnits(cut.fixedAxis, cut.fixedValue));
  const cutAlongB = cut.fixedAxis === nameA;

  const surface: Partial<PlotData> = {
    type: 'surface',
    x: mesh.a,
    y: mesh.b,
    z: grid.values,
    colorscale: 'Viridis',
    opacity: 0.8,
    showscale: false,
    name: 'Dispersion Surface',
  };

  const cutLine: Partial<PlotData> = {
    type: 'scatter3d',
    x: cutAlongB ? fixedLine : cutSamples,
    y: cutAlongB ? cutSamples : fixedLine,
    z: cut.values,
    mode: 'lines',
    line: { color: 'orange', dash: 'dash', width: 6 },
    name: 'Cut',
  };

  const interacting: Partial<PlotData> = {
    type: 'scatter',
    x: cutSamples,
    y: cut.values,
    mode: 'lines',
    name: 'Interacting Dispersion',
    line: { color: 'red', dash: 'dash' },
  };

  const free: Partial<PlotData> = {
    type: 'scatter',
    x: cutSamples,
    y: cut.free,
    mode: 'lines',
    name: 'Free Dispersion',
    line: { color: 'blue' },
  };

  const layout: Partial<Layout> = {
    title: { text: figureTitle(healingWavenumber) },
    margin: { l: 0, r: 0, b: 0, t: 40 },
    // keeps the 3D camera when the figure is replaced on a control change
    uirevision: 'constant',
    scene: {
      domain: { x: [0, SCENE_DOMAIN_END], y: [0, 1] },
      xaxis: { title: { text: axisTitle(nameA) } },
      yaxis: { title: { text: axisTitle(nameB) } },
      zaxis: { title: { text: 'Frequency Ω_B (1/m)' } },
    },
    xaxis: { domain: [XY_DOMAIN_START, 1], title: { text: axisTitle(cut.varyingAxis) } },
    yaxis: { title: { text: 'Frequency Ω (1/m)' } },
  };

  return { data: [surface, cutLine, interacting, free], layout };
}
