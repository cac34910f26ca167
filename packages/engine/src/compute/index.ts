/**
 * CPU compute implementation - reference dispersion engine
 */

import { MODE_AXES, finiteExtent, isStrictlyMonotonic } from '@lightfluid/shared';
import type { ComputeWarning } from '@lightfluid/shared';
import { parsePhysicalParameters } from '@lightfluid/core';
import type { PhysicalParametersInput } from '@lightfluid/core';
import type {
  DispersionEngineApi,
  DispersionGridRequest,
  DispersionGridResponse,
  DispersionCutRequest,
  DispersionCutResponse,
  CutResult,
} from '../api/index.js';
import {
  evaluateGrid,
  evaluateCut,
  evaluateFreeCut,
  healingWavenumber,
  varyingAxisOf,
} from '../dispersion/index.js';

// ============================================================================
// Warnings
// ============================================================================

function axisWarnings(name: string, samples: readonly number[]): ComputeWarning[] {
  if (samples.length === 0) {
    return [{ code: 'EMPTY_AXIS', message: `Axis ${name} has no samples`, severity: 'info', context: { axis: name } }];
  }
  if (!isStrictlyMonotonic(samples)) {
    return [
      {
        code: 'AXIS_NOT_ORDERED',
        message: `Axis ${name} is not strictly ordered`,
        severity: 'warning',
        context: { axis: name },
      },
    ];
  }
  return [];
}

// NaN entries come from a negative radicand (D0 < 0 in spatio-temporal mode)
function unstableWarnings(values: Iterable<number>): ComputeWarning[] {
  let count = 0;
  for (const v of values) {
    if (Number.isNaN(v)) count++;
  }
  if (count === 0) return [];
  return [
    {
      code: 'UNSTABLE_POINTS',
      message: `${count} point(s) have a negative radicand and evaluate to NaN`,
      severity: 'warning',
      context: { count },
    },
  ];
}

// ============================================================================
// Engine
// ============================================================================

/**
 * Stateless dispersion engine. Every call validates its parameters before
 * evaluating, keeps no per-call state and may be shared across sessions.
 */
export class DispersionEngine implements DispersionEngineApi {
  computeGrid(request: DispersionGridRequest): DispersionGridResponse {
    const start = performance.now();
    const params = parsePhysicalParameters(request.params);
    const validateMs = performance.now() - start;

    const computeStart = performance.now();
    const result = evaluateGrid(request.mode, params, request.axisA, request.axisB);
    const computeMs = performance.now() - computeStart;

    const [nameA, nameB] = MODE_AXES[request.mode];
    const warnings = [
      ...axisWarnings(nameA, request.axisA),
      ...axisWarnings(nameB, request.axisB),
      ...unstableWarnings(result.values.flat()),
    ];

    return {
      kind: 'grid',
      result,
      healingWavenumber: healingWavenumber(params.k0, params.deltaN),
      timings: { totalMs: performance.now() - start, validateMs, computeMs, pointCount: result.rows * result.cols },
      warnings,
    };
  }

  computeCut(request: DispersionCutRequest): DispersionCutResponse {
    const start = performance.now();
    const params = parsePhysicalParameters(request.params);
    const varyingAxis = varyingAxisOf(request.mode, request.fixedAxis);
    const validateMs = performance.now() - start;

    const computeStart = performance.now();
    const { mode, fixedAxis, fixedValue, samples } = request;
    const values = evaluateCut(mode, params, fixedAxis, fixedValue, samples);
    const free = evaluateFreeCut(mode, params, fixedAxis, fixedValue, samples);
    const computeMs = performance.now() - computeStart;

    const { min, max } = finiteExtent(values);
    const result: CutResult = {
      mode,
      fixedAxis,
      fixedValue,
      varyingAxis,
      samples: [...samples],
      values,
      free,
      min,
      max,
    };

    return {
      kind: 'cut',
      result,
      healingWavenumber: healingWavenumber(params.k0, params.deltaN),
      timings: { totalMs: performance.now() - start, validateMs, computeMs, pointCount: samples.length },
      warnings: [...axisWarnings(varyingAxis, samples), ...unstableWarnings(values)],
    };
  }

  healingWavenumber(params: PhysicalParametersInput): number {
    const { k0, deltaN } = parsePhysicalParameters(params);
    return healingWavenumber(k0, deltaN);
  }
}
