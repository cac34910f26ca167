import { describe, it, expect } from 'vitest';
import { centralWavevector, createAxis, InvalidParameterError } from '@lightfluid/core';
import { DispersionEngine } from '../src/compute/index.js';
import type { DispersionCutRequest } from '../src/api/index.js';
import { bogoliubovSpatial, freeSpatioTemporal } from '../src/dispersion/index.js';

const k0 = centralWavevector(780e-9);
const axis = createAxis({ min: -7e4, max: 7e4, count: 15 });

describe('DispersionEngine.computeGrid', () => {
  it('returns the field, k_ξ label and timings', () => {
    const engine = new DispersionEngine();
    const resp = engine.computeGrid({ kind: 'grid', mode: 'spatial', params: { k0, deltaN: 1e-5 }, axisA: axis, axisB: axis });

    expect(resp.kind).toBe('grid');
    expect(resp.result.rows).toBe(15);
    expect(resp.result.cols).toBe(15);
    expect(resp.result.values[7][7]).toBe(0);
    expect(resp.healingWavenumber).toBe(25);
    expect(resp.timings.pointCount).toBe(225);
    expect(resp.timings.totalMs).toBeGreaterThanOrEqual(0);
    expect(resp.warnings).toEqual([]);
  });

  it('warns about unordered and empty axes', () => {
    const engine = new DispersionEngine();
    const resp = engine.computeGrid({ kind: 'grid', mode: 'spatial', params: { k0, deltaN: 1e-5 }, axisA: [0, 2e4, 1e4], axisB: [] });

    expect(resp.warnings.map((w) => w.code)).toEqual(['AXIS_NOT_ORDERED', 'EMPTY_AXIS']);
    expect(resp.warnings[0].context).toEqual({ axis: 'kx' });
    expect(resp.warnings[1].context).toEqual({ axis: 'ky' });
    expect(resp.result.values).toEqual([]);
  });

  it('counts unstable points under anomalous dispersion', () => {
    const engine = new DispersionEngine();
    const resp = engine.computeGrid({
      kind: 'grid',
      mode: 'spatiotemporal',
      params: { k0, deltaN: 1e-5, d0: -10e-15 },
      axisA: [0],
      axisB: [-1e6, 0, 1e6],
    });

    // Δω = ±1e6 rad/s at kx = 0 lands on a negative radicand; Δω = 0 gives 0
    expect(resp.warnings).toHaveLength(1);
    expect(resp.warnings[0].code).toBe('UNSTABLE_POINTS');
    expect(resp.warnings[0].context).toEqual({ count: 2 });
    expect(resp.result.min).toBe(0);
    expect(resp.result.max).toBe(0);
  });

  it('throws InvalidParameterError for Δn < 0', () => {
    const engine = new DispersionEngine();
    expect(() =>
      engine.computeGrid({ kind: 'grid', mode: 'spatial', params: { k0, deltaN: -1 }, axisA: axis, axisB: axis })
    ).toThrow(InvalidParameterError);
  });

  it('keeps no state between calls', () => {
    const engine = new DispersionEngine();
    const request = { kind: 'grid', mode: 'spatial', params: { k0, deltaN: 1e-5 }, axisA: axis, axisB: axis } as const;
    const first = engine.computeGrid(request);
    engine.computeGrid({ ...request, params: { k0, deltaN: 9e-5 } });
    const again = engine.computeGrid(request);
    expect(again.result.values).toEqual(first.result.values);
  });
});

describe('DispersionEngine.computeCut', () => {
  it('returns interacting and free curves along Δω at fixed kx', () => {
    const engine = new DispersionEngine();
    const params = { k0, deltaN: 1e-5, d0: 10e-15 };
    const samples = createAxis({ min: -1.5e8, max: 1.5e8, count: 5 });
    const resp = engine.computeCut({ kind: 'cut', mode: 'spatiotemporal', params, fixedAxis: 'kx', fixedValue: 1e4, samples });

    expect(resp.result.varyingAxis).toBe('domega');
    expect(resp.result.samples).toEqual(samples);
    expect(resp.result.free).toEqual(samples.map((w) => freeSpatioTemporal(1e4, w, params)));
    expect(resp.result.values[2]).toBeCloseTo(bogoliubovSpatial(1e4, 0, params), 12);
    expect(resp.result.min).toBe(resp.result.values[2]);
    expect(resp.warnings).toEqual([]);
  });

  it('rejects a fixed axis that does not belong to the mode', () => {
    const engine = new DispersionEngine();
    const request: DispersionCutRequest = {
      kind: 'cut',
      mode: 'spatial',
      params: { k0, deltaN: 1e-5 },
      fixedAxis: 'domega',
      fixedValue: 0,
      samples: axis,
    };
    expect(() => engine.computeCut(request)).toThrow(InvalidParameterError);
  });

  it('warns when the varying axis has no samples', () => {
    const engine = new DispersionEngine();
    const resp = engine.computeCut({ kind: 'cut', mode: 'spatial', params: { k0, deltaN: 1e-5 }, fixedAxis: 'kx', fixedValue: 0, samples: [] });
    expect(resp.warnings.map((w) => w.code)).toEqual(['EMPTY_AXIS']);
    expect(Number.isNaN(resp.result.min)).toBe(true);
  });
});

describe('DispersionEngine.healingWavenumber', () => {
  it('validates and rounds', () => {
    const engine = new DispersionEngine();
    expect(engine.healingWavenumber({ k0, deltaN: 1e-4 })).toBe(81);
    expect(() => engine.healingWavenumber({ k0: 0, deltaN: 1e-4 })).toThrow(InvalidParameterError);
  });
});
