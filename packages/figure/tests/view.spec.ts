import { describe, it, expect, vi, afterEach } from 'vitest';
import { centralWavevector, gvdFromSlider, InvalidParameterError } from '@lightfluid/core';
import { DispersionEngine } from '@lightfluid/engine';
import type { DispersionGridRequest, DispersionGridResponse } from '@lightfluid/engine';
import { renderDispersionView } from '../src/view/index.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('renderDispersionView - spatial page', () => {
  it('renders the default page', () => {
    const result = renderDispersionView('spatial');

    expect(result.view.title).toBe('Bogoliubov Dispersion off k=0');
    expect(result.healingWavenumber).toBe(25);
    expect(result.params).toEqual({ k0: centralWavevector(780e-9), deltaN: 1e-5, d0: 0 });
    expect(result.figure.layout.title).toEqual({ text: 'Bogoliubov Dispersion - k_xi = 25 mm⁻¹' });
    expect(result.controls.map((c) => c.id)).toEqual(['deltaN', 'kx']);
    expect(result.warnings).toEqual([]);
  });

  it('draws the cut at the kx slider value over the ky axis', () => {
    const [surface, cutLine, interacting] = renderDispersionView('spatial').figure.data;

    expect(surface.z).toHaveLength(100);
    expect(cutLine.x).toEqual(new Array(100).fill(10));
    expect(interacting.x).toHaveLength(100);
    expect(interacting.x?.[0]).toBe(-70);
    expect(interacting.x?.[99]).toBe(70);
  });

  it('clamps slider values into range', () => {
    const [, cutLine] = renderDispersionView('spatial', { kx: 50 }).figure.data;
    expect(cutLine.x).toEqual(new Array(100).fill(30));
  });

  it('raises k_ξ with Δn', () => {
    const result = renderDispersionView('spatial', { deltaN: 10 });
    expect(result.healingWavenumber).toBe(81);
  });

  it('rejects malformed control values', () => {
    expect(() => renderDispersionView('spatial', { deltaN: 'high' })).toThrow(InvalidParameterError);
  });

  it('applies config Δn and D0 when their controls are unset', () => {
    const result = renderDispersionView('spatial', {}, { config: { deltaN: 5e-5, d0: 3e-15 } });

    expect(result.params.deltaN).toBe(5e-5);
    expect(result.params.d0).toBe(3e-15);
  });

  it('lets a set slider win over the config Δn', () => {
    const result = renderDispersionView('spatial', { deltaN: 2 }, { config: { deltaN: 5e-5 } });
    expect(result.params.deltaN).toBe(2 * 1e-5);
  });

  it('applies the config wavelength and grid', () => {
    const result = renderDispersionView('spatial', {}, { config: { wavelength: 390e-9, axisA: { count: 11 } } });

    expect(result.params.k0).toBe(centralWavevector(390e-9));
    expect(result.figure.data[0].z).toHaveLength(100);
    expect(result.figure.data[2].x).toHaveLength(100);
    expect(result.figure.data[0].x?.[0]).toHaveLength(11);
  });

  it('returns frozen control definitions', () => {
    const result = renderDispersionView('spatial');

    expect(Object.isFrozen(result.controls[0])).toBe(true);
    expect(Reflect.set(result.controls[0], 'defaultValue', 7)).toBe(false);
    expect(renderDispersionView('spatial').params.deltaN).toBe(1e-5);
  });

  it('rejects an invalid config override', () => {
    expect(() => renderDispersionView('spatial', {}, { config: { axisA: { min: 1, max: -1 } } })).toThrow(
      InvalidParameterError
    );
  });
});

describe('renderDispersionView - spatio-temporal page', () => {
  it('takes D0 from the page config until the GVD slider is set', () => {
    const result = renderDispersionView('spatiotemporal');

    expect(result.view.title).toBe('Bogoliubov Dispersion with Temporal Dimension');
    expect(result.params.d0).toBe(10e-15);
    expect(result.controls.map((c) => c.id)).toEqual(['deltaN', 'gvd', 'cutMode', 'kx']);
    expect(renderDispersionView('spatiotemporal', { gvd: 40 }).params.d0).toBe(gvdFromSlider(40));
  });

  it('cuts along kx when Δω is fixed', () => {
    const result = renderDispersionView('spatiotemporal', { cutMode: 'fix_domega', domega: 50 });
    const [, cutLine] = result.figure.data;

    expect(cutLine.x).toHaveLength(100);
    expect(cutLine.y).toEqual(new Array(100).fill(50));
    expect(result.figure.layout.xaxis?.title).toEqual({ text: 'Wavevector k_x (mm⁻¹)' });
    expect(result.controls.map((c) => c.id)).toEqual(['deltaN', 'gvd', 'cutMode', 'domega']);
  });

  it('cuts along Δω when kx is fixed', () => {
    const result = renderDispersionView('spatiotemporal', { cutMode: 'fix_kx', kx: 0 });
    const [, cutLine, interacting] = result.figure.data;

    expect(cutLine.x).toEqual(new Array(100).fill(0));
    expect(interacting.x?.[0]).toBe(-150);
    expect(result.figure.layout.xaxis?.title).toEqual({ text: 'Frequency Shift Δω (MHz)' });
  });
});

describe('renderDispersionView - warnings', () => {
  class FlaggingEngine extends DispersionEngine {
    override computeGrid(request: DispersionGridRequest): DispersionGridResponse {
      const response = super.computeGrid(request);
      return {
        ...response,
        warnings: [...response.warnings, { code: 'TEST_WARNING', message: 'flagged', severity: 'warning' }],
      };
    }
  }

  it('logs engine warnings and returns them', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = renderDispersionView('spatial', {}, { engine: new FlaggingEngine() });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[DispersionView] TEST_WARNING: flagged');
    expect(result.warnings.map((w) => w.code)).toEqual(['TEST_WARNING']);
  });
});
