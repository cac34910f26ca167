/**
 * Physical and application constants
 */

// ============================================================================
// Physical Constants
// ============================================================================

/** Central wavelength of the probe beam (m) - rubidium D2 line */
export const CENTRAL_WAVELENGTH = 780e-9;

/** Default nonlinear index shift Δn */
export const DEFAULT_DELTA_N = 1e-5;

/** Default group velocity dispersion D0 (s²/m) */
export const DEFAULT_GVD = 10e-15;

// ============================================================================
// Unit Scales
// ============================================================================

/** 1 mm⁻¹ expressed in m⁻¹ */
export const PER_MM_IN_PER_M = 1e3;

/** 1 MHz expressed in rad/s, as used by the spatio-temporal formula */
export const MHZ_IN_RAD_PER_S = 1e6;

/** Slider unit of the nonlinear index control */
export const DELTA_N_SLIDER_UNIT = 1e-5;

/** Slider unit of the GVD control (s²/m) */
export const GVD_SLIDER_UNIT = 1e-15;

/** Scale applied to k0·sqrt(Δn) before rounding the healing wavenumber label (m⁻¹ → mm⁻¹) */
export const HEALING_LABEL_SCALE = 1e-3;

// ============================================================================
// Grid Defaults
// ============================================================================

/** Samples per axis */
export const DEFAULT_SAMPLE_COUNT = 100;

/** Transverse wavevector half-range (m⁻¹) */
export const DEFAULT_K_EXTENT = 70e3;

/** Frequency shift half-range (MHz) */
export const DEFAULT_DOMEGA_EXTENT_MHZ = 150;
