/**
 * Dispersion parameter and configuration schemas
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';

// ============================================================================
// Physical Parameters
// ============================================================================

/**
 * Physical parameters of the fluid of light.
 * k0 in rad/m, deltaN dimensionless, d0 (group velocity dispersion) in s²/m.
 * D0 may be negative (anomalous dispersion); only the spatio-temporal mode reads it.
 */
export const PhysicalParametersSchema = z.object({
  k0: z.number().finite().positive(),
  deltaN: z.number().finite().nonnegative(),
  d0: z.number().finite().default(0),
});

// ============================================================================
// Grid Configuration
// ============================================================================

export const DispersionModeSchema = z.enum(['spatial', 'spatiotemporal']);

/** Evenly spaced axis, in SI units (m⁻¹ or rad/s) */
export const AxisSpecSchema = z
  .object({
    min: z.number().finite(),
    max: z.number().finite(),
    count: z.number().int().min(1).default(100),
  })
  .refine((axis) => axis.count === 1 || axis.max > axis.min, {
    message: 'Axis max must exceed min',
    path: ['max'],
  });

/** Page-level dispersion configuration */
export const DispersionConfigSchema = z.object({
  mode: DispersionModeSchema,
  wavelength: z.number().finite().positive(), // meters
  deltaN: z.number().finite().nonnegative(),
  d0: z.number().finite().default(0),
  axisA: AxisSpecSchema,
  axisB: AxisSpecSchema,
});

// ============================================================================
// Control Values
// ============================================================================

export const CutModeSchema = z.enum(['fix_kx', 'fix_domega']);

/** Slider values of the spatial page, in display units */
export const SpatialControlValuesSchema = z.object({
  deltaN: z.number().finite().optional(), // ×1e-5
  kx: z.number().finite().optional(), // mm⁻¹
});

/** Slider and switch values of the spatio-temporal page, in display units */
export const SpatioTemporalControlValuesSchema = z.object({
  deltaN: z.number().finite().optional(), // ×1e-5
  gvd: z.number().finite().optional(), // ×1e-15 s²/m
  cutMode: CutModeSchema.optional(),
  kx: z.number().finite().optional(), // mm⁻¹
  domega: z.number().finite().optional(), // MHz
});

// ============================================================================
// TypeScript Type Exports
// ============================================================================

export type PhysicalParameters = z.infer<typeof PhysicalParametersSchema>;
export type PhysicalParametersInput = z.input<typeof PhysicalParametersSchema>;
export type AxisSpec = z.infer<typeof AxisSpecSchema>;
export type DispersionConfig = z.infer<typeof DispersionConfigSchema>;
export type CutMode = z.infer<typeof CutModeSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate physical parameters against the schema
 */
export function validatePhysicalParameters(
  data: unknown
): { success: true; data: PhysicalParameters } | { success: false; errors: z.ZodError } {
  const result = PhysicalParametersSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

/**
 * Validate a dispersion config against the schema
 */
export function validateDispersionConfig(
  data: unknown
): { success: true; data: DispersionConfig } | { success: false; errors: z.ZodError } {
  const result = DispersionConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}
