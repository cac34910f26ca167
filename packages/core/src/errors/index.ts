/**
 * Error taxonomy: a single InvalidParameter condition
 */

import type { z } from 'zod';
import {
  validatePhysicalParameters,
  validateDispersionConfig,
  type PhysicalParameters,
  type DispersionConfig,
} from '../schema/index.js';

/** Raised when an input would leave the dispersion formula undefined */
export class InvalidParameterError extends Error {
  readonly code = 'INVALID_PARAMETER';
  /** Dotted path of the offending field, e.g. `deltaN` or `axisA.max` */
  readonly parameter: string;
  readonly issues: z.ZodIssue[];

  constructor(parameter: string, message: string, issues: z.ZodIssue[] = []) {
    super(`Invalid parameter "${parameter}": ${message}`);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.issues = issues;
  }

  static fromZod(error: z.ZodError, prefix?: string): InvalidParameterError {
    const first = error.issues[0];
    const path = first ? first.path.join('.') : '';
    const parameter = [prefix, path].filter((part) => part).join('.') || '(root)';
    return new InvalidParameterError(parameter, first?.message ?? 'invalid value', error.issues);
  }
}

/**
 * Parse physical parameters, throwing InvalidParameterError on k0 ≤ 0, Δn < 0
 * or any non-finite field
 */
export function parsePhysicalParameters(data: unknown): PhysicalParameters {
  const result = validatePhysicalParameters(data);
  if (!result.success) throw InvalidParameterError.fromZod(result.errors);
  return result.data;
}

/**
 * Parse a dispersion config, throwing InvalidParameterError on failure
 */
export function parseDispersionConfig(data: unknown): DispersionConfig {
  const result = validateDispersionConfig(data);
  if (!result.success) throw InvalidParameterError.fromZod(result.errors);
  return result.data;
}
