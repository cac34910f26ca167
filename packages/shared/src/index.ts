/**
 * @lightfluid/shared
 * Shared types, constants, and utilities for the dispersion toolkit
 */

export * from './types/index.js';
export * from './constants/index.js';
export * from './utils/index.js';
