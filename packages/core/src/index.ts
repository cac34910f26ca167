/**
 * @lightfluid/core
 * Parameter schemas, errors, units, grids and page controls
 */

export * from './schema/index.js';
export * from './errors/index.js';
export * from './units/index.js';
export * from './grid/index.js';
export * from './controls/index.js';
