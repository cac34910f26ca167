/**
 * @lightfluid/engine
 * Reference implementation of the Bogoliubov dispersion evaluator
 */

export * from './api/index.js';
export * from './dispersion/index.js';
export * from './compute/index.js';
