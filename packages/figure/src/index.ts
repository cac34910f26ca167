/**
 * @lightfluid/figure
 * Plotly figure data and the control-to-figure view pipeline
 */

export * from './figure/index.js';
export * from './view/index.js';
