/**
 * Analysis Module Index
 */

export * from './analysis.types.js';
export * from './stats.utils.js';
export * from './analysis.service.js';
export * from './correlation.service.js';
export * from './outliers.service.js';
export { analysisRoutes } from './analysis.routes.js';
