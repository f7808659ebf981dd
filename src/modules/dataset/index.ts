/**
 * Dataset Module Index
 */

export * from './dataset.types.js';
export * from './column.index.js';
export * from './numeric.cell.js';
export * from './dataset.loader.js';
