export * from './report.config.js';
export * from './report.builder.js';
