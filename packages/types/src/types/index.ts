export * from './shipments.js';
export * from './authority-rules.js';
export * from './calculation-results.js';
export * from './errors.js';
