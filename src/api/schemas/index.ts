export * from './common.js';
export * from './health.js';
export * from './schema.js';
export * from './fact.js';
