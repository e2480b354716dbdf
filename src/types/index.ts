export * from './fact.js';
export * from './schema.js';
