export * from './schema.js';
export * from './migrator.js';
