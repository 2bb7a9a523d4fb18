export * from './fragments.js';
export * from './monitoring.js';
