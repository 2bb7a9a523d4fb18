export * from './domains.js';
export * from './hosts-file.js';
export * from './platform.js';
export * from './manager.js';
