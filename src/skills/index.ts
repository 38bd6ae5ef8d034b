export * from './base.js';
export * from './memory.js';
export * from './postgres.js';
export * from './seed.js';
