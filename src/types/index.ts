export * from './errors.js';
export * from './github.js';
export * from './sync.js';
