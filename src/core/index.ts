export * from './logger/index.js';
export * from './filesystem/index.js';
export * from './env.js';
