export * from './geometry.js';
export * from './config.js';
export * from './output.js';
