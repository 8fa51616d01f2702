/**
 * initforge - Steps Index
 */

export * from './builder-image.js';
export * from './kernel.js';
export * from './tools.js';
export * from './assemble.js';
export * from './clean.js';
