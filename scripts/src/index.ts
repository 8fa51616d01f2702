/**
 * initforge - Index
 * Export main modules
 */

export * from './types.js';
export * from './errors.js';
export * from './arch.js';
export * from './config.js';
export * from './env.js';
export * from './logger.js';
export * from './exec.js';
export * from './qemu.js';
export * from './builder.js';
export * from './steps/index.js';
