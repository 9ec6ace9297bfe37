/**
 * @sensorcorr/shared
 * Shared result type, errors, configuration and logging for sensorcorr
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
