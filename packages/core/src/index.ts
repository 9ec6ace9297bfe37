/**
 * @sensorcorr/core
 * Correlation models for sensor model adjustable parameters
 */

export * from './correlation/index.js';
