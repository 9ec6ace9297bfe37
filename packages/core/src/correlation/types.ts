/**
 * Correlation Model Types
 * Types shared by the sensor model parameter correlation models
 */

import type { Result, CorrelationModelError } from '@sensorcorr/shared';

// ===========================================
// Group Assignment Types
// ===========================================

/**
 * Group a sensor model parameter belongs to, or null while unassigned
 */
export type CorrelationGroupAssignment = number | null;

// ===========================================
// Four-Parameter Model Types
// ===========================================

/**
 * Correlation parameters of one group in the four-parameter model
 */
export interface FourParameterSet {
  /** Overall scale factor, [0, 1] */
  a: number;
  /** Fraction of correlation that persists at long time lags, [0, 1] */
  alpha: number;
  /** Shape of the decay, [0, 10] */
  beta: number;
  /** Time constant of the decay, > 0 */
  tau: number;
}

export type FourParameterName = keyof FourParameterSet;

export interface ParameterBounds {
  min: number;
  max: number;
  /** When false the lower bound itself is rejected */
  minInclusive: boolean;
}

// ===========================================
// Operation Result Types
// ===========================================

export type CorrelationModelResult<T> = Result<T, CorrelationModelError>;
