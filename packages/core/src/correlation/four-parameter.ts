/**
 * Four-parameter correlation function
 *
 *   rho = a * (alpha + (1 - alpha) * (1 + beta) / (beta + exp(|dt| / tau)))
 */

import { z } from 'zod';
import { BoundsError, err, ok, type Result } from '@sensorcorr/shared';
import type { FourParameterName, FourParameterSet, ParameterBounds } from './types.js';

export const FOUR_PARAMETER_MODEL_FORMAT = 'Four-parameter model (A, alpha, beta, tau)';

export const FOUR_PARAMETER_BOUNDS: Readonly<Record<FourParameterName, ParameterBounds>> = {
  // Documented as [-1, 1] for the sensor model interface, enforced as [0, 1]
  a: { min: 0, max: 1, minInclusive: true },
  alpha: { min: 0, max: 1, minInclusive: true },
  beta: { min: 0, max: 10, minInclusive: true },
  tau: { min: 0, max: Number.POSITIVE_INFINITY, minInclusive: false },
};

export const ZERO_FOUR_PARAMETER_SET: Readonly<FourParameterSet> = Object.freeze({
  a: 0,
  alpha: 0,
  beta: 0,
  tau: 0,
});

const BOUNDS_MESSAGES: Record<FourParameterName, string> = {
  a: 'Correlation parameter A must be in the range [0, 1].',
  alpha: 'Correlation parameter alpha must be in the range [0, 1].',
  beta: 'Correlation parameter beta must be in the range [0, 10].',
  tau: 'Correlation parameter tau must be positive.',
};

function boundedNumber(name: FourParameterName) {
  const { min, max, minInclusive } = FOUR_PARAMETER_BOUNDS[name];
  const message = BOUNDS_MESSAGES[name];
  const base = z.number({ required_error: message, invalid_type_error: message });
  const lower = minInclusive ? base.min(min, message) : base.gt(min, message);
  return Number.isFinite(max) ? lower.max(max, message) : lower;
}

// Key order is the validation order: the first failing field is reported
const fourParameterSetSchema = z.object({
  a: boundedNumber('a'),
  alpha: boundedNumber('alpha'),
  beta: boundedNumber('beta'),
  tau: boundedNumber('tau'),
});

/**
 * Check a parameter set against FOUR_PARAMETER_BOUNDS.
 * Only the first violation is reported.
 */
export function validateFourParameterSet(
  params: FourParameterSet,
  operation = 'validateFourParameterSet'
): Result<Readonly<FourParameterSet>, BoundsError> {
  const parsed = fourParameterSetSchema.safeParse(params);
  if (parsed.success) {
    return ok(Object.freeze(parsed.data));
  }

  const [first] = parsed.error.issues;
  const field = first?.path[0];
  return err(
    new BoundsError(first?.message ?? 'Correlation parameters are out of bounds.', operation, {
      parameter: typeof field === 'string' ? field : undefined,
    })
  );
}

/**
 * Evaluate the correlation coefficient for a time separation.
 * The result is clamped to [-1, 1]. `tau` must be positive.
 */
export function evaluateFourParameterCorrelation(
  params: Readonly<FourParameterSet>,
  deltaTime: number
): number {
  const { a, alpha, beta, tau } = params;
  const rho = a * (alpha + ((1 - alpha) * (1 + beta)) / (beta + Math.exp(Math.abs(deltaTime) / tau)));

  return Math.min(1, Math.max(-1, rho));
}
