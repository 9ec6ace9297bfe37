/**
 * Four-parameter correlation function tests
 */
import { describe, it, expect } from 'vitest';
import { BoundsError } from '@sensorcorr/shared';
import {
  FOUR_PARAMETER_BOUNDS,
  evaluateFourParameterCorrelation,
  validateFourParameterSet,
} from './four-parameter.js';

describe('evaluateFourParameterCorrelation()', () => {
  it('should evaluate the decay function', () => {
    // 0.5 * (0.2 + 0.8 * 2 / (1 + e))
    const rho = evaluateFourParameterCorrelation({ a: 0.5, alpha: 0.2, beta: 1, tau: 5 }, 5);

    expect(rho).toBeCloseTo(0.315153, 6);
  });

  it('should reduce to exp(-|t| / tau) when alpha and beta are zero', () => {
    const params = { a: 1, alpha: 0, beta: 0, tau: 4 };

    expect(evaluateFourParameterCorrelation(params, 8)).toBeCloseTo(Math.exp(-2), 12);
    expect(evaluateFourParameterCorrelation(params, -8)).toBeCloseTo(Math.exp(-2), 12);
  });

  it('should stay at a when alpha is one', () => {
    const params = { a: 0.7, alpha: 1, beta: 10, tau: 1 };

    expect(evaluateFourParameterCorrelation(params, 0)).toBeCloseTo(0.7, 12);
    expect(evaluateFourParameterCorrelation(params, 3)).toBeCloseTo(0.7, 12);
  });

  it('should clamp results outside [-1, 1]', () => {
    expect(evaluateFourParameterCorrelation({ a: 3, alpha: 1, beta: 0, tau: 1 }, 0)).toBe(1);
    expect(evaluateFourParameterCorrelation({ a: -2, alpha: 1, beta: 0, tau: 1 }, 0)).toBe(-1);
  });
});

describe('validateFourParameterSet()', () => {
  it('should return a frozen copy of a valid set', () => {
    const params = { a: 0.5, alpha: 0.5, beta: 5, tau: 2 };
    const result = validateFourParameterSet(params);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value).toEqual(params);
      expect(result.value).not.toBe(params);
      expect(Object.isFrozen(result.value)).toBe(true);
    }
  });

  it('should name the operation it was given', () => {
    const result = validateFourParameterSet({ a: 0.5, alpha: 0.5, beta: 11, tau: 2 }, 'Loader::apply');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(BoundsError);
      expect(result.error.operation).toBe('Loader::apply');
      expect(result.error.context.parameter).toBe('beta');
    }
  });

  it('should default the operation label', () => {
    const result = validateFourParameterSet({ a: 0.5, alpha: 0.5, beta: 1, tau: -3 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.operation).toBe('validateFourParameterSet');
      expect(result.error.message).toBe('Correlation parameter tau must be positive.');
    }
  });

  it('should expose the enforced bounds', () => {
    expect(FOUR_PARAMETER_BOUNDS.a).toEqual({ min: 0, max: 1, minInclusive: true });
    expect(FOUR_PARAMETER_BOUNDS.beta.max).toBe(10);
    expect(FOUR_PARAMETER_BOUNDS.tau.minInclusive).toBe(false);
  });
});
