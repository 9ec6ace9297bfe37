/**
 * Error hierarchy tests
 */
import { describe, it, expect } from 'vitest';
import {
  BoundsError,
  ConfigurationError,
  IndexOutOfRangeError,
  SensorCorrError,
  ValidationError,
  unwrapResult,
} from './index.js';
import { err, ok } from '../types/index.js';

describe('CorrelationModelError', () => {
  it('should carry the kind, code and operation of a bounds violation', () => {
    const error = new BoundsError('Correlation parameter tau must be positive.', 'Model::set', {
      parameter: 'tau',
    });

    expect(error).toBeInstanceOf(SensorCorrError);
    expect(error.name).toBe('BoundsError');
    expect(error.kind).toBe('BOUNDS');
    expect(error.code).toBe('E2002');
    expect(error.operation).toBe('Model::set');
    expect(error.context).toEqual({
      category: 'CORRELATION_MODEL',
      severity: 'MEDIUM',
      retryable: false,
      operation: 'Model::set',
      parameter: 'tau',
    });
  });

  it('should carry the kind and code of an index violation', () => {
    const error = new IndexOutOfRangeError('Index is out of range.', 'Model::get');

    expect(error.name).toBe('IndexOutOfRangeError');
    expect(error.kind).toBe('INDEX_OUT_OF_RANGE');
    expect(error.code).toBe('E2001');
  });

  it('should serialize to JSON', () => {
    const error = new IndexOutOfRangeError('Index is out of range.', 'Model::get');
    const json = error.toJSON();

    expect(json.name).toBe('IndexOutOfRangeError');
    expect(json.code).toBe('E2001');
    expect(json.message).toBe('Index is out of range.');
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });
});

describe('ValidationError / ConfigurationError', () => {
  it('should use their own categories', () => {
    expect(new ValidationError('bad size').context.category).toBe('VALIDATION');
    expect(new ValidationError('bad size').code).toBe('E1001');
    expect(new ConfigurationError('bad env').context.severity).toBe('CRITICAL');
    expect(new ConfigurationError('bad env').code).toBe('E6001');
  });
});

describe('unwrapResult()', () => {
  it('should return the value of a successful result', () => {
    expect(unwrapResult(ok(42))).toBe(42);
  });

  it('should throw the error of a failed result', () => {
    const error = new BoundsError('out of bounds', 'Model::set');

    expect(() => unwrapResult(err(error))).toThrow(error);
  });
});
