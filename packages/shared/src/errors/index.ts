/**
 * Custom error hierarchy for sensorcorr
 */

import type { Result } from '../types/index.js';

export type ErrorCategory =
  | 'VALIDATION'
  | 'CORRELATION_MODEL'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  [key: string]: unknown;
}

/**
 * Base error class for sensorcorr
 */
export class SensorCorrError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'SensorCorrError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (bad arguments from the calling code)
 */
export class ValidationError extends SensorCorrError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Correlation model errors
 *
 * `operation` names the model method that rejected the call,
 * e.g. `FourParameterCorrelationModel::setCorrelationGroupParameters`.
 */
export type CorrelationModelErrorKind = 'BOUNDS' | 'INDEX_OUT_OF_RANGE';

export abstract class CorrelationModelError extends SensorCorrError {
  public abstract readonly kind: CorrelationModelErrorKind;
  public readonly operation: string;

  constructor(
    message: string,
    code: string,
    operation: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message, code, {
      category: 'CORRELATION_MODEL',
      severity: 'MEDIUM',
      retryable: false,
      operation,
      ...context,
    });
    this.operation = operation;
  }
}

export class IndexOutOfRangeError extends CorrelationModelError {
  public readonly kind = 'INDEX_OUT_OF_RANGE' as const;

  constructor(message: string, operation: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', operation, context);
    this.name = 'IndexOutOfRangeError';
  }
}

export class BoundsError extends CorrelationModelError {
  public readonly kind = 'BOUNDS' as const;

  constructor(message: string, operation: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2002', operation, context);
    this.name = 'BoundsError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends SensorCorrError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Returns the value of a successful result, throws the error of a failed one
 */
export function unwrapResult<T, E extends Error>(result: Result<T, E>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}
