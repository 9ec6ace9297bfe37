/**
 * Correlation Models
 * Time correlation between sensor model adjustable parameters
 */

export * from './types.js';
export { CorrelationModel } from './correlation-model.js';
export {
  FOUR_PARAMETER_BOUNDS,
  FOUR_PARAMETER_MODEL_FORMAT,
  ZERO_FOUR_PARAMETER_SET,
  evaluateFourParameterCorrelation,
  validateFourParameterSet,
} from './four-parameter.js';
export { FourParameterCorrelationModel } from './four-parameter-correlation-model.js';
export { NoCorrelationModel, NO_CORRELATION_MODEL_FORMAT } from './no-correlation-model.js';
