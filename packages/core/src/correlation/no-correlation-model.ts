/**
 * No-Correlation Model
 * For sensor models whose adjustable parameters are uncorrelated over time:
 * no groups, every parameter unassigned
 */

import { err, ok, ValidationError } from '@sensorcorr/shared';
import { CorrelationModel, isValidTableSize } from './correlation-model.js';
import type { CorrelationGroupAssignment, CorrelationModelResult } from './types.js';

export const NO_CORRELATION_MODEL_FORMAT = 'No correlation';

export class NoCorrelationModel extends CorrelationModel {
  private readonly numSMParams: number;

  constructor(numSMParams = 0) {
    super('NoCorrelationModel', NO_CORRELATION_MODEL_FORMAT);

    if (!isValidTableSize(numSMParams)) {
      throw new ValidationError(`numSMParams must be a non-negative integer (got ${numSMParams})`);
    }
    this.numSMParams = numSMParams;
  }

  getNumSensorModelParameters(): number {
    return this.numSMParams;
  }

  getNumCorrelationParameterGroups(): number {
    return 0;
  }

  getCorrelationParameterGroup(smParamIndex: number): CorrelationModelResult<CorrelationGroupAssignment> {
    const indexError = this.checkSensorModelParameterIndex(smParamIndex, 'getCorrelationParameterGroup');
    return indexError ? err(indexError) : ok(null);
  }

  getCorrelationCoefficient(cpGroupIndex: number, _deltaTime: number): CorrelationModelResult<number> {
    const indexError = this.checkParameterGroupIndex(cpGroupIndex, 'getCorrelationCoefficient');
    return indexError ? err(indexError) : ok(0);
  }
}
