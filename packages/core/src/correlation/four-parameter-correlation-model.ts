/**
 * Four-Parameter Correlation Model
 * Assigns sensor model parameters to groups and evaluates the
 * four-parameter decay function (see four-parameter.ts) per group
 */

import { createChildLogger, err, ok, ValidationError } from '@sensorcorr/shared';
import { CorrelationModel, isValidTableSize } from './correlation-model.js';
import {
  FOUR_PARAMETER_MODEL_FORMAT,
  ZERO_FOUR_PARAMETER_SET,
  evaluateFourParameterCorrelation,
  validateFourParameterSet,
} from './four-parameter.js';
import type {
  CorrelationGroupAssignment,
  CorrelationModelResult,
  FourParameterSet,
} from './types.js';

export class FourParameterCorrelationModel extends CorrelationModel {
  private readonly groupMapping: CorrelationGroupAssignment[];
  private readonly groupParameters: Readonly<FourParameterSet>[];
  private logger = createChildLogger({ component: 'FourParameterCorrelationModel' });

  constructor(numSMParams: number, numCPGroups: number) {
    super('FourParameterCorrelationModel', FOUR_PARAMETER_MODEL_FORMAT);

    if (!isValidTableSize(numSMParams) || !isValidTableSize(numCPGroups)) {
      throw new ValidationError(
        `Table sizes must be non-negative integers (numSMParams=${numSMParams}, numCPGroups=${numCPGroups})`
      );
    }

    this.groupMapping = new Array<CorrelationGroupAssignment>(numSMParams).fill(null);
    this.groupParameters = new Array<Readonly<FourParameterSet>>(numCPGroups).fill(ZERO_FOUR_PARAMETER_SET);

    this.logger.debug({ numSMParams, numCPGroups }, 'Created four-parameter correlation model');
  }

  getNumSensorModelParameters(): number {
    return this.groupMapping.length;
  }

  getNumCorrelationParameterGroups(): number {
    return this.groupParameters.length;
  }

  getCorrelationParameterGroup(smParamIndex: number): CorrelationModelResult<CorrelationGroupAssignment> {
    const indexError = this.checkSensorModelParameterIndex(smParamIndex, 'getCorrelationParameterGroup');
    if (indexError) {
      return err(indexError);
    }

    return ok(this.groupMapping[smParamIndex] ?? null);
  }

  /**
   * Assign a sensor model parameter to a group, replacing any earlier assignment
   */
  setCorrelationParameterGroup(smParamIndex: number, cpGroupIndex: number): CorrelationModelResult<void> {
    const indexError =
      this.checkSensorModelParameterIndex(smParamIndex, 'setCorrelationParameterGroup') ??
      this.checkParameterGroupIndex(cpGroupIndex, 'setCorrelationParameterGroup');
    if (indexError) {
      return err(indexError);
    }

    this.groupMapping[smParamIndex] = cpGroupIndex;
    this.logger.debug({ smParamIndex, cpGroupIndex }, 'Assigned parameter to correlation group');
    return ok(undefined);
  }

  /**
   * Replace the correlation parameters of a group.
   * Nothing is stored unless every parameter is within its bounds.
   */
  setCorrelationGroupParameters(cpGroupIndex: number, params: FourParameterSet): CorrelationModelResult<void>;
  setCorrelationGroupParameters(
    cpGroupIndex: number,
    a: number,
    alpha: number,
    beta: number,
    tau: number
  ): CorrelationModelResult<void>;
  setCorrelationGroupParameters(
    cpGroupIndex: number,
    paramsOrA: FourParameterSet | number,
    alpha?: number,
    beta?: number,
    tau?: number
  ): CorrelationModelResult<void> {
    const indexError = this.checkParameterGroupIndex(cpGroupIndex, 'setCorrelationGroupParameters');
    if (indexError) {
      return err(indexError);
    }

    const candidate: FourParameterSet =
      typeof paramsOrA === 'number'
        ? { a: paramsOrA, alpha: alpha ?? Number.NaN, beta: beta ?? Number.NaN, tau: tau ?? Number.NaN }
        : paramsOrA;

    const validated = validateFourParameterSet(
      candidate,
      this.operationLabel('setCorrelationGroupParameters')
    );
    if (!validated.success) {
      return validated;
    }

    this.groupParameters[cpGroupIndex] = validated.value;
    this.logger.debug({ cpGroupIndex, ...validated.value }, 'Updated correlation group parameters');
    return ok(undefined);
  }

  /**
   * Current parameters of a group; all zeros until set
   */
  getCorrelationGroupParameters(cpGroupIndex: number): CorrelationModelResult<Readonly<FourParameterSet>> {
    const indexError = this.checkParameterGroupIndex(cpGroupIndex, 'getCorrelationGroupParameters');
    if (indexError) {
      return err(indexError);
    }

    return ok(this.groupParameters[cpGroupIndex] ?? ZERO_FOUR_PARAMETER_SET);
  }

  /**
   * The group must have been configured with setCorrelationGroupParameters;
   * the zero default has tau = 0 and does not evaluate to a number.
   */
  getCorrelationCoefficient(cpGroupIndex: number, deltaTime: number): CorrelationModelResult<number> {
    const indexError = this.checkParameterGroupIndex(cpGroupIndex, 'getCorrelationCoefficient');
    if (indexError) {
      return err(indexError);
    }

    const params = this.groupParameters[cpGroupIndex] ?? ZERO_FOUR_PARAMETER_SET;
    return ok(evaluateFourParameterCorrelation(params, deltaTime));
  }
}
