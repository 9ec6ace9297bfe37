/**
 * Correlation Model
 * Base class for models of the time correlation between sensor model
 * adjustable parameters. Parameters are partitioned into disjoint groups;
 * a model only describes correlation within a group, parameters in different
 * groups are uncorrelated.
 */

import { IndexOutOfRangeError } from '@sensorcorr/shared';
import type { CorrelationGroupAssignment, CorrelationModelResult } from './types.js';

function isIndexInRange(index: number, size: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < size;
}

export abstract class CorrelationModel {
  /** Human-readable description of the model kind */
  public readonly format: string;

  protected readonly modelName: string;

  protected constructor(modelName: string, format: string) {
    this.modelName = modelName;
    this.format = format;
  }

  abstract getNumSensorModelParameters(): number;

  abstract getNumCorrelationParameterGroups(): number;

  /**
   * Group the sensor model parameter belongs to, null if unassigned
   */
  abstract getCorrelationParameterGroup(
    smParamIndex: number
  ): CorrelationModelResult<CorrelationGroupAssignment>;

  /**
   * Correlation coefficient, in [-1, 1], between two parameters of the
   * given group observed deltaTime apart
   */
  abstract getCorrelationCoefficient(
    cpGroupIndex: number,
    deltaTime: number
  ): CorrelationModelResult<number>;

  protected operationLabel(functionName: string): string {
    return `${this.modelName}::${functionName}`;
  }

  protected checkSensorModelParameterIndex(
    smParamIndex: number,
    functionName: string
  ): IndexOutOfRangeError | null {
    if (isIndexInRange(smParamIndex, this.getNumSensorModelParameters())) {
      return null;
    }
    return new IndexOutOfRangeError(
      'Sensor model parameter index is out of range.',
      this.operationLabel(functionName),
      { index: smParamIndex, size: this.getNumSensorModelParameters() }
    );
  }

  protected checkParameterGroupIndex(
    cpGroupIndex: number,
    functionName: string
  ): IndexOutOfRangeError | null {
    if (isIndexInRange(cpGroupIndex, this.getNumCorrelationParameterGroups())) {
      return null;
    }
    return new IndexOutOfRangeError(
      'Correlation parameter group index is out of range.',
      this.operationLabel(functionName),
      { index: cpGroupIndex, size: this.getNumCorrelationParameterGroups() }
    );
  }
}

// Table sizes given to a model constructor
export function isValidTableSize(size: number): boolean {
  return Number.isSafeInteger(size) && size >= 0;
}
