/**
 * Gateway - Feature Transformer
 *
 * Maps passenger attributes to the numeric vector the classifiers were trained
 * on. Column order comes from the trainer's manifest and is never reordered.
 */

import { TransformError } from '../utils/types.js';

import type { Preprocessor } from './preprocessor.js';

export type FeatureVector = readonly number[];

/**
 * Attributes accepted by the transformer. Optional fields are imputed from the
 * training statistics.
 */
export interface PassengerAttributes {
  readonly pclass: number;
  readonly sex: string;
  readonly age?: number | null;
  readonly sibsp: number;
  readonly parch: number;
  readonly fare?: number | null;
  readonly embarked?: string | null;
}

/** 0 child, 1 young adult, 2 adult, 3 senior */
export type AgeGroup = 0 | 1 | 2 | 3;

export function ageGroup(age: number): AgeGroup {
  if (age < 18) {
    return 0;
  }
  if (age < 35) {
    return 1;
  }
  if (age < 60) {
    return 2;
  }
  return 3;
}

function encode(column: string, value: string, classes: readonly string[]): number {
  const code = classes.indexOf(value);
  if (code === -1) {
    throw new TransformError(`Unseen category '${value}' for feature '${column}'`);
  }
  return code;
}

export function transform(passenger: PassengerAttributes, preprocessor: Preprocessor): FeatureVector {
  const { encoders, stats } = preprocessor;

  const age = passenger.age ?? stats.ageMedian;
  const fare = passenger.fare ?? stats.fareMedian;
  const embarked = passenger.embarked ?? stats.embarkedMode;
  const familySize = passenger.sibsp + passenger.parch + 1;

  const values = new Map<string, () => number>([
    ['pclass', () => passenger.pclass],
    ['sex', () => encode('sex', passenger.sex, encoders.sex)],
    ['age', () => age],
    ['sibsp', () => passenger.sibsp],
    ['parch', () => passenger.parch],
    ['fare', () => fare],
    ['embarked', () => encode('embarked', embarked, encoders.embarked)],
    ['family_size', () => familySize],
    ['is_alone', () => (familySize === 1 ? 1 : 0)],
    ['age_group', () => ageGroup(age)],
  ]);

  const vector = preprocessor.manifest.map((column) => {
    const compute = values.get(column);
    if (compute === undefined) {
      throw new TransformError(`Unknown feature column '${column}' in manifest`);
    }

    const value = compute();
    if (!Number.isFinite(value)) {
      throw new TransformError(`Feature '${column}' is not a finite number`);
    }
    return value;
  });

  return Object.freeze(vector);
}
