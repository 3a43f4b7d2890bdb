/**
 * Feature Transformer and Preprocessing Artifact Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  findManifestProblems,
  loadFeatureManifest,
  loadPreprocessor,
  type Preprocessor,
} from '../../src/features/preprocessor.js';
import { ageGroup, transform } from '../../src/features/transformer.js';
import { ConfigurationError, TransformError } from '../../src/utils/types.js';
import { MemoryArtifactStore, NON_SURVIVOR, SURVIVOR } from '../helpers/fixtures.js';

const preprocessor: Preprocessor = {
  manifest: ['pclass', 'sex', 'age', 'sibsp', 'parch', 'fare', 'embarked', 'family_size', 'is_alone', 'age_group'],
  encoders: { sex: ['female', 'male'], embarked: ['C', 'Q', 'S'] },
  stats: { ageMedian: 28, fareMedian: 14.4542, embarkedMode: 'S' },
};

describe('ageGroup', () => {
  it('should bucket ages at 18, 35 and 60', () => {
    expect(ageGroup(17.9)).toBe(0);
    expect(ageGroup(18)).toBe(1);
    expect(ageGroup(34)).toBe(1);
    expect(ageGroup(35)).toBe(2);
    expect(ageGroup(59)).toBe(2);
    expect(ageGroup(60)).toBe(3);
  });
});

describe('transform', () => {
  it('should produce the vector in manifest order', () => {
    expect(transform(SURVIVOR, preprocessor)).toEqual([1, 0, 29, 0, 0, 211.34, 2, 1, 1, 1]);
    expect(transform(NON_SURVIVOR, preprocessor)).toEqual([3, 1, 22, 1, 0, 7.25, 2, 2, 0, 1]);
  });

  it('should follow a reordered manifest exactly', () => {
    const reordered: Preprocessor = { ...preprocessor, manifest: ['fare', 'is_alone', 'sex'] };
    expect(transform(NON_SURVIVOR, reordered)).toEqual([7.25, 0, 1]);
  });

  it('should impute missing values from the training statistics', () => {
    const vector = transform(
      { pclass: 2, sex: 'male', sibsp: 0, parch: 0, age: null, fare: undefined, embarked: null },
      preprocessor
    );
    expect(vector).toEqual([2, 1, 28, 0, 0, 14.4542, 2, 1, 1, 1]);
  });

  it('should return a frozen vector', () => {
    expect(Object.isFrozen(transform(SURVIVOR, preprocessor))).toBe(true);
  });

  it('should reject unseen categories', () => {
    expect(() => transform({ ...SURVIVOR, embarked: 'X' }, preprocessor)).toThrow(
      new TransformError("Unseen category 'X' for feature 'embarked'")
    );
  });

  it('should reject unknown manifest columns', () => {
    const broken: Preprocessor = { ...preprocessor, manifest: ['pclass', 'cabin'] };
    expect(() => transform(SURVIVOR, broken)).toThrow(TransformError);
  });

  it('should reject non-finite results', () => {
    expect(() => transform({ ...SURVIVOR, fare: Number.NaN }, preprocessor)).toThrow(
      "Feature 'fare' is not a finite number"
    );
  });
});

describe('findManifestProblems', () => {
  it('should accept the trainer manifest', () => {
    expect(findManifestProblems(preprocessor.manifest)).toEqual([]);
  });

  it('should list unknown and duplicate columns', () => {
    expect(findManifestProblems(['pclass', 'cabin', 'pclass'])).toEqual([
      "unknown column 'cabin'",
      "duplicate column 'pclass'",
    ]);
  });

  it('should reject anything but a non-empty array of names', () => {
    expect(findManifestProblems([])).toEqual(['manifest must be a non-empty array of column names']);
    expect(findManifestProblems({ columns: [] })).toEqual(['manifest must be a non-empty array of column names']);
  });
});

describe('loadFeatureManifest', () => {
  it('should return the manifest from the store', async () => {
    const store = MemoryArtifactStore.fromFixtures();
    await expect(loadFeatureManifest(store)).resolves.toEqual(preprocessor.manifest);
  });

  it('should raise a configuration error when the manifest is missing', async () => {
    const store = MemoryArtifactStore.fromFixtures();
    store.remove('feature_columns.json');
    await expect(loadFeatureManifest(store)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should raise a configuration error for duplicated columns', async () => {
    const store = MemoryArtifactStore.fromFixtures();
    store.set('feature_columns.json', ['age', 'age']);
    await expect(loadFeatureManifest(store)).rejects.toThrow(
      "Feature manifest feature_columns.json is malformed: duplicate column 'age'"
    );
  });
});

describe('loadPreprocessor', () => {
  it('should assemble manifest, encoders and statistics', async () => {
    const loaded = await loadPreprocessor(MemoryArtifactStore.fromFixtures());
    expect(loaded).toEqual(preprocessor);
    expect(Object.isFrozen(loaded.encoders.sex)).toBe(true);
  });
});
