/**
 * Gateway - Preprocessing Artifacts
 * Feature manifest, label encoders and imputation statistics written by the trainer
 */

import { z } from 'zod';

import { ARTIFACT_FILES, parseArtifact, type ArtifactStore } from '../artifacts/store.js';
import { errorMessage } from '../utils/helpers.js';
import { ConfigurationError } from '../utils/types.js';

// =============================================================================
// Feature Columns
// =============================================================================

/** Every column the transformer knows how to produce */
export const FEATURE_COLUMNS = [
  'pclass',
  'sex',
  'age',
  'sibsp',
  'parch',
  'fare',
  'embarked',
  'family_size',
  'is_alone',
  'age_group',
] as const;

export type FeatureColumn = (typeof FEATURE_COLUMNS)[number];

const KNOWN_COLUMNS: ReadonlySet<string> = new Set(FEATURE_COLUMNS);

// =============================================================================
// Schemas
// =============================================================================

const FeatureManifestSchema = z.array(z.string().min(1)).min(1);

const LabelEncodersSchema = z.object({
  sex: z.array(z.string().min(1)).min(1),
  embarked: z.array(z.string().min(1)).min(1),
});

const PreprocessingStatsSchema = z.object({
  age_median: z.number().finite(),
  fare_median: z.number().finite(),
  embarked_mode: z.string().min(1),
});

// =============================================================================
// Types
// =============================================================================

export interface PreprocessingStats {
  readonly ageMedian: number;
  readonly fareMedian: number;
  readonly embarkedMode: string;
}

export interface LabelEncoders {
  /** Classes in encoder order: the code of a value is its index */
  readonly sex: readonly string[];
  readonly embarked: readonly string[];
}

export interface Preprocessor {
  readonly manifest: readonly string[];
  readonly encoders: LabelEncoders;
  readonly stats: PreprocessingStats;
}

// =============================================================================
// Manifest
// =============================================================================

/**
 * Check a decoded manifest. Returns the list of problems, empty when valid.
 */
export function findManifestProblems(raw: unknown): string[] {
  const parsed = FeatureManifestSchema.safeParse(raw);
  if (!parsed.success) {
    return ['manifest must be a non-empty array of column names'];
  }

  const problems: string[] = [];
  const seen = new Set<string>();

  for (const column of parsed.data) {
    if (!KNOWN_COLUMNS.has(column)) {
      problems.push(`unknown column '${column}'`);
    }
    if (seen.has(column)) {
      problems.push(`duplicate column '${column}'`);
    }
    seen.add(column);
  }

  return problems;
}

/**
 * Load and validate the ordered feature-column manifest.
 * Throws ConfigurationError when it is missing or malformed.
 */
export async function loadFeatureManifest(store: ArtifactStore): Promise<string[]> {
  const name = ARTIFACT_FILES.featureColumns;
  let raw: unknown;

  try {
    raw = await store.readJson(name);
  } catch (error) {
    throw new ConfigurationError(`Feature manifest unavailable: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const problems = findManifestProblems(raw);
  if (problems.length > 0) {
    throw new ConfigurationError(`Feature manifest ${name} is malformed: ${problems.join('; ')}`);
  }

  return parseArtifact(name, FeatureManifestSchema, raw);
}

// =============================================================================
// Preprocessor
// =============================================================================

export async function loadPreprocessor(store: ArtifactStore): Promise<Preprocessor> {
  const [manifestRaw, encodersRaw, statsRaw] = await Promise.all([
    store.readJson(ARTIFACT_FILES.featureColumns),
    store.readJson(ARTIFACT_FILES.labelEncoders),
    store.readJson(ARTIFACT_FILES.preprocessingStats),
  ]);

  const manifest = parseArtifact(ARTIFACT_FILES.featureColumns, FeatureManifestSchema, manifestRaw);
  const encoders = parseArtifact(ARTIFACT_FILES.labelEncoders, LabelEncodersSchema, encodersRaw);
  const stats = parseArtifact(ARTIFACT_FILES.preprocessingStats, PreprocessingStatsSchema, statsRaw);

  return Object.freeze({
    manifest: Object.freeze([...manifest]),
    encoders: Object.freeze({
      sex: Object.freeze([...encoders.sex]),
      embarked: Object.freeze([...encoders.embarked]),
    }),
    stats: Object.freeze({
      ageMedian: stats.age_median,
      fareMedian: stats.fare_median,
      embarkedMode: stats.embarked_mode,
    }),
  });
}
