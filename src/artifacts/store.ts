/**
 * Gateway - Artifact Store
 * Read-only access to the files the offline trainer leaves in the models directory
 */

import fs from 'fs';
import path from 'path';

import type { z } from 'zod';

import { errorMessage } from '../utils/helpers.js';
import { ArtifactError } from '../utils/types.js';

// =============================================================================
// Artifact Names
// =============================================================================

export const ARTIFACT_FILES = {
  logisticModel: 'logistic_model.json',
  decisionTreeModel: 'decision_tree_model.json',
  labelEncoders: 'label_encoders.json',
  preprocessingStats: 'preprocessing_stats.json',
  featureColumns: 'feature_columns.json',
  evaluation: 'evaluation_results.json',
} as const;

export type ArtifactName = (typeof ARTIFACT_FILES)[keyof typeof ARTIFACT_FILES];

// =============================================================================
// Types
// =============================================================================

export interface ArtifactStat {
  sizeBytes: number;
  modifiedAt: Date;
}

export interface ArtifactStore {
  readonly directory: string;
  readJson(name: string): Promise<unknown>;
  exists(name: string): Promise<boolean>;
  stat(name: string): Promise<ArtifactStat>;
}

export interface FileArtifactStoreOptions {
  directory: string;
  /** Upper bound for a single file read */
  readTimeoutMs: number;
}

// =============================================================================
// Filesystem Implementation
// =============================================================================

export class FileArtifactStore implements ArtifactStore {
  public readonly directory: string;
  private readonly readTimeoutMs: number;

  constructor(options: FileArtifactStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.readTimeoutMs = options.readTimeoutMs;
  }

  /**
   * Resolve an artifact name inside the store directory
   */
  private resolve(name: string): string {
    const resolved = path.resolve(this.directory, name);
    const relative = path.relative(this.directory, resolved);

    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ArtifactError(name, `Artifact name '${name}' escapes the models directory`);
    }
    return resolved;
  }

  public async readJson(name: string): Promise<unknown> {
    const filePath = this.resolve(name);
    let content: string;

    try {
      content = await fs.promises.readFile(filePath, {
        encoding: 'utf-8',
        signal: AbortSignal.timeout(this.readTimeoutMs),
      });
    } catch (error) {
      throw this.toArtifactError(name, error);
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new ArtifactError(name, `Artifact '${name}' is not valid JSON: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  public async exists(name: string): Promise<boolean> {
    try {
      await fs.promises.access(this.resolve(name), fs.constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  public async stat(name: string): Promise<ArtifactStat> {
    try {
      const stats = await fs.promises.stat(this.resolve(name));
      return { sizeBytes: stats.size, modifiedAt: stats.mtime };
    } catch (error) {
      throw this.toArtifactError(name, error);
    }
  }

  private toArtifactError(name: string, error: unknown): ArtifactError {
    if (error instanceof ArtifactError) {
      return error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return new ArtifactError(name, `Reading artifact '${name}' timed out after ${this.readTimeoutMs}ms`, {
        cause: error,
      });
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return new ArtifactError(name, `Artifact '${name}' not found in ${this.directory}`, {
        cause: error,
      });
    }
    return new ArtifactError(name, `Failed to read artifact '${name}': ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate a decoded artifact against its schema
 */
export function parseArtifact<S extends z.ZodTypeAny>(name: string, schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ArtifactError(name, `Artifact '${name}' is malformed: ${problems}`);
  }
  return result.data;
}
