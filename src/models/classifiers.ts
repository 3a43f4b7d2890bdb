/**
 * Gateway - Classifiers
 * Inference for the two model families the trainer exports
 */

import { z } from 'zod';

import type { FeatureVector } from '../features/transformer.js';
import type { ModelKey } from '../utils/types.js';

export interface Classifier {
  readonly kind: ModelKey;
  /** Smallest vector width the model can read */
  readonly minFeatures: number;
  /** Whether every column of a vector this wide is read by the model */
  acceptsWidth(width: number): boolean;
  /** Probability of the positive class */
  predictProbability(vector: FeatureVector): number;
}

// =============================================================================
// Logistic Regression
// =============================================================================

export const LogisticModelSchema = z.object({
  coefficients: z.array(z.number().finite()).min(1),
  intercept: z.number().finite(),
});

export type LogisticModelParams = z.output<typeof LogisticModelSchema>;

export function sigmoid(logit: number): number {
  if (logit >= 0) {
    return 1 / (1 + Math.exp(-logit));
  }
  const e = Math.exp(logit);
  return e / (1 + e);
}

export class LogisticRegressionClassifier implements Classifier {
  public readonly kind = 'logistic_regression' as const;
  private readonly coefficients: readonly number[];
  private readonly intercept: number;

  constructor(params: LogisticModelParams) {
    this.coefficients = Object.freeze([...params.coefficients]);
    this.intercept = params.intercept;
  }

  get minFeatures(): number {
    return this.coefficients.length;
  }

  public acceptsWidth(width: number): boolean {
    return width === this.coefficients.length;
  }

  public predictProbability(vector: FeatureVector): number {
    let logit = this.intercept;
    this.coefficients.forEach((weight, index) => {
      logit += weight * (vector[index] ?? 0);
    });
    return sigmoid(logit);
  }
}

// =============================================================================
// Decision Tree
// =============================================================================

/**
 * Flattened binary tree. Node `i` is a leaf when `children_left[i] === -1`;
 * otherwise samples with `x[feature[i]] <= threshold[i]` go left. `value[i]`
 * holds the class weights [negative, positive] seen at that node.
 */
export const DecisionTreeSchema = z
  .object({
    children_left: z.array(z.number().int().min(-1)).min(1),
    children_right: z.array(z.number().int().min(-1)).min(1),
    feature: z.array(z.number().int()).min(1),
    threshold: z.array(z.number().finite()).min(1),
    value: z.array(z.tuple([z.number().min(0), z.number().min(0)])).min(1),
  })
  .superRefine((tree, ctx) => {
    const nodeCount = tree.children_left.length;
    const lengths = [
      tree.children_right.length,
      tree.feature.length,
      tree.threshold.length,
      tree.value.length,
    ];
    if (lengths.some((length) => length !== nodeCount)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'node arrays must have equal length' });
      return;
    }

    for (let i = 0; i < nodeCount; i++) {
      const left = tree.children_left[i] ?? -1;
      const right = tree.children_right[i] ?? -1;
      const isLeaf = left === -1;

      if (isLeaf !== (right === -1)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `node ${i} has a single child` });
      } else if (!isLeaf && (left <= i || right <= i || left >= nodeCount || right >= nodeCount)) {
        // children always come after their parent in the trainer's layout
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `node ${i} has out-of-order children` });
      } else if (!isLeaf && (tree.feature[i] ?? -1) < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `split node ${i} has no feature` });
      }

      const [negative, positive] = tree.value[i] ?? [0, 0];
      if (isLeaf && negative + positive <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `leaf ${i} has no samples` });
      }
    }
  });

export type DecisionTreeParams = z.output<typeof DecisionTreeSchema>;

export class DecisionTreeClassifier implements Classifier {
  public readonly kind = 'decision_tree' as const;
  public readonly minFeatures: number;
  private readonly tree: DecisionTreeParams;

  constructor(params: DecisionTreeParams) {
    this.tree = params;
    let maxFeature = -1;
    params.children_left.forEach((left, index) => {
      if (left !== -1) {
        maxFeature = Math.max(maxFeature, params.feature[index] ?? -1);
      }
    });
    this.minFeatures = maxFeature + 1;
  }

  // A tree may leave trailing columns unused
  public acceptsWidth(width: number): boolean {
    return width >= this.minFeatures;
  }

  public predictProbability(vector: FeatureVector): number {
    const { children_left, children_right, feature, threshold, value } = this.tree;
    let node = 0;

    // Children are strictly after their parent, so this always reaches a leaf
    for (;;) {
      const left = children_left[node] ?? -1;
      if (left === -1) {
        break;
      }
      const x = vector[feature[node] ?? 0] ?? 0;
      node = x <= (threshold[node] ?? 0) ? left : (children_right[node] ?? -1);
    }

    const [negative, positive] = value[node] ?? [1, 0];
    return positive / (negative + positive);
  }
}
