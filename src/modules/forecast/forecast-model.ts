// ===========================================
// MODULE: FORECAST MODEL
// Trained regressor loaded from a JSON artifact
// ===========================================

import fs from 'node:fs';
import { z } from 'zod';
import { ReferenceDataError } from '../../utils/errors.js';
import { FEATURE_NAMES } from './features.js';
import type { Predictor } from './features.js';

// ============ TYPES ============

export type ModelKind = 'linear' | 'tree_ensemble';

export interface ForecastModel extends Predictor {
  kind: ModelKind;
  version: string;
  featureNames: readonly string[];
}

// XGBoost JSON dump layout
export type TreeNode =
  | { nodeid: number; leaf: number }
  | {
      nodeid: number;
      split: string;
      split_condition: number;
      yes: number;
      no: number;
      missing: number;
      children: TreeNode[];
    };

// ============ ARTIFACT SCHEMA ============

const leafSchema = z.object({ nodeid: z.number().int(), leaf: z.number() });

const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    leafSchema,
    z.object({
      nodeid: z.number().int(),
      split: z.string(),
      split_condition: z.number(),
      yes: z.number().int(),
      no: z.number().int(),
      missing: z.number().int(),
      children: z.array(treeNodeSchema).min(1),
    }),
  ])
);

const artifactSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('linear'),
    version: z.string().min(1),
    featureNames: z.array(z.string()),
    intercept: z.number(),
    coefficients: z.record(z.string(), z.number()),
  }),
  z.object({
    kind: z.literal('tree_ensemble'),
    version: z.string().min(1),
    featureNames: z.array(z.string()),
    base_score: z.number().default(0.5),
    trees: z.array(treeNodeSchema).min(1),
  }),
]);

export type ModelArtifact = z.input<typeof artifactSchema>;

// ============ IMPLEMENTATIONS ============

class LinearModel implements ForecastModel {
  readonly kind = 'linear';
  private readonly weights: number[];

  constructor(
    readonly version: string,
    readonly featureNames: readonly string[],
    private readonly intercept: number,
    coefficients: Readonly<Record<string, number>>
  ) {
    this.weights = featureNames.map((name) => coefficients[name] ?? 0);
  }

  predict(features: readonly number[]): number {
    return this.weights.reduce((sum, weight, i) => sum + weight * (features[i] ?? 0), this.intercept);
  }
}

class TreeEnsembleModel implements ForecastModel {
  readonly kind = 'tree_ensemble';

  constructor(
    readonly version: string,
    readonly featureNames: readonly string[],
    private readonly baseScore: number,
    private readonly trees: readonly TreeNode[]
  ) {}

  predict(features: readonly number[]): number {
    return this.trees.reduce((sum, tree) => sum + this.walk(tree, features), this.baseScore);
  }

  private featureIndex(split: string): number {
    const positional = /^f(\d+)$/.exec(split);
    return positional?.[1] !== undefined ? Number(positional[1]) : this.featureNames.indexOf(split);
  }

  private walk(root: TreeNode, features: readonly number[]): number {
    let node = root;
    while (!('leaf' in node)) {
      const value = features[this.featureIndex(node.split)];
      const nextId =
        value === undefined || Number.isNaN(value)
          ? node.missing
          : value < node.split_condition
            ? node.yes
            : node.no;

      const next = node.children.find((child) => child.nodeid === nextId);
      if (!next) {
        throw new ReferenceDataError(
          `Tree node ${node.nodeid} points at missing child ${nextId}`,
          'forecast model'
        );
      }
      node = next;
    }
    return node.leaf;
  }
}

// ============ LOADING ============

type ModelSpec = z.infer<typeof artifactSchema>;

function validateArtifact(json: unknown, origin: string): ModelSpec {
  const parsed = artifactSchema.safeParse(json);
  if (!parsed.success) {
    throw new ReferenceDataError(
      `Forecast model ${origin} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      'forecast model',
      parsed.error
    );
  }
  return parsed.data;
}

function fromSpec(spec: ModelSpec): ForecastModel {
  if (spec.featureNames.join(',') !== FEATURE_NAMES.join(',')) {
    throw new ReferenceDataError(
      `Forecast model features [${spec.featureNames.join(', ')}] do not match [${FEATURE_NAMES.join(', ')}]`,
      'forecast model'
    );
  }

  if (spec.kind === 'linear') {
    const unknown = Object.keys(spec.coefficients).filter((name) => !spec.featureNames.includes(name));
    if (unknown.length > 0) {
      throw new ReferenceDataError(
        `Forecast model has coefficients for unknown features: ${unknown.join(', ')}`,
        'forecast model'
      );
    }
    return new LinearModel(spec.version, spec.featureNames, spec.intercept, spec.coefficients);
  }

  return new TreeEnsembleModel(spec.version, spec.featureNames, spec.base_score, spec.trees);
}

/**
 * Build a model from an in-memory artifact. The artifact must list the
 * engine's features in the engine's order.
 */
export function createForecastModel(artifact: ModelArtifact): ForecastModel {
  return fromSpec(validateArtifact(artifact, 'artifact'));
}

export function loadForecastModel(filePath: string): ForecastModel {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ReferenceDataError(
      `Cannot read forecast model at ${filePath}`,
      'forecast model',
      error instanceof Error ? error : undefined
    );
  }

  return fromSpec(validateArtifact(json, `at ${filePath}`));
}
