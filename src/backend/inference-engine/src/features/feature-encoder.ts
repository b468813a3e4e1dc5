/**
 * Feature Encoder
 *
 * Turns a raw categorical/numeric input tuple into the fixed feature row a
 * feature-model artifact was trained on. Unknown categories and missing
 * numerics are substituted and reported; they never fail a request.
 *
 * @tested tests/property/feature-encoder.property.test.ts
 */

import { z } from 'zod';
import {
  ConfigurationError,
  InputWarningKind,
  formatIssues,
  type InputWarning,
} from '@classifier-runtime/shared';

/**
 * Raw caller input, keyed by input name
 */
export type FeatureTuple = Readonly<Record<string, string | number | boolean | null | undefined>>;

export const FeatureRecipeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('categorical'), encoder: z.string().min(1), input: z.string().min(1) }),
  z.object({ kind: z.literal('log1p'), input: z.string().min(1) }),
  z.object({ kind: z.literal('numeric'), input: z.string().min(1) }),
  z.object({
    kind: z.literal('modelTrait'),
    trait: z.enum(['coder', 'instant', 'size']),
    input: z.string().min(1),
  }),
]);

export type FeatureRecipe = z.infer<typeof FeatureRecipeSchema>;

export const FeatureRecipeTableSchema = z.record(z.string().min(1), FeatureRecipeSchema);

export type FeatureRecipeTable = z.infer<typeof FeatureRecipeTableSchema>;

/**
 * Recipes for the model recommender's exported feature list
 */
export const DEFAULT_FEATURE_RECIPES: FeatureRecipeTable = {
  action_encoded: { kind: 'categorical', encoder: 'action', input: 'action' },
  language_encoded: { kind: 'categorical', encoder: 'language', input: 'language' },
  complexity_encoded: { kind: 'categorical', encoder: 'complexity', input: 'complexity' },
  log_cost: { kind: 'log1p', input: 'cost_per_1m' },
  log_context: { kind: 'log1p', input: 'context_window' },
  has_coder_tag: { kind: 'modelTrait', trait: 'coder', input: 'model_id' },
  has_instant_tag: { kind: 'modelTrait', trait: 'instant', input: 'model_id' },
  model_size: { kind: 'modelTrait', trait: 'size', input: 'model_id' },
};

/**
 * Encoding used when a categorical value was never seen in training
 */
export const UNKNOWN_CATEGORY_INDEX = 0;

/**
 * Value used when a numeric input is absent or not finite
 */
export const MISSING_NUMERIC_VALUE = 0;

/**
 * Parameter-count tags, checked in this order
 */
export const MODEL_SIZE_TAGS = ['405b', '120b', '70b', '32b', '33b', '22b', '9b', '8b', '3b'] as const;

export interface ModelTraits {
  coder: number;
  instant: number;
  size: number;
}

/**
 * Traits read off a model identifier such as "qwen2.5-coder-32b-instruct"
 */
export function deriveModelTraits(modelId: string): ModelTraits {
  const lower = modelId.toLowerCase();
  const sizeTag = MODEL_SIZE_TAGS.find((tag) => lower.includes(tag));

  return {
    coder: lower.includes('coder') || lower.includes('code') ? 1 : 0,
    instant: lower.includes('instant') || lower.includes('flash') ? 1 : 0,
    size: sizeTag ? Number.parseInt(sizeTag, 10) : 0,
  };
}

export interface EncodedFeatures {
  values: Float64Array;
  warnings: InputWarning[];
}

export class FeatureEncoder {
  private readonly recipes: readonly FeatureRecipe[];

  constructor(
    readonly features: readonly string[],
    private readonly encoders: ReadonlyMap<string, ReadonlyMap<string, number>>,
    recipeTable: FeatureRecipeTable = DEFAULT_FEATURE_RECIPES
  ) {
    const parsed = FeatureRecipeTableSchema.safeParse(recipeTable);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid feature recipe table', formatIssues(parsed.error.issues));
    }

    const missing = features.filter((feature) => parsed.data[feature] === undefined);
    if (missing.length > 0) {
      throw new ConfigurationError(`No recipe for feature(s): ${missing.join(', ')}`, missing);
    }

    this.recipes = features.map((feature) => parsed.data[feature]);

    const missingEncoders = this.recipes.flatMap((recipe) =>
      recipe.kind === 'categorical' && !encoders.has(recipe.encoder) ? [recipe.encoder] : []
    );
    if (missingEncoders.length > 0) {
      throw new ConfigurationError(
        `Artifact has no encoder for: ${missingEncoders.join(', ')}`,
        missingEncoders
      );
    }
  }

  encode(tuple: FeatureTuple): EncodedFeatures {
    const values = new Float64Array(this.recipes.length);
    const warnings: InputWarning[] = [];

    this.recipes.forEach((recipe, i) => {
      values[i] = this.encodeOne(this.features[i], recipe, tuple, warnings);
    });

    return { values, warnings };
  }

  private encodeOne(
    feature: string,
    recipe: FeatureRecipe,
    tuple: FeatureTuple,
    warnings: InputWarning[]
  ): number {
    const raw = tuple[recipe.input];

    switch (recipe.kind) {
      case 'categorical': {
        const mapping = this.encoders.get(recipe.encoder);
        const value = raw === null || raw === undefined ? '' : String(raw);
        const encoded = mapping?.get(value) ?? mapping?.get(value.toLowerCase());
        if (encoded !== undefined) {
          return encoded;
        }
        warnings.push({
          kind: InputWarningKind.UNKNOWN_CATEGORY,
          feature,
          input: recipe.input,
          received: raw ?? null,
          substituted: UNKNOWN_CATEGORY_INDEX,
        });
        return UNKNOWN_CATEGORY_INDEX;
      }
      case 'log1p':
      case 'numeric': {
        const numeric = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
        const value =
          typeof numeric === 'number' && recipe.kind === 'log1p' ? Math.log1p(numeric) : numeric;
        // log1p is not finite at or below -1
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          warnings.push({
            kind: InputWarningKind.MISSING_VALUE,
            feature,
            input: recipe.input,
            received: raw ?? null,
            substituted: MISSING_NUMERIC_VALUE,
          });
          return MISSING_NUMERIC_VALUE;
        }
        return value;
      }
      case 'modelTrait': {
        if (typeof raw !== 'string' || raw === '') {
          warnings.push({
            kind: InputWarningKind.MISSING_VALUE,
            feature,
            input: recipe.input,
            received: raw ?? null,
            substituted: 0,
          });
          return 0;
        }
        return deriveModelTraits(raw)[recipe.trait];
      }
    }
  }
}
