/**
 * Model Artifact Schemas
 *
 * The exported JSON shapes produced by the offline training jobs. These
 * schemas are the only contract between training and inference: the
 * inference engine never depends on anything the trainer does beyond them.
 *
 * @tested tests/integration/artifact-loader.integration.test.ts
 */

import { z } from 'zod';

const finiteNumber = z.number().finite();

const columnIndex = z.number().int().nonnegative();

/**
 * A JSON object read as its own `[key, value]` entries. Record parsing
 * assigns keys onto a fresh object, which loses a `__proto__` key, and
 * `__proto__` is a valid vocabulary term or category.
 */
function entriesOf<T extends z.ZodTypeAny>(valueSchema: T) {
  return z
    .custom<Record<string, unknown>>(
      (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
      { message: 'Expected an object' }
    )
    .transform((record) => Object.entries(record))
    .pipe(z.array(z.tuple([z.string(), valueSchema])));
}

/**
 * Metadata block written next to the weights
 */
export const ArtifactMetadataSchema = z.object({
  version: z.string().min(1),
  trained_at: z.string().datetime({ offset: true }),
  accuracy: finiteNumber,
  num_examples: z.number().int().nonnegative(),
  vocabulary_size: z.number().int().nonnegative(),
  num_features: z.number().int().nonnegative(),
  model_type: z.string().optional(),
});

export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;

/**
 * TF-IDF block: term -> column index, and one idf weight per column
 */
export const TfidfSectionSchema = z.object({
  vocabulary: entriesOf(columnIndex),
  idf_weights: z.array(finiteNumber),
});

/**
 * Multinomial linear classifier block
 */
export const ClassifierSectionSchema = z.object({
  coefficients: z.array(z.array(finiteNumber)),
  intercepts: z.array(finiteNumber),
  classes: z.array(z.string().min(1)),
});

/**
 * Text classifier artifact (complexity, intent)
 */
export const TextModelArtifactSchema = z.object({
  metadata: ArtifactMetadataSchema,
  tfidf: TfidfSectionSchema,
  classifier: ClassifierSectionSchema,
});

export type RawTextModelArtifact = z.infer<typeof TextModelArtifactSchema>;

/**
 * Categorical-feature classifier artifact (model recommender). A binary
 * export carries a single coefficient row and may omit `classes`.
 */
export const FeatureModelArtifactSchema = z.object({
  metadata: ArtifactMetadataSchema.partial().optional(),
  features: z.array(z.string().min(1)),
  coefficients: z.array(z.array(finiteNumber)),
  intercept: z.array(finiteNumber),
  encoders: entriesOf(entriesOf(columnIndex)),
  classes: z.array(z.string().min(1)).optional(),
});

export type RawFeatureModelArtifact = z.infer<typeof FeatureModelArtifactSchema>;

/**
 * Classes assumed for a binary export that omits them
 */
export const DEFAULT_BINARY_CLASSES = ['failure', 'success'] as const;

/**
 * Validated, immutable text model held by a classifier
 */
export interface TextModelArtifact {
  readonly metadata: Readonly<ArtifactMetadata>;
  readonly vocabulary: ReadonlyMap<string, number>;
  readonly idf: readonly number[];
  readonly coefficients: readonly (readonly number[])[];
  readonly intercepts: readonly number[];
  readonly classes: readonly string[];
}

/**
 * Validated, immutable feature model held by a classifier
 */
export interface FeatureModelArtifact {
  readonly metadata: Readonly<Partial<ArtifactMetadata>>;
  readonly features: readonly string[];
  readonly coefficients: readonly (readonly number[])[];
  readonly intercepts: readonly number[];
  readonly encoders: ReadonlyMap<string, ReadonlyMap<string, number>>;
  readonly classes: readonly string[];
}
