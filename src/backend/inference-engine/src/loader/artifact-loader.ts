/**
 * Model Artifact Loader
 *
 * Parses exported JSON artifacts and validates every structural invariant
 * before anything is handed to a classifier. Either a complete, frozen
 * artifact comes back or an error is thrown.
 *
 * @tested tests/integration/artifact-loader.integration.test.ts
 */

import { readFile } from 'node:fs/promises';

import {
  ArtifactError,
  ConfigurationError,
  DEFAULT_BINARY_CLASSES,
  FeatureModelArtifactSchema,
  TextModelArtifactSchema,
  formatIssues,
  type FeatureModelArtifact,
  type TextModelArtifact,
} from '@classifier-runtime/shared';

function parseJson(input: unknown): unknown {
  if (typeof input !== 'string') {
    return input;
  }
  try {
    return JSON.parse(input);
  } catch (error) {
    throw new ArtifactError('Artifact is not valid JSON', [], { cause: error });
  }
}

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      duplicates.add(value);
    }
    seen.add(value);
  }
  return [...duplicates];
}

function freezeMatrix(matrix: number[][]): readonly (readonly number[])[] {
  return Object.freeze(matrix.map((row) => Object.freeze([...row])));
}

/**
 * Shared checks for the classifier block of either artifact kind
 */
function checkClassifierShape(
  coefficients: number[][],
  intercepts: number[],
  classes: string[],
  width: number,
  allowBinaryRow: boolean
): void {
  if (classes.length === 0) {
    throw new ConfigurationError('Artifact defines no classes');
  }
  if (coefficients.length === 0) {
    throw new ConfigurationError('Artifact has an empty coefficient matrix');
  }

  const duplicates = findDuplicates(classes);
  if (duplicates.length > 0) {
    throw new ArtifactError(`Duplicate class labels: ${duplicates.join(', ')}`, duplicates);
  }

  const binaryRow = allowBinaryRow && coefficients.length === 1 && classes.length === 2;
  if (!binaryRow && coefficients.length !== classes.length) {
    throw new ArtifactError(
      `Coefficient matrix has ${coefficients.length} rows but there are ${classes.length} classes`
    );
  }
  if (intercepts.length !== coefficients.length) {
    throw new ArtifactError(
      `Intercept vector has ${intercepts.length} entries, expected ${coefficients.length}`
    );
  }

  const badRows = coefficients.flatMap((row, i) =>
    row.length === width ? [] : [`row ${i}: ${row.length} columns, expected ${width}`]
  );
  if (badRows.length > 0) {
    throw new ArtifactError('Coefficient rows do not match the feature width', badRows);
  }
}

/**
 * Validates a text classifier artifact (JSON string or parsed value)
 */
export function parseTextArtifact(input: unknown): TextModelArtifact {
  const parsed = TextModelArtifactSchema.safeParse(parseJson(input));
  if (!parsed.success) {
    throw new ArtifactError('Malformed text model artifact', formatIssues(parsed.error.issues));
  }
  const { metadata, tfidf, classifier } = parsed.data;

  const terms = tfidf.vocabulary;
  if (terms.length === 0) {
    throw new ConfigurationError('Artifact vocabulary is empty');
  }

  const size = terms.length;
  if (tfidf.idf_weights.length !== size) {
    throw new ArtifactError(
      `idf_weights has ${tfidf.idf_weights.length} entries but vocabulary has ${size} terms`
    );
  }
  if (metadata.vocabulary_size !== size) {
    throw new ArtifactError(
      `metadata.vocabulary_size is ${metadata.vocabulary_size} but vocabulary has ${size} terms`
    );
  }

  const columns = new Set<number>();
  for (const [term, index] of terms) {
    if (index >= size) {
      throw new ArtifactError(`Vocabulary index ${index} for "${term}" is out of range`);
    }
    if (columns.has(index)) {
      throw new ArtifactError(`Vocabulary index ${index} is assigned to more than one term`);
    }
    columns.add(index);
  }

  checkClassifierShape(classifier.coefficients, classifier.intercepts, classifier.classes, size, false);

  if (metadata.num_features !== size) {
    throw new ArtifactError(
      `metadata.num_features is ${metadata.num_features} but the model has ${size} columns`
    );
  }

  return Object.freeze({
    metadata: Object.freeze({ ...metadata }),
    vocabulary: new Map(terms),
    idf: Object.freeze([...tfidf.idf_weights]),
    coefficients: freezeMatrix(classifier.coefficients),
    intercepts: Object.freeze([...classifier.intercepts]),
    classes: Object.freeze([...classifier.classes]),
  });
}

/**
 * Validates a categorical-feature classifier artifact
 */
export function parseFeatureArtifact(input: unknown): FeatureModelArtifact {
  const parsed = FeatureModelArtifactSchema.safeParse(parseJson(input));
  if (!parsed.success) {
    throw new ArtifactError('Malformed feature model artifact', formatIssues(parsed.error.issues));
  }
  const raw = parsed.data;

  if (raw.features.length === 0) {
    throw new ConfigurationError('Artifact lists no features');
  }
  const duplicateFeatures = findDuplicates(raw.features);
  if (duplicateFeatures.length > 0) {
    throw new ArtifactError(
      `Duplicate feature names: ${duplicateFeatures.join(', ')}`,
      duplicateFeatures
    );
  }

  const classes = raw.classes ?? [...DEFAULT_BINARY_CLASSES];
  checkClassifierShape(raw.coefficients, raw.intercept, classes, raw.features.length, true);

  const encoders = new Map(raw.encoders.map(([name, values]) => [name, new Map(values)] as const));

  return Object.freeze({
    metadata: Object.freeze({ ...(raw.metadata ?? {}) }),
    features: Object.freeze([...raw.features]),
    coefficients: freezeMatrix(raw.coefficients),
    intercepts: Object.freeze([...raw.intercept]),
    encoders,
    classes: Object.freeze([...classes]),
  });
}

async function readArtifactFile(path: string | URL): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw new ArtifactError(`Cannot read artifact at ${String(path)}`, [], { cause: error });
  }
}

export async function loadTextArtifact(path: string | URL): Promise<TextModelArtifact> {
  return parseTextArtifact(await readArtifactFile(path));
}

export async function loadFeatureArtifact(path: string | URL): Promise<FeatureModelArtifact> {
  return parseFeatureArtifact(await readArtifactFile(path));
}
