/**
 * TF-IDF Vectorizer
 *
 * Maps an n-gram multiset onto a dense, L2-normalised feature vector using a
 * closed vocabulary and the idf table exported with the model.
 *
 * @tested tests/property/tfidf-vectorizer.property.test.ts
 */

import { ArtifactError, ConfigurationError } from '@classifier-runtime/shared';

import { analyze, DEFAULT_TOKENIZER_OPTIONS, type TokenizerOptions } from './tokenizer.js';

export interface VectorizeResult {
  vector: Float64Array;
  /** In-vocabulary n-gram occurrences */
  recognized: number;
}

export function l2Norm(vector: ArrayLike<number>): number {
  let sumOfSquares = 0;
  for (let i = 0; i < vector.length; i++) {
    sumOfSquares += vector[i] * vector[i];
  }
  return Math.sqrt(sumOfSquares);
}

export class TfidfVectorizer {
  readonly size: number;

  constructor(
    private readonly vocabulary: ReadonlyMap<string, number>,
    private readonly idf: readonly number[],
    private readonly tokenizerOptions: TokenizerOptions = DEFAULT_TOKENIZER_OPTIONS
  ) {
    if (vocabulary.size === 0) {
      throw new ConfigurationError('Vocabulary is empty');
    }
    if (idf.length !== vocabulary.size) {
      throw new ArtifactError(
        `IDF table has ${idf.length} weights but vocabulary has ${vocabulary.size} terms`
      );
    }
    for (const [term, index] of vocabulary) {
      if (!Number.isInteger(index) || index < 0 || index >= idf.length) {
        throw new ArtifactError(`Vocabulary index ${index} for "${term}" is out of range`);
      }
    }
    this.size = vocabulary.size;
  }

  /**
   * Raw count times idf per column, then division by the vector's L2 norm.
   * An all-zero vector is returned as is.
   */
  transform(tokens: ReadonlyMap<string, number>): VectorizeResult {
    const vector = new Float64Array(this.size);
    let recognized = 0;

    for (const [token, count] of tokens) {
      const index = this.vocabulary.get(token);
      if (index === undefined) {
        continue;
      }
      vector[index] += count;
      recognized += count;
    }

    if (recognized === 0) {
      return { vector, recognized };
    }

    for (let i = 0; i < vector.length; i++) {
      if (vector[i] !== 0) {
        vector[i] *= this.idf[i];
      }
    }

    const norm = l2Norm(vector);
    if (norm > 0) {
      for (let i = 0; i < vector.length; i++) {
        vector[i] /= norm;
      }
    }

    return { vector, recognized };
  }

  vectorize(text: string): VectorizeResult {
    return this.transform(analyze(text, this.tokenizerOptions));
  }
}
