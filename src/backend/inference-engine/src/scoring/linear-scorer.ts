/**
 * Linear Multi-Class Scorer
 *
 * logit[c] = sum_j coefficients[c][j] * x[j] + intercepts[c]
 *
 * Products are summed in ascending feature order, then the intercept is
 * added, matching the order the training library's decision function uses.
 */

import { ArtifactError, ConfigurationError } from '@classifier-runtime/shared';

export class LinearScorer {
  readonly width: number;
  /** Single-row model scored as `[0, z]` over two classes */
  readonly binary: boolean;

  constructor(
    private readonly coefficients: readonly (readonly number[])[],
    private readonly intercepts: readonly number[],
    readonly classCount: number
  ) {
    if (coefficients.length === 0) {
      throw new ConfigurationError('Coefficient matrix is empty');
    }
    if (classCount === 0) {
      throw new ConfigurationError('Class list is empty');
    }

    this.binary = coefficients.length === 1 && classCount === 2;
    if (!this.binary && coefficients.length !== classCount) {
      throw new ArtifactError(
        `Coefficient matrix has ${coefficients.length} rows but there are ${classCount} classes`
      );
    }
    if (intercepts.length !== coefficients.length) {
      throw new ArtifactError(
        `Intercept vector has ${intercepts.length} entries but coefficient matrix has ${coefficients.length} rows`
      );
    }

    this.width = coefficients[0].length;
    coefficients.forEach((row, rowIndex) => {
      if (row.length !== this.width) {
        throw new ArtifactError(
          `Coefficient row ${rowIndex} has ${row.length} columns, expected ${this.width}`
        );
      }
    });
  }

  score(features: ArrayLike<number>): number[] {
    if (features.length !== this.width) {
      throw new ArtifactError(
        `Feature vector has ${features.length} entries but the model expects ${this.width}`
      );
    }

    const logits = this.coefficients.map((row, rowIndex) => {
      let sum = 0;
      for (let j = 0; j < row.length; j++) {
        sum += row[j] * features[j];
      }
      return sum + this.intercepts[rowIndex];
    });

    return this.binary ? [0, logits[0]] : logits;
  }
}
