/**
 * Decision Layer
 *
 * Softmax over adjusted logits, arg-max selection with first-occurrence
 * tie-breaking, and helpers for presenting the distribution.
 *
 * @tested tests/property/decision-layer.property.test.ts
 */

import { ConfigurationError, type RankedProbability } from '@classifier-runtime/shared';

export interface Decision {
  label: string;
  index: number;
  confidence: number;
  probabilities: Record<string, number>;
}

/**
 * Numerically stable softmax: the maximum is subtracted before exponentiation
 */
export function softmax(logits: readonly number[]): number[] {
  if (logits.length === 0) {
    return [];
  }

  const max = logits.reduce((a, b) => (b > a ? b : a), logits[0]);
  const exps = logits.map((logit) => Math.exp(logit - max));
  const sum = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / sum);
}

/**
 * Index of the largest value; ties resolve to the earliest index
 */
export function argMax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

export function decide(logits: readonly number[], classes: readonly string[]): Decision {
  if (classes.length === 0) {
    throw new ConfigurationError('Class list is empty');
  }
  if (logits.length !== classes.length) {
    throw new ConfigurationError(
      `Received ${logits.length} logits for ${classes.length} classes`
    );
  }

  const probs = softmax(logits);
  const index = argMax(probs);
  // fromEntries defines own keys, so a "__proto__" label survives
  const probabilities: Record<string, number> = Object.fromEntries(
    classes.map((label, i) => [label, probs[i]])
  );

  return {
    label: classes[index],
    index,
    confidence: probs[index],
    probabilities,
  };
}

/**
 * Distribution entries by descending probability. Equal probabilities keep
 * the order of `classes`; without it they keep key order, which lists
 * integer-like labels such as "0" first.
 */
export function rankProbabilities(
  probabilities: Record<string, number>,
  classes: readonly string[] = Object.keys(probabilities)
): RankedProbability[] {
  return classes
    .flatMap((label) =>
      Object.hasOwn(probabilities, label) ? [{ label, probability: probabilities[label] }] : []
    )
    .sort((a, b) => b.probability - a.probability);
}

/**
 * Four decimals with trailing zeros trimmed: 0.25 -> "0.25", 1 -> "1"
 */
export function formatProbability(probability: number): string {
  return probability.toFixed(4).replace(/0+$/, '').replace(/\.$/, '');
}
