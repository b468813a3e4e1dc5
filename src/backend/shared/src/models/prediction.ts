/**
 * Prediction Result Models
 *
 * Value types returned by the classifiers. Nothing here is retained by the
 * engine after a call returns.
 */

import { z } from 'zod';

/**
 * Recoverable per-call input anomalies
 */
export const InputWarningKind = {
  UNKNOWN_CATEGORY: 'unknown_category',
  MISSING_VALUE: 'missing_value',
} as const;

export type InputWarningKind = (typeof InputWarningKind)[keyof typeof InputWarningKind];

export const InputWarningSchema = z.object({
  kind: z.enum(['unknown_category', 'missing_value']),
  feature: z.string(),
  input: z.string(),
  received: z.union([z.string(), z.number(), z.boolean(), z.null()]),
  substituted: z.number(),
});

export type InputWarning = z.infer<typeof InputWarningSchema>;

/**
 * A heuristic rule that fired during a call
 */
export interface AppliedHeuristic {
  ruleId: string;
  targetClass: string;
  bonus: number;
  matchedCue: string;
}

/**
 * Optional diagnostic metadata attached to every prediction
 */
export interface PredictionDiagnostics {
  requestId: string;
  rawLogits: number[];
  adjustedLogits: number[];
  appliedHeuristics: AppliedHeuristic[];
  /** In-vocabulary n-gram occurrences seen (text classifiers only) */
  recognizedTokens: number;
  /** True when the feature vector was all zeros */
  degenerate: boolean;
  warnings: InputWarning[];
}

export const PredictionResultSchema = z.object({
  classifier: z.string().min(1),
  modelVersion: z.string(),
  label: z.string().min(1),
  confidence: z.number().min(0).max(1),
  probabilities: z.record(z.string(), z.number().min(0).max(1)),
});

export interface PredictionResult extends z.infer<typeof PredictionResultSchema> {
  diagnostics: PredictionDiagnostics;
}

/**
 * Entry of a probability distribution ranked by descending probability
 */
export interface RankedProbability {
  label: string;
  probability: number;
}
