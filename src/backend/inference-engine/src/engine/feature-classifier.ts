/**
 * Feature Classifier
 *
 * Categorical/numeric tuple -> feature encoder -> linear scorer -> decision
 * layer. Used by the model recommender, whose artifact carries encoders in
 * place of a TF-IDF vocabulary.
 *
 * @tested tests/integration/feature-classifier.integration.test.ts
 */

import { v4 as uuidv4 } from 'uuid';
import {
  getLogger,
  type FeatureModelArtifact,
  type Logger,
  type MetricsCollector,
  type PredictionResult,
} from '@classifier-runtime/shared';

import {
  DEFAULT_FEATURE_RECIPES,
  FeatureEncoder,
  type FeatureRecipeTable,
  type FeatureTuple,
} from '../features/feature-encoder.js';
import { LinearScorer } from '../scoring/linear-scorer.js';
import { decide } from '../scoring/decision-layer.js';

export interface FeatureClassifierOptions {
  id: string;
  artifact: FeatureModelArtifact;
  recipes?: FeatureRecipeTable;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class FeatureClassifier {
  readonly id: string;
  readonly artifact: FeatureModelArtifact;
  private readonly encoder: FeatureEncoder;
  private readonly scorer: LinearScorer;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: FeatureClassifierOptions) {
    const { artifact } = options;
    this.id = options.id;
    this.artifact = artifact;
    this.encoder = new FeatureEncoder(
      artifact.features,
      artifact.encoders,
      options.recipes ?? DEFAULT_FEATURE_RECIPES
    );
    this.scorer = new LinearScorer(artifact.coefficients, artifact.intercepts, artifact.classes.length);
    this.logger = options.logger ?? getLogger();
    this.metrics = options.metrics;
  }

  get version(): string {
    return this.artifact.metadata.version ?? 'unversioned';
  }

  classifyFeatures(tuple: FeatureTuple): PredictionResult {
    const stopTimer = this.metrics?.startTimer();
    const requestId = uuidv4();

    const { values, warnings } = this.encoder.encode(tuple);
    const logits = this.scorer.score(values);
    const decision = decide(logits, this.artifact.classes);

    const result: PredictionResult = {
      classifier: this.id,
      modelVersion: this.version,
      label: decision.label,
      confidence: decision.confidence,
      probabilities: decision.probabilities,
      diagnostics: {
        requestId,
        rawLogits: logits,
        adjustedLogits: [...logits],
        appliedHeuristics: [],
        recognizedTokens: 0,
        degenerate: values.every((value) => value === 0),
        warnings,
      },
    };

    if (warnings.length > 0 && this.logger.isLevelEnabled('debug')) {
      this.logger.child(requestId).debug('Substituted defaults for feature input', {
        classifier: this.id,
        warnings: warnings.map((warning) => `${warning.kind}:${warning.feature}`),
      });
    }

    if (stopTimer && this.metrics) {
      this.metrics.recordInference(this.id, stopTimer().durationMs, {
        confidence: result.confidence,
        degenerate: result.diagnostics.degenerate,
        warnings: warnings.length,
        heuristics: 0,
      });
    }

    return result;
  }

  /**
   * Probability of the positive (last) class, for binary recommenders
   */
  successProbability(tuple: FeatureTuple): number {
    const { probabilities } = this.classifyFeatures(tuple);
    const positive = this.artifact.classes[this.artifact.classes.length - 1];
    return probabilities[positive];
  }
}
