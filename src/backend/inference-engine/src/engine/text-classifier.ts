/**
 * Text Classifier
 *
 * text -> tokenizer -> TF-IDF vectorizer -> linear scorer -> heuristic
 * overlay -> decision layer. Stateless after construction: every call
 * allocates its own vector and logit arrays, so one instance can serve any
 * number of callers.
 *
 * @tested tests/integration/text-classifier.integration.test.ts
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ConfigurationError,
  getLogger,
  type Logger,
  type MetricsCollector,
  type PredictionResult,
  type TextModelArtifact,
} from '@classifier-runtime/shared';

import { TfidfVectorizer } from '../text/tfidf-vectorizer.js';
import { DEFAULT_TOKENIZER_OPTIONS, type TokenizerOptions } from '../text/tokenizer.js';
import { LinearScorer } from '../scoring/linear-scorer.js';
import { decide } from '../scoring/decision-layer.js';
import type { HeuristicOverlay, OverlayResult } from '../heuristics/heuristic-overlay.js';

export interface TextClassifierOptions {
  /** Classifier identity, e.g. "complexity" */
  id: string;
  artifact: TextModelArtifact;
  overlay?: HeuristicOverlay;
  tokenizerOptions?: TokenizerOptions;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface WeightedTerm {
  term: string;
  weight: number;
}

export class TextClassifier {
  readonly id: string;
  readonly artifact: TextModelArtifact;
  private readonly vectorizer: TfidfVectorizer;
  private readonly scorer: LinearScorer;
  private readonly overlay?: HeuristicOverlay;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: TextClassifierOptions) {
    const { artifact } = options;
    this.id = options.id;
    this.artifact = artifact;
    this.vectorizer = new TfidfVectorizer(
      artifact.vocabulary,
      artifact.idf,
      options.tokenizerOptions ?? DEFAULT_TOKENIZER_OPTIONS
    );
    this.scorer = new LinearScorer(artifact.coefficients, artifact.intercepts, artifact.classes.length);
    if (this.scorer.width !== this.vectorizer.size) {
      throw new ConfigurationError(
        `Classifier "${options.id}" expects ${this.scorer.width} features but the vocabulary has ${this.vectorizer.size}`
      );
    }
    this.overlay = options.overlay;
    this.logger = options.logger ?? getLogger();
    this.metrics = options.metrics;
  }

  get version(): string {
    return this.artifact.metadata.version;
  }

  /**
   * Dense, L2-normalised feature vector for a text
   */
  vectorize(text: string): Float64Array {
    return this.vectorizer.vectorize(text).vector;
  }

  classify(text: string): PredictionResult {
    const stopTimer = this.metrics?.startTimer();
    const requestId = uuidv4();
    const { classes } = this.artifact;

    const { vector, recognized } = this.vectorizer.vectorize(text);
    const rawLogits = this.scorer.score(vector);
    const overlaid: OverlayResult = this.overlay
      ? this.overlay.apply(text, rawLogits, classes)
      : { logits: [...rawLogits], applied: [] };
    const decision = decide(overlaid.logits, classes);

    const result: PredictionResult = {
      classifier: this.id,
      modelVersion: this.version,
      label: decision.label,
      confidence: decision.confidence,
      probabilities: decision.probabilities,
      diagnostics: {
        requestId,
        rawLogits,
        adjustedLogits: overlaid.logits,
        appliedHeuristics: overlaid.applied,
        recognizedTokens: recognized,
        degenerate: recognized === 0,
        warnings: [],
      },
    };

    if (this.logger.isLevelEnabled('debug')) {
      this.logger.child(requestId).debug('Text classified', {
        classifier: this.id,
        label: result.label,
        confidence: result.confidence,
        recognized,
        heuristics: overlaid.applied.map((rule) => rule.ruleId),
      });
    }

    if (stopTimer && this.metrics) {
      this.metrics.recordInference(this.id, stopTimer().durationMs, {
        confidence: result.confidence,
        degenerate: result.diagnostics.degenerate,
        warnings: 0,
        heuristics: overlaid.applied.length,
      });
    }

    return result;
  }

  /**
   * Vocabulary terms with the largest coefficients for a class
   */
  topFeatures(className: string, count = 5): WeightedTerm[] {
    const row = this.artifact.coefficients[this.artifact.classes.indexOf(className)];
    if (row === undefined) {
      return [];
    }

    return [...this.artifact.vocabulary]
      .map(([term, index]) => ({ term, weight: row[index] }))
      .sort((a, b) => b.weight - a.weight || a.term.localeCompare(b.term))
      .slice(0, Math.max(0, count));
  }
}
