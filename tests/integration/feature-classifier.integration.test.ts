/**
 * Feature Classifier Integration Tests
 *
 * Runs the model recommender export end to end: categorical encoding with
 * fallbacks, single-row binary scoring and the two-class distribution.
 */

import { beforeAll, describe, expect, it } from 'vitest';

import {
  InputWarningSchema,
  MetricNames,
  createLogger,
  createMetricsCollector,
  type FeatureModelArtifact,
} from '../../src/backend/shared/src/index.js';
import { loadFeatureArtifact } from '../../src/backend/inference-engine/src/loader/artifact-loader.js';
import { FeatureClassifier } from '../../src/backend/inference-engine/src/engine/feature-classifier.js';

const sigmoid = (z: number): number => 1 / (1 + Math.exp(-z));

// Test fixtures
const knownTuple = {
  action: 'review',
  language: 'Python',
  complexity: 'simple',
  cost_per_1m: 0,
  context_window: 0,
  model_id: 'qwen2.5-coder-32b',
};

// 0.5*3 + 0.1*1 - 0.2*2 + 0.4*1 + 0.01*32 - 0.5
const knownLogit = 1.42;

describe('Feature Classifier Integration Tests', () => {
  let artifact: FeatureModelArtifact;

  beforeAll(async () => {
    artifact = await loadFeatureArtifact(new URL('../fixtures/recommender-model.json', import.meta.url));
  });

  const recommender = (options: Partial<ConstructorParameters<typeof FeatureClassifier>[0]> = {}) =>
    new FeatureClassifier({
      id: 'recommender',
      artifact,
      logger: createLogger({ enableConsole: false }),
      ...options,
    });

  it('should score a fully known tuple as a binary logistic model', () => {
    const result = recommender().classifyFeatures(knownTuple);

    expect(result.diagnostics.rawLogits[0]).toBe(0);
    expect(result.diagnostics.rawLogits[1]).toBeCloseTo(knownLogit, 12);
    expect(result.probabilities.success).toBeCloseTo(sigmoid(knownLogit), 12);
    expect(result.probabilities.failure + result.probabilities.success).toBeCloseTo(1, 12);
    expect(result.label).toBe('success');
    expect(result.diagnostics.warnings).toEqual([]);
    expect(result.diagnostics.degenerate).toBe(false);
  });

  it('should expose the positive-class probability', () => {
    expect(recommender().successProbability(knownTuple)).toBeCloseTo(sigmoid(knownLogit), 12);
  });

  it('should substitute defaults for unknown and missing inputs without failing', () => {
    const result = recommender().classifyFeatures({ action: 'deploy', language: 'rust', complexity: 'unknown' });
    const { warnings } = result.diagnostics;

    expect(warnings.map((warning) => `${warning.kind}:${warning.feature}`)).toEqual([
      'unknown_category:action_encoded',
      'unknown_category:language_encoded',
      'unknown_category:complexity_encoded',
      'missing_value:log_cost',
      'missing_value:log_context',
      'missing_value:has_coder_tag',
      'missing_value:has_instant_tag',
      'missing_value:model_size',
    ]);
    warnings.forEach((warning) => {
      expect(InputWarningSchema.safeParse(warning).success).toBe(true);
    });
    expect(warnings[1]).toEqual({
      kind: 'unknown_category',
      feature: 'language_encoded',
      input: 'language',
      received: 'rust',
      substituted: 0,
    });
    expect(result.diagnostics.degenerate).toBe(true);
    expect(result.diagnostics.rawLogits).toEqual([0, -0.5]);
    expect(result.label).toBe('failure');
    expect(result.confidence).toBeCloseTo(sigmoid(0.5), 12);
  });

  it('should report the artifact version or "unversioned"', () => {
    expect(recommender().version).toBe('unversioned');
    expect(recommender({ artifact: { ...artifact, metadata: { version: '3.0.0' } } }).version).toBe('3.0.0');
  });

  it('should log substitutions at debug level only', () => {
    const logger = createLogger({ enableConsole: false, minLevel: 'debug' });
    const result = recommender({ logger }).classifyFeatures({ ...knownTuple, language: 'rust' });

    const [entry] = logger.getLogEntries();
    expect(entry.message).toBe('Substituted defaults for feature input');
    expect(entry.correlationId).toBe(result.diagnostics.requestId);
    expect(entry.metadata).toEqual({
      classifier: 'recommender',
      warnings: ['unknown_category:language_encoded'],
    });

    const quiet = createLogger({ enableConsole: false });
    recommender({ logger: quiet }).classifyFeatures({ ...knownTuple, language: 'rust' });
    expect(quiet.getLogEntries()).toEqual([]);
  });

  it('should count warnings in the inference metrics', () => {
    const metrics = createMetricsCollector();
    const classifier = recommender({ metrics });
    const tags = { classifier: 'recommender' };

    classifier.classifyFeatures(knownTuple);
    classifier.classifyFeatures({ ...knownTuple, action: 'deploy', language: 'rust' });

    expect(metrics.getCounter(MetricNames.INFERENCE_COUNT, tags)).toBe(2);
    expect(metrics.getCounter(MetricNames.INPUT_WARNING_COUNT, tags)).toBe(2);
    expect(metrics.getCounter(MetricNames.DEGENERATE_INPUT_COUNT, tags)).toBe(0);
  });
});
