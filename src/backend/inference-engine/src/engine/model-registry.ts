/**
 * Model Registry
 *
 * Holds one classifier per identity. Loading and reloading build a
 * complete classifier before a single reference swap, so concurrent readers
 * see either the previous model or the new one in full. A failed reload
 * leaves the previous model in place.
 *
 * @tested tests/integration/model-registry.integration.test.ts
 */

import path from 'node:path';

import {
  ConfigurationError,
  createLogger,
  type Logger,
  type MetricsCollector,
  type PredictionResult,
} from '@classifier-runtime/shared';

import { loadEngineConfig, type ClassifierDefinition, type EngineConfig } from '../config/engine-config.js';
import {
  loadHeuristicRules,
  overlayFor,
  type HeuristicRuleTable,
} from '../heuristics/heuristic-overlay.js';
import { loadFeatureArtifact, loadTextArtifact } from '../loader/artifact-loader.js';
import type { FeatureRecipeTable, FeatureTuple } from '../features/feature-encoder.js';
import { FeatureClassifier } from './feature-classifier.js';
import { TextClassifier } from './text-classifier.js';

export type Classifier = TextClassifier | FeatureClassifier;

export interface ModelRegistryOptions {
  config?: EngineConfig;
  /** Defaults to a logger at `config.logLevel` */
  logger?: Logger;
  /** Skips reading `config.heuristicsPath` */
  heuristics?: HeuristicRuleTable;
  recipes?: FeatureRecipeTable;
  metrics?: MetricsCollector;
}

export interface LoadedModelInfo {
  name: string;
  kind: ClassifierDefinition['kind'];
  version: string;
  classes: readonly string[];
}

export class ModelRegistry {
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;
  private readonly recipes?: FeatureRecipeTable;
  private readonly fixedHeuristics?: HeuristicRuleTable;
  private readonly classifiers = new Map<string, Classifier>();
  private readonly pending = new Map<string, Promise<Classifier>>();

  constructor(options: ModelRegistryOptions = {}) {
    this.config = options.config ?? loadEngineConfig();
    this.logger = options.logger ?? createLogger({ minLevel: this.config.logLevel });
    this.metrics = options.metrics;
    this.recipes = options.recipes;
    this.fixedHeuristics = options.heuristics;
  }

  definition(name: string): ClassifierDefinition {
    const definition = this.config.classifiers[name];
    if (!definition) {
      const known = Object.keys(this.config.classifiers).join(', ');
      throw new ConfigurationError(`Unknown classifier "${name}". Known classifiers: ${known}`);
    }
    return definition;
  }

  /**
   * Loads a classifier unless it is already loaded. Concurrent calls for the
   * same name share one build.
   */
  async load(name: string): Promise<Classifier> {
    const loaded = this.classifiers.get(name);
    if (loaded) {
      return loaded;
    }
    return this.pending.get(name) ?? this.reload(name);
  }

  async loadAll(): Promise<Classifier[]> {
    return Promise.all(Object.keys(this.config.classifiers).map((name) => this.load(name)));
  }

  /**
   * Rebuilds a classifier from disk and swaps it in. A reload requested
   * while one is in flight joins it.
   */
  async reload(name: string): Promise<Classifier> {
    const inFlight = this.pending.get(name);
    if (inFlight) {
      return inFlight;
    }

    const build = this.rebuild(name).finally(() => {
      this.pending.delete(name);
    });
    this.pending.set(name, build);
    return build;
  }

  private async rebuild(name: string): Promise<Classifier> {
    const definition = this.definition(name);
    const artifactPath = path.resolve(this.config.modelDir, definition.artifactFile);

    let classifier: Classifier;
    try {
      classifier = await this.build(name, definition, artifactPath);
    } catch (error) {
      this.metrics?.recordArtifactLoad(name, false);
      this.logger.error(
        `Failed to load classifier "${name}"`,
        error instanceof Error ? error : new Error(String(error)),
        { artifactPath, keptPrevious: this.classifiers.has(name) }
      );
      throw error;
    }

    this.classifiers.set(name, classifier);

    const vocabularySize =
      classifier instanceof TextClassifier ? classifier.artifact.vocabulary.size : undefined;
    this.metrics?.recordArtifactLoad(name, true, vocabularySize);
    this.logger.info(`Loaded classifier "${name}"`, {
      kind: definition.kind,
      version: classifier.version,
      classes: [...classifier.artifact.classes],
      vocabularySize,
      artifactPath,
    });

    return classifier;
  }

  private async build(
    name: string,
    definition: ClassifierDefinition,
    artifactPath: string
  ): Promise<Classifier> {
    if (definition.kind === 'features') {
      return new FeatureClassifier({
        id: name,
        artifact: await loadFeatureArtifact(artifactPath),
        recipes: this.recipes,
        logger: this.logger,
        metrics: this.metrics,
      });
    }

    const [artifact, heuristics] = await Promise.all([
      loadTextArtifact(artifactPath),
      definition.heuristics ? this.heuristicTable() : Promise.resolve(undefined),
    ]);

    return new TextClassifier({
      id: name,
      artifact,
      overlay: heuristics && definition.heuristics ? overlayFor(heuristics, definition.heuristics) : undefined,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  private async heuristicTable(): Promise<HeuristicRuleTable> {
    return this.fixedHeuristics ?? loadHeuristicRules(this.config.heuristicsPath);
  }

  get(name: string): Classifier {
    const classifier = this.classifiers.get(name);
    if (!classifier) {
      this.definition(name);
      throw new ConfigurationError(`Classifier "${name}" has not been loaded`);
    }
    return classifier;
  }

  getText(name: string): TextClassifier {
    const classifier = this.get(name);
    if (!(classifier instanceof TextClassifier)) {
      throw new ConfigurationError(`Classifier "${name}" does not take text input`);
    }
    return classifier;
  }

  getFeatures(name: string): FeatureClassifier {
    const classifier = this.get(name);
    if (!(classifier instanceof FeatureClassifier)) {
      throw new ConfigurationError(`Classifier "${name}" does not take feature input`);
    }
    return classifier;
  }

  classify(name: string, text: string): PredictionResult {
    return this.getText(name).classify(text);
  }

  classifyFeatures(name: string, tuple: FeatureTuple): PredictionResult {
    return this.getFeatures(name).classifyFeatures(tuple);
  }

  /**
   * Loaded classifiers in configuration order
   */
  list(): LoadedModelInfo[] {
    return Object.keys(this.config.classifiers).flatMap((name): LoadedModelInfo[] => {
      const classifier = this.classifiers.get(name);
      if (!classifier) {
        return [];
      }
      return [
        {
          name,
          kind: classifier instanceof TextClassifier ? 'text' : 'features',
          version: classifier.version,
          classes: classifier.artifact.classes,
        },
      ];
    });
  }
}
