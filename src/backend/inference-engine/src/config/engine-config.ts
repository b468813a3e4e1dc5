/**
 * Engine Configuration
 *
 * Where artifacts and heuristic tables live, and which classifiers the
 * registry knows about. Values come from the environment with defaults and
 * are validated before use.
 *
 * @tested tests/integration/model-registry.integration.test.ts
 */

import { fileURLToPath } from 'node:url';

import { z } from 'zod';
import { ConfigurationError, LogLevelSchema, formatIssues } from '@classifier-runtime/shared';

import { DEFAULT_HEURISTICS_PATH } from '../heuristics/heuristic-overlay.js';

export const ClassifierKind = {
  TEXT: 'text',
  FEATURES: 'features',
} as const;

export type ClassifierKind = (typeof ClassifierKind)[keyof typeof ClassifierKind];

export const ClassifierDefinitionSchema = z.object({
  description: z.string(),
  kind: z.enum(['text', 'features']),
  /** Relative to the model directory */
  artifactFile: z.string().min(1),
  /** Key into the heuristic rule table; text classifiers only */
  heuristics: z.string().min(1).optional(),
});

export type ClassifierDefinition = z.infer<typeof ClassifierDefinitionSchema>;

export const EngineConfigSchema = z.object({
  modelDir: z.string().min(1),
  heuristicsPath: z.string().min(1),
  logLevel: LogLevelSchema,
  classifiers: z.record(z.string().min(1), ClassifierDefinitionSchema),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_CLASSIFIERS: Record<string, ClassifierDefinition> = {
  complexity: {
    description: 'Task complexity classifier (simple/complex/multistep)',
    kind: ClassifierKind.TEXT,
    artifactFile: 'complexity_model.json',
    heuristics: 'complexity',
  },
  intent: {
    description: 'Intent classifier (query/editor/research/review)',
    kind: ClassifierKind.TEXT,
    artifactFile: 'intent_model.json',
  },
  recommender: {
    description: 'Model recommender (predicts model success for tasks)',
    kind: ClassifierKind.FEATURES,
    artifactFile: 'recommender_model.json',
  },
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  modelDir: 'models',
  heuristicsPath: fileURLToPath(DEFAULT_HEURISTICS_PATH),
  logLevel: 'info',
  classifiers: DEFAULT_CLASSIFIERS,
};

/**
 * Builds the engine configuration from environment variables:
 * CLASSIFIER_MODEL_DIR, CLASSIFIER_HEURISTICS_PATH, CLASSIFIER_LOG_LEVEL
 */
export function loadEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const candidate = {
    ...DEFAULT_ENGINE_CONFIG,
    modelDir: env.CLASSIFIER_MODEL_DIR || DEFAULT_ENGINE_CONFIG.modelDir,
    heuristicsPath: env.CLASSIFIER_HEURISTICS_PATH || DEFAULT_ENGINE_CONFIG.heuristicsPath,
    logLevel: env.CLASSIFIER_LOG_LEVEL || DEFAULT_ENGINE_CONFIG.logLevel,
    ...overrides,
  };

  const result = EngineConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError('Invalid engine configuration', formatIssues(result.error.issues));
  }
  return result.data;
}
