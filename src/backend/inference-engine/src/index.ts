/**
 * Inference Engine
 *
 * Dependency-free inference for exported TF-IDF + linear classifiers and
 * categorical-feature classifiers.
 */

// Text pipeline
export * from './text/tokenizer.js';
export * from './text/tfidf-vectorizer.js';

// Scoring and decision
export * from './scoring/linear-scorer.js';
export * from './scoring/decision-layer.js';

// Heuristic overlay
export * from './heuristics/heuristic-overlay.js';

// Categorical features
export * from './features/feature-encoder.js';

// Artifact loading
export * from './loader/artifact-loader.js';

// Classifiers
export * from './engine/text-classifier.js';
export * from './engine/feature-classifier.js';
export * from './engine/model-registry.js';

// Configuration
export * from './config/engine-config.js';
