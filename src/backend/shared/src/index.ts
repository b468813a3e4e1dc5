/**
 * Classifier Runtime Shared Package
 *
 * The artifact contract, prediction types, error taxonomy, logging and
 * metrics shared by the inference engine and its hosts.
 */

// Artifact contract
export * from './models/artifact.js';

// Prediction results
export * from './models/prediction.js';

// Errors
export * from './errors/classifier-errors.js';

// Logging
export * from './logging/logger.js';

// Metrics
export * from './metrics/metrics-collector.js';
