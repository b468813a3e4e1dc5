/**
 * Classifier Error Taxonomy
 *
 * Fatal errors raised while loading artifacts or building classifiers.
 * Per-call anomalies (unknown categories, missing numerics, degenerate text)
 * are never thrown; they are reported through prediction diagnostics.
 */

import type { ZodIssue } from 'zod';

export const ClassifierErrorCode = {
  ARTIFACT_INVALID: 'ARTIFACT_INVALID',
  CONFIGURATION_INVALID: 'CONFIGURATION_INVALID',
} as const;

export type ClassifierErrorCode = (typeof ClassifierErrorCode)[keyof typeof ClassifierErrorCode];

/**
 * Base class for load-time and configuration failures
 */
export class ClassifierError extends Error {
  constructor(
    message: string,
    public readonly code: ClassifierErrorCode,
    public readonly details: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ClassifierError';
  }
}

/**
 * Malformed JSON, missing fields, dimension mismatches, unreadable file.
 */
export class ArtifactError extends ClassifierError {
  constructor(message: string, details: string[] = [], options?: { cause?: unknown }) {
    super(message, ClassifierErrorCode.ARTIFACT_INVALID, details, options);
    this.name = 'ArtifactError';
  }
}

/**
 * Empty vocabulary, empty classes, empty coefficient matrix, or an invalid
 * rule table / engine configuration.
 */
export class ConfigurationError extends ClassifierError {
  constructor(message: string, details: string[] = [], options?: { cause?: unknown }) {
    super(message, ClassifierErrorCode.CONFIGURATION_INVALID, details, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Renders zod issues as `path: message` lines
 */
export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
