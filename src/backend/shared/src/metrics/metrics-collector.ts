/**
 * Metrics Collection Module
 *
 * Counters, gauges and histograms for inference latency, input anomalies,
 * confidence distribution and artifact (re)loads.
 */

import type { TelemetryClient } from '../logging/logger.js';

export const MetricType = {
  COUNTER: 'counter',
  GAUGE: 'gauge',
  HISTOGRAM: 'histogram',
} as const;

export type MetricType = (typeof MetricType)[keyof typeof MetricType];

export interface MetricEntry {
  name: string;
  type: MetricType;
  value: number;
  timestamp: Date;
  tags: Record<string, string>;
}

export interface HistogramBuckets {
  boundaries: number[];
  counts: number[];
  sum: number;
  count: number;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  average: number;
  /** Cumulative counts per upper bound; the last bound is `+Inf` */
  buckets: Array<{ le: number | '+Inf'; count: number }>;
}

export interface MetricsSummary {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSummary>;
}

export interface TimerResult {
  durationMs: number;
}

export interface MetricsCollectorConfig {
  serviceName: string;
  enableConsole: boolean;
  telemetryClient?: TelemetryClient;
  defaultTags: Record<string, string>;
  /** Confidence below this value also counts as low confidence */
  lowConfidenceThreshold: number;
  /** Most recent entries kept for `getMetricEntries`; 0 keeps none */
  maxEntries: number;
}

export const defaultMetricsConfig: MetricsCollectorConfig = {
  serviceName: 'classifier-runtime',
  enableConsole: false,
  defaultTags: {},
  lowConfidenceThreshold: 0.5,
  maxEntries: 1000,
};

export const MetricNames = {
  INFERENCE_LATENCY: 'inference_latency_ms',
  INFERENCE_COUNT: 'inference_count',
  DEGENERATE_INPUT_COUNT: 'degenerate_input_count',
  INPUT_WARNING_COUNT: 'input_warning_count',
  HEURISTIC_APPLIED_COUNT: 'heuristic_applied_count',

  CONFIDENCE_SCORE: 'confidence_score',
  LOW_CONFIDENCE_COUNT: 'low_confidence_count',

  ARTIFACT_LOAD_COUNT: 'artifact_load_count',
  ARTIFACT_LOAD_ERROR_COUNT: 'artifact_load_error_count',
  ARTIFACT_VOCABULARY_SIZE: 'artifact_vocabulary_size',
} as const;

/**
 * Inference runs in well under a millisecond for these model sizes
 */
export const DEFAULT_LATENCY_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 25, 50];

export const DEFAULT_CONFIDENCE_BUCKETS = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1.0];

export class MetricsCollector {
  private config: MetricsCollectorConfig;
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, HistogramBuckets> = new Map();
  private metricEntries: MetricEntry[] = [];

  constructor(config: Partial<MetricsCollectorConfig> = {}) {
    this.config = { ...defaultMetricsConfig, ...config };
  }

  /**
   * Gets the retained metric entries, oldest first (for testing)
   */
  getMetricEntries(): MetricEntry[] {
    return [...this.metricEntries];
  }

  clear(): void {
    this.counters.clear();
    this.gauges.clear();
    this.histograms.clear();
    this.metricEntries = [];
  }

  private createMetricKey(name: string, tags: Record<string, string>): string {
    const sortedTags = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return sortedTags ? `${name}:${sortedTags}` : name;
  }

  private recordEntry(
    name: string,
    type: MetricType,
    value: number,
    tags: Record<string, string> = {}
  ): void {
    const entry: MetricEntry = {
      name,
      type,
      value,
      timestamp: new Date(),
      tags: { ...this.config.defaultTags, ...tags },
    };

    if (this.config.maxEntries > 0) {
      this.metricEntries.push(entry);
      if (this.metricEntries.length > this.config.maxEntries) {
        this.metricEntries.splice(0, this.metricEntries.length - this.config.maxEntries);
      }
    }

    if (this.config.enableConsole) {
      console.log(JSON.stringify(entry));
    }

    this.config.telemetryClient?.trackMetric(name, value, {
      service: this.config.serviceName,
      metricType: type,
      ...entry.tags,
    });
  }

  incrementCounter(name: string, value = 1, tags: Record<string, string> = {}): void {
    const key = this.createMetricKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    this.recordEntry(name, MetricType.COUNTER, value, tags);
  }

  getCounter(name: string, tags: Record<string, string> = {}): number {
    return this.counters.get(this.createMetricKey(name, tags)) ?? 0;
  }

  setGauge(name: string, value: number, tags: Record<string, string> = {}): void {
    this.gauges.set(this.createMetricKey(name, tags), value);
    this.recordEntry(name, MetricType.GAUGE, value, tags);
  }

  getGauge(name: string, tags: Record<string, string> = {}): number {
    return this.gauges.get(this.createMetricKey(name, tags)) ?? 0;
  }

  recordHistogram(
    name: string,
    value: number,
    tags: Record<string, string> = {},
    buckets: number[] = DEFAULT_LATENCY_BUCKETS
  ): void {
    const key = this.createMetricKey(name, tags);

    let histogram = this.histograms.get(key);
    if (!histogram) {
      histogram = {
        boundaries: buckets,
        counts: new Array<number>(buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      };
      this.histograms.set(key, histogram);
    }

    let bucketIndex = histogram.boundaries.findIndex((boundary) => value <= boundary);
    if (bucketIndex === -1) {
      bucketIndex = histogram.boundaries.length;
    }

    histogram.counts[bucketIndex]++;
    histogram.sum += value;
    histogram.count++;

    this.recordEntry(name, MetricType.HISTOGRAM, value, tags);
  }

  getHistogram(name: string, tags: Record<string, string> = {}): HistogramBuckets | undefined {
    return this.histograms.get(this.createMetricKey(name, tags));
  }

  /**
   * Starts a high-resolution timer and returns a function to stop it
   */
  startTimer(): () => TimerResult {
    const start = performance.now();
    return () => ({ durationMs: performance.now() - start });
  }

  /**
   * Records one completed inference call
   */
  recordInference(
    classifier: string,
    durationMs: number,
    outcome: { confidence: number; degenerate: boolean; warnings: number; heuristics: number }
  ): void {
    const tags = { classifier };
    this.recordHistogram(MetricNames.INFERENCE_LATENCY, durationMs, tags);
    this.incrementCounter(MetricNames.INFERENCE_COUNT, 1, tags);
    this.recordHistogram(MetricNames.CONFIDENCE_SCORE, outcome.confidence, tags, DEFAULT_CONFIDENCE_BUCKETS);

    if (outcome.confidence < this.config.lowConfidenceThreshold) {
      this.incrementCounter(MetricNames.LOW_CONFIDENCE_COUNT, 1, tags);
    }
    if (outcome.degenerate) {
      this.incrementCounter(MetricNames.DEGENERATE_INPUT_COUNT, 1, tags);
    }
    if (outcome.warnings > 0) {
      this.incrementCounter(MetricNames.INPUT_WARNING_COUNT, outcome.warnings, tags);
    }
    if (outcome.heuristics > 0) {
      this.incrementCounter(MetricNames.HEURISTIC_APPLIED_COUNT, outcome.heuristics, tags);
    }
  }

  recordArtifactLoad(classifier: string, success: boolean, vocabularySize?: number): void {
    const tags = { classifier };
    if (!success) {
      this.incrementCounter(MetricNames.ARTIFACT_LOAD_ERROR_COUNT, 1, tags);
      return;
    }
    this.incrementCounter(MetricNames.ARTIFACT_LOAD_COUNT, 1, tags);
    if (vocabularySize !== undefined) {
      this.setGauge(MetricNames.ARTIFACT_VOCABULARY_SIZE, vocabularySize, tags);
    }
  }

  getAverage(metricName: string, tags: Record<string, string> = {}): number {
    const histogram = this.getHistogram(metricName, tags);
    if (!histogram || histogram.count === 0) {
      return 0;
    }
    return histogram.sum / histogram.count;
  }

  flush(): void {
    this.config.telemetryClient?.flush();
  }

  getSummary(): MetricsSummary {
    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, histogram] of this.histograms) {
      let cumulative = 0;
      const bounds: Array<number | '+Inf'> = [...histogram.boundaries, '+Inf'];
      histograms[key] = {
        count: histogram.count,
        sum: histogram.sum,
        average: histogram.count > 0 ? histogram.sum / histogram.count : 0,
        buckets: bounds.map((le, i) => {
          cumulative += histogram.counts[i];
          return { le, count: cumulative };
        }),
      };
    }

    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      histograms,
    };
  }
}

export function createMetricsCollector(
  config: Partial<MetricsCollectorConfig> = {}
): MetricsCollector {
  return new MetricsCollector(config);
}
