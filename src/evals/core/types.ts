/**
 * Core types and protocols for detection evaluation.
 *
 * This module defines the data models shared by the evaluation and batch
 * runners, and the interfaces for dataset loading, running, metrics
 * calculation and reporting.
 */

import type { DetectionInput, DetectionResult, PIIType } from '../../types';

/**
 * A PII span a labelled sample is expected to contain.
 */
export interface ExpectedEntity {
  type: PIIType;
  value: string;
}

/**
 * A single input record.
 */
export interface Sample {
  id: string;
  text: string;
  /** Whether the text contains PII; absent for unlabelled batch input. */
  expectedPii?: boolean;
  expectedEntities: ExpectedEntity[];
}

/**
 * Outcome of running the detector over one sample.
 */
export interface SampleResult {
  id: string;
  expectedPii?: boolean;
  expectedEntities: ExpectedEntity[];
  /** Null when detection failed; see `error`. */
  result: DetectionResult | null;
  error?: string;
}

/**
 * Entity-level counts for one PII type.
 */
export interface TypeCounts {
  tp: number;
  fp: number;
  fn: number;
}

/**
 * Metrics for a detection evaluation.
 *
 * The confusion counts and the ratios are per sample (PII present or not);
 * `byType` counts entities matched by type and value.
 */
export interface DetectionMetrics {
  truePositives: number;
  falsePositives: number;
  falseNegatives: number;
  trueNegatives: number;
  totalSamples: number;
  /** Samples whose detection threw. */
  errors: number;
  precision: number;
  recall: number;
  f1Score: number;
  accuracy: number;
  byType: Record<string, TypeCounts>;
}

/**
 * What the engine needs from a detector.
 */
export interface SampleDetector {
  readonly maxConcurrency: number;
  detect(input: DetectionInput): Promise<DetectionResult>;
}

/**
 * Protocol for dataset loading and validation.
 */
export interface DatasetLoader {
  /**
   * Load and validate dataset from path.
   *
   * @param path - Path to the dataset file.
   * @returns List of validated samples.
   */
  load(path: string): Promise<Sample[]>;
}

/**
 * Protocol for running detection over samples.
 */
export interface RunEngine {
  /**
   * @param batchSize - Upper bound on samples processed in parallel.
   * @param desc - Description for progress reporting.
   */
  run(samples: Sample[], batchSize: number, desc?: string): Promise<SampleResult[]>;
}

/**
 * Protocol for calculating evaluation metrics.
 */
export interface MetricsCalculator {
  calculate(results: SampleResult[]): DetectionMetrics;
}

/**
 * Protocol for reporting evaluation results.
 */
export interface ResultsReporter {
  /**
   * Save results and metrics to output directory.
   */
  save(results: SampleResult[], metrics: DetectionMetrics, outputDir: string): Promise<void>;
}
