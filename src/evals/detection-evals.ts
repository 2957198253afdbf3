/**
 * Detection evaluation runner.
 *
 * Runs the detector over a labelled JSONL dataset and saves per-sample
 * results and metrics.
 */

import * as fs from 'fs/promises';
import { createDetector, DetectorConfig, loadDetectorConfigFromFile, parseDetectorConfig } from '../config';
import type { ChatCompletionClient } from '../contextual/llm-recognizer';
import { BatchRunEngine } from './core/batch-engine';
import { DetectionMetricsCalculator } from './core/calculator';
import { JsonResultsReporter } from './core/json-reporter';
import { JsonlDatasetLoader } from './core/jsonl-loader';
import type { DetectionMetrics } from './core/types';

export const DEFAULT_BATCH_SIZE = 32;
export const DEFAULT_OUTPUT_DIR = 'results';

export interface DetectionEvalOptions {
  datasetPath: string;
  /** Detector config file; the default config is used without one. */
  configPath?: string | null;
  /** Overrides the config's mode. */
  mode?: string | null;
  batchSize?: number;
  outputDir?: string;
  apiKey?: string | null;
  baseUrl?: string | null;
  client?: ChatCompletionClient;
}

/**
 * Class for running detection evaluations.
 */
export class DetectionEval {
  private readonly datasetPath: string;
  private readonly configPath: string | null;
  private readonly mode: string | null;
  private readonly batchSize: number;
  private readonly outputDir: string;
  private readonly apiKey: string | null;
  private readonly baseUrl: string | null;
  private readonly client: ChatCompletionClient | undefined;

  constructor(options: DetectionEvalOptions) {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new Error(`Batch size must be a positive integer, got: ${batchSize}`);
    }

    this.datasetPath = options.datasetPath;
    this.configPath = options.configPath ?? null;
    this.mode = options.mode ?? null;
    this.batchSize = batchSize;
    this.outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;
    this.apiKey = options.apiKey ?? null;
    this.baseUrl = options.baseUrl ?? null;
    this.client = options.client;
  }

  private async validateFilePaths(): Promise<void> {
    if (this.configPath) {
      try {
        await fs.access(this.configPath);
      } catch {
        throw new Error(`Config file not found: ${this.configPath}`);
      }
    }

    try {
      await fs.access(this.datasetPath);
    } catch {
      throw new Error(`Dataset file not found: ${this.datasetPath}`);
    }
  }

  private async loadConfig(): Promise<DetectorConfig> {
    const config = this.configPath
      ? await loadDetectorConfigFromFile(this.configPath)
      : parseDetectorConfig({});
    return this.mode ? { ...config, mode: this.mode } : config;
  }

  /**
   * Run the evaluation and save its results.
   *
   * @returns The computed metrics.
   */
  async run(): Promise<DetectionMetrics> {
    await this.validateFilePaths();

    try {
      const config = await this.loadConfig();
      const detector = createDetector(config, {
        client: this.client,
        apiKey: this.apiKey ?? undefined,
        baseUrl: this.baseUrl ?? undefined,
      });
      console.info(
        `event="evaluation_start" mode="${detector.policy.name}" provider="${config.contextual.provider}"`
      );

      const samples = await new JsonlDatasetLoader({ requireLabels: true }).load(this.datasetPath);
      const engine = new BatchRunEngine(detector);
      const results = await engine.run(samples, this.batchSize, 'Evaluating samples');

      const metrics = new DetectionMetricsCalculator().calculate(results);
      await new JsonResultsReporter().save(results, metrics, this.outputDir);

      console.info(
        `event="evaluation_complete" samples=${metrics.totalSamples} precision=${metrics.precision} ` +
          `recall=${metrics.recall} f1=${metrics.f1Score} errors=${metrics.errors}`
      );
      return metrics;
    } catch (error) {
      console.error(`Evaluation failed: ${error}`);
      throw error;
    }
  }
}

/**
 * Run an evaluation from command-line arguments.
 */
export async function runEvaluationCLI(args: DetectionEvalOptions): Promise<DetectionMetrics> {
  const evaluator = new DetectionEval(args);
  return evaluator.run();
}
