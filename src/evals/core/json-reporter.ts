/**
 * JSON results reporter.
 *
 * Writes one JSONL line per sample (`eval_results.jsonl`) and the metrics
 * (`eval_metrics.json`) into the output directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { DetectionMetrics, ResultsReporter, SampleResult } from './types';

export const RESULTS_FILE = 'eval_results.jsonl';
export const METRICS_FILE = 'eval_metrics.json';

/**
 * Serializable record for one sample.
 */
export function toResultRecord(sample: SampleResult): Record<string, unknown> {
  return {
    id: sample.id,
    expected_pii: sample.expectedPii ?? null,
    has_pii: sample.result?.hasPii ?? null,
    classification: sample.result?.classification ?? null,
    entities: sample.result?.entities ?? [],
    ...(sample.error !== undefined ? { error: sample.error } : {}),
  };
}

export class JsonResultsReporter implements ResultsReporter {
  async save(results: SampleResult[], metrics: DetectionMetrics, outputDir: string): Promise<void> {
    await fs.mkdir(outputDir, { recursive: true });

    try {
      await this.saveResultsJsonl(results, path.join(outputDir, RESULTS_FILE));
      await this.saveMetricsJson(metrics, path.join(outputDir, METRICS_FILE));
    } catch (error) {
      console.error(`Failed to save evaluation results: ${error}`);
      throw error;
    }

    console.info(`Evaluation results saved to: ${outputDir}`);
  }

  private async saveResultsJsonl(results: SampleResult[], filepath: string): Promise<void> {
    const lines = results.map((result) => JSON.stringify(toResultRecord(result)));
    await fs.writeFile(filepath, lines.join('\n') + '\n', 'utf-8');
  }

  private async saveMetricsJson(metrics: DetectionMetrics, filepath: string): Promise<void> {
    await fs.writeFile(filepath, JSON.stringify(metrics, null, 2), 'utf-8');
  }
}
