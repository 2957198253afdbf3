/**
 * Batch detection over JSONL files.
 *
 * Each input line is a record with a `text` field (and optionally an `id`).
 * Results are written one per line, and a summary of the run is returned.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createDetector, loadDetectorConfigFromFile, parseDetectorConfig } from './config';
import type { ChatCompletionClient } from './contextual/llm-recognizer';
import { BatchRunEngine } from './evals/core/batch-engine';
import { toResultRecord } from './evals/core/json-reporter';
import { JsonlDatasetLoader } from './evals/core/jsonl-loader';
import type { SampleResult } from './evals/core/types';
import { PII_TYPE_ORDER } from './types';

export const DEFAULT_BATCH_SIZE = 32;

export interface BatchSummary {
  totalProcessed: number;
  totalWithPii: number;
  totalWithoutPii: number;
  totalEntities: number;
  entitiesByType: Record<string, number>;
  errors: number;
}

/**
 * Stats over a batch run. Failed samples count as processed but neither
 * with nor without PII.
 */
export function summarizeBatch(results: readonly SampleResult[]): BatchSummary {
  let totalWithPii = 0;
  let totalEntities = 0;
  let errors = 0;
  const counts = new Map<string, number>();

  for (const sample of results) {
    if (!sample.result) {
      errors += 1;
      continue;
    }
    if (sample.result.hasPii) {
      totalWithPii += 1;
    }
    totalEntities += sample.result.entities.length;
    for (const entity of sample.result.entities) {
      counts.set(entity.type, (counts.get(entity.type) ?? 0) + 1);
    }
  }

  const entitiesByType: Record<string, number> = {};
  for (const type of PII_TYPE_ORDER) {
    const count = counts.get(type);
    if (count !== undefined) {
      entitiesByType[type] = count;
    }
  }

  return {
    totalProcessed: results.length,
    totalWithPii,
    totalWithoutPii: results.length - totalWithPii - errors,
    totalEntities,
    entitiesByType,
    errors,
  };
}

export interface BatchOptions {
  inputPath: string;
  /** JSONL file for per-record results; nothing is written without one. */
  outputPath?: string | null;
  configPath?: string | null;
  mode?: string | null;
  batchSize?: number;
  apiKey?: string | null;
  baseUrl?: string | null;
  client?: ChatCompletionClient;
}

/**
 * Run batch detection from command-line arguments.
 */
export async function runBatchCLI(options: BatchOptions): Promise<BatchSummary> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new Error(`Batch size must be a positive integer, got: ${batchSize}`);
  }

  const config = options.configPath
    ? await loadDetectorConfigFromFile(options.configPath)
    : parseDetectorConfig({});
  const detector = createDetector(options.mode ? { ...config, mode: options.mode } : config, {
    client: options.client,
    apiKey: options.apiKey ?? undefined,
    baseUrl: options.baseUrl ?? undefined,
  });

  const samples = await new JsonlDatasetLoader({ requireLabels: false }).load(options.inputPath);
  console.info(`event="batch_start" mode="${detector.policy.name}" count=${samples.length}`);

  const results = await new BatchRunEngine(detector).run(samples, batchSize, 'Detecting PII');

  if (options.outputPath) {
    await fs.mkdir(path.dirname(options.outputPath), { recursive: true });
    const lines = results.map((result) => JSON.stringify(toResultRecord(result)));
    await fs.writeFile(options.outputPath, lines.join('\n') + '\n', 'utf-8');
    console.info(`Batch results saved to: ${options.outputPath}`);
  }

  const summary = summarizeBatch(results);
  console.info(
    `event="batch_complete" processed=${summary.totalProcessed} with_pii=${summary.totalWithPii} ` +
      `entities=${summary.totalEntities} errors=${summary.errors}`
  );
  return summary;
}
