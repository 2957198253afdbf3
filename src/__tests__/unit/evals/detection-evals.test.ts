/**
 * Unit tests for the evaluation runner and its reporter.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { JsonResultsReporter, METRICS_FILE, RESULTS_FILE, toResultRecord } from '../../../evals/core/json-reporter';
import type { DetectionMetrics } from '../../../evals/core/types';
import { DetectionEval, runEvaluationCLI } from '../../../evals/detection-evals';

const DATASET = [
  { id: 'a', text: 'Meu CPF é 123.456.789-09', expected_entities: [{ type: 'CPF', value: '123.456.789-09' }] },
  { id: 'b', text: 'Qual o horário da biblioteca?', expected_pii: false },
]
  .map((record) => JSON.stringify(record))
  .join('\n');

describe('toResultRecord', () => {
  it('serializes a failed sample', () => {
    expect(
      toResultRecord({ id: 'x', expectedPii: true, expectedEntities: [], result: null, error: 'boom' })
    ).toEqual({ id: 'x', expected_pii: true, has_pii: null, classification: null, entities: [], error: 'boom' });
  });
});

describe('DetectionEval', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pii-radar-eval-'));
    await fs.writeFile(path.join(dir, 'dataset.jsonl'), DATASET, 'utf-8');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('evaluates a dataset and saves results and metrics', async () => {
    const outputDir = path.join(dir, 'out');

    const metrics = await runEvaluationCLI({
      datasetPath: path.join(dir, 'dataset.jsonl'),
      mode: 'precise',
      outputDir,
    });

    expect(metrics).toMatchObject({
      truePositives: 1,
      trueNegatives: 1,
      falsePositives: 0,
      falseNegatives: 0,
      precision: 1,
      recall: 1,
      byType: { CPF: { tp: 1, fp: 0, fn: 0 } },
    });

    const lines = (await fs.readFile(path.join(outputDir, RESULTS_FILE), 'utf-8')).trimEnd().split('\n');
    expect(lines.map((line) => JSON.parse(line).classification)).toEqual(['NON_PUBLIC', 'PUBLIC']);
    const saved: DetectionMetrics = JSON.parse(await fs.readFile(path.join(outputDir, METRICS_FILE), 'utf-8'));
    expect(saved).toEqual(metrics);
    expect(console.info).toHaveBeenCalledWith('event="evaluation_start" mode="precise" provider="cues"');
  });

  it('reports a missing config file', async () => {
    const evaluator = new DetectionEval({
      datasetPath: path.join(dir, 'dataset.jsonl'),
      configPath: path.join(dir, 'missing.json'),
    });
    await expect(evaluator.run()).rejects.toThrow(`Config file not found: ${path.join(dir, 'missing.json')}`);
  });

  it('rejects a batch size that is not a positive integer', () => {
    expect(() => new DetectionEval({ datasetPath: 'x', batchSize: 1.5 })).toThrow(
      'Batch size must be a positive integer, got: 1.5'
    );
  });
});

describe('JsonResultsReporter', () => {
  it('creates the output directory', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pii-radar-report-'));
    const outputDir = path.join(dir, 'nested', 'out');

    try {
      await new JsonResultsReporter().save(
        [{ id: '1', expectedEntities: [], result: null, error: 'boom' }],
        {
          truePositives: 0,
          falsePositives: 0,
          falseNegatives: 0,
          trueNegatives: 0,
          totalSamples: 0,
          errors: 1,
          precision: 0,
          recall: 0,
          f1Score: 0,
          accuracy: 0,
          byType: {},
        },
        outputDir
      );

      expect(await fs.readFile(path.join(outputDir, RESULTS_FILE), 'utf-8')).toBe(
        '{"id":"1","expected_pii":null,"has_pii":null,"classification":null,"entities":[],"error":"boom"}\n'
      );
    } finally {
      vi.restoreAllMocks();
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
