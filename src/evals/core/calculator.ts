/**
 * Metrics calculator for detection evaluation.
 */

import type { Entity } from '../../types';
import type { DetectionMetrics, ExpectedEntity, MetricsCalculator, SampleResult, TypeCounts } from './types';

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

/**
 * Comparison key for an entity: type plus the value without case,
 * whitespace or the usual separators, so `123.456.789-09` matches
 * `12345678909`.
 */
export function entityKey(entity: ExpectedEntity | Entity): string {
  const value = 'value' in entity ? entity.value : entity.rawValue;
  return `${entity.type}:${value.trim().toLowerCase().replace(/[\s.\-/()]/g, '')}`;
}

/**
 * Calculates sample-level confusion metrics and entity-level counts per type.
 */
export class DetectionMetricsCalculator implements MetricsCalculator {
  /**
   * Failed samples are only counted as errors, and samples without a PII
   * label are left out of the confusion counts. Entity counts use samples
   * that list their entities, and negative samples.
   */
  calculate(results: SampleResult[]): DetectionMetrics {
    let tp = 0;
    let fp = 0;
    let fn = 0;
    let tn = 0;
    let totalSamples = 0;
    let errors = 0;
    const byType: Record<string, TypeCounts> = {};
    const counts = (type: string): TypeCounts => {
      byType[type] ??= { tp: 0, fp: 0, fn: 0 };
      return byType[type];
    };

    for (const sample of results) {
      if (sample.error !== undefined) {
        errors += 1;
        continue;
      }
      if (sample.expectedPii === undefined) {
        continue;
      }

      totalSamples += 1;
      const detected = sample.result?.hasPii ?? false;
      if (sample.expectedPii && detected) {
        tp += 1;
      } else if (!sample.expectedPii && detected) {
        fp += 1;
      } else if (sample.expectedPii && !detected) {
        fn += 1;
      } else {
        tn += 1;
      }

      if (sample.expectedEntities.length === 0 && sample.expectedPii) {
        continue;
      }
      const entities = sample.result?.entities ?? [];
      const detectedKeys = new Set(entities.map(entityKey));
      const expectedKeys = new Set(sample.expectedEntities.map(entityKey));

      for (const entity of sample.expectedEntities) {
        if (detectedKeys.has(entityKey(entity))) {
          counts(entity.type).tp += 1;
        } else {
          counts(entity.type).fn += 1;
        }
      }
      for (const entity of entities) {
        if (!expectedKeys.has(entityKey(entity))) {
          counts(entity.type).fp += 1;
        }
      }
    }

    const precision = ratio(tp, tp + fp);
    const recall = ratio(tp, tp + fn);

    return {
      truePositives: tp,
      falsePositives: fp,
      falseNegatives: fn,
      trueNegatives: tn,
      totalSamples,
      errors,
      precision: round(precision),
      recall: round(recall),
      f1Score: round(ratio(2 * precision * recall, precision + recall)),
      accuracy: round(ratio(tp + tn, totalSamples)),
      byType,
    };
  }
}
