/**
 * Unit tests for the detection metrics calculator.
 */

import { describe, it, expect } from 'vitest';
import { detectPii } from '../../../detector';
import { DetectionMetricsCalculator, entityKey } from '../../../evals/core/calculator';
import type { SampleResult } from '../../../evals/core/types';
import { PIIType } from '../../../types';

describe('entityKey', () => {
  it('ignores case, spacing and separators', () => {
    expect(entityKey({ type: PIIType.CPF, value: ' 123.456.789-09 ' })).toBe('CPF:12345678909');
    expect(entityKey({ type: PIIType.PHONE, value: '(61) 99876-5432' })).toBe('PHONE:61998765432');
    expect(entityKey({ type: PIIType.EMAIL, value: 'Ana@Exemplo.com' })).toBe('EMAIL:ana@exemplocom');
  });
});

describe('DetectionMetricsCalculator', () => {
  it('counts samples and entities, leaving failed samples out', async () => {
    const results: SampleResult[] = [
      {
        id: 'hit',
        expectedPii: true,
        expectedEntities: [{ type: PIIType.CPF, value: '12345678909' }],
        result: await detectPii('CPF 123.456.789-09'),
      },
      { id: 'clean', expectedPii: false, expectedEntities: [], result: await detectPii('Nada.') },
      { id: 'missed', expectedPii: true, expectedEntities: [], result: await detectPii('nada') },
      { id: 'false-alarm', expectedPii: false, expectedEntities: [], result: await detectPii('Ligue (61) 99876-5432') },
      {
        id: 'failed',
        expectedPii: true,
        expectedEntities: [{ type: PIIType.EMAIL, value: 'a@b.com' }],
        result: null,
        error: 'boom',
      },
      { id: 'unlabelled', expectedEntities: [], result: await detectPii('CPF 123.456.789-09') },
    ];

    expect(new DetectionMetricsCalculator().calculate(results)).toEqual({
      truePositives: 1,
      falsePositives: 1,
      falseNegatives: 1,
      trueNegatives: 1,
      totalSamples: 4,
      errors: 1,
      precision: 0.5,
      recall: 0.5,
      f1Score: 0.5,
      accuracy: 0.5,
      byType: {
        CPF: { tp: 1, fp: 0, fn: 0 },
        PHONE: { tp: 0, fp: 1, fn: 0 },
      },
    });
  });

  it('returns zeros for an empty run', () => {
    expect(new DetectionMetricsCalculator().calculate([])).toMatchObject({
      totalSamples: 0,
      precision: 0,
      recall: 0,
      f1Score: 0,
      accuracy: 0,
      byType: {},
    });
  });
});
