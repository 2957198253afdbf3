/**
 * Unit tests for the batch run engine.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BatchRunEngine } from '../../../evals/core/batch-engine';
import type { Sample, SampleDetector } from '../../../evals/core/types';
import { PiiDetector } from '../../../detector';
import type { DetectionInput, DetectionResult } from '../../../types';

function sample(id: string, text: string): Sample {
  return { id, text, expectedPii: false, expectedEntities: [] };
}

/**
 * Wraps the real detector, fails on "explode" and records the peak number of
 * calls in flight.
 */
class TrackingDetector implements SampleDetector {
  inFlight = 0;
  peak = 0;
  private readonly inner = new PiiDetector();

  constructor(readonly maxConcurrency: number = Number.POSITIVE_INFINITY) {}

  async detect(input: DetectionInput): Promise<DetectionResult> {
    this.inFlight += 1;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      await Promise.resolve();
      if (input === 'explode') {
        throw new Error('boom');
      }
      return await this.inner.detect(input);
    } finally {
      this.inFlight -= 1;
    }
  }
}

describe('BatchRunEngine', () => {
  let infoSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps sample order and records failures', async () => {
    const samples = [sample('1', 'CPF 123.456.789-09'), sample('2', 'explode'), sample('3', 'nada')];

    const results = await new BatchRunEngine(new TrackingDetector()).run(samples, 2);

    expect(results.map((result) => [result.id, result.result?.hasPii ?? null, result.error])).toEqual([
      ['1', true, undefined],
      ['2', null, 'boom'],
      ['3', false, undefined],
    ]);
    expect(errorSpy).toHaveBeenCalledWith('Error processing sample 2: boom');
    expect(infoSpy.mock.calls.map((call) => call[0])).toEqual([
      'Processing samples: 3 samples, batch size: 2',
      'Processed 2/3 samples',
      'Processed 3/3 samples',
    ]);
  });

  it('never runs more samples at once than the detector allows', async () => {
    const detector = new TrackingDetector(2);
    const samples = Array.from({ length: 7 }, (_, i) => sample(String(i), `texto ${i}`));

    const results = await new BatchRunEngine(detector).run(samples, 32, 'Detecting');

    expect(results).toHaveLength(7);
    expect(detector.peak).toBe(2);
    expect(infoSpy.mock.calls[0]?.[0]).toBe('Detecting: 7 samples, batch size: 2');
  });

  it('rejects a batch size below one', async () => {
    await expect(new BatchRunEngine(new TrackingDetector()).run([], 0)).rejects.toThrow('batchSize must be at least 1');
  });
});
