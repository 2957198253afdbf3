/**
 * Batch run engine.
 *
 * Runs the detector over samples in chunks, each chunk with `Promise.all`.
 * The chunk size never exceeds the detector's concurrency limit, which is
 * the contextual recognizer's. A failing sample is recorded and the run goes
 * on.
 */

import type { RunEngine, Sample, SampleDetector, SampleResult } from './types';

export class BatchRunEngine implements RunEngine {
  constructor(private readonly detector: SampleDetector) {}

  /**
   * Run detection on samples in batches.
   *
   * @param batchSize - Number of samples to process in parallel, capped by the detector
   * @param desc - Description for the progress reporting
   *
   * @throws {Error} If batchSize is less than 1
   */
  async run(samples: Sample[], batchSize: number, desc: string = 'Processing samples'): Promise<SampleResult[]> {
    if (batchSize < 1) {
      throw new Error('batchSize must be at least 1');
    }

    const chunkSize = Math.max(1, Math.min(batchSize, this.detector.maxConcurrency));
    const results: SampleResult[] = [];
    const totalSamples = samples.length;

    console.info(`${desc}: ${totalSamples} samples, batch size: ${chunkSize}`);

    for (let i = 0; i < samples.length; i += chunkSize) {
      const batch = samples.slice(i, i + chunkSize);
      const batchResults = await Promise.all(batch.map((sample) => this.runSample(sample)));
      results.push(...batchResults);
      console.info(`Processed ${results.length}/${totalSamples} samples`);
    }

    return results;
  }

  private async runSample(sample: Sample): Promise<SampleResult> {
    const base = {
      id: sample.id,
      ...(sample.expectedPii === undefined ? {} : { expectedPii: sample.expectedPii }),
      expectedEntities: sample.expectedEntities,
    };

    try {
      const result = await this.detector.detect(sample.text);
      return { ...base, result };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error processing sample ${sample.id}: ${message}`);
      return { ...base, result: null, error: message };
    }
  }
}
