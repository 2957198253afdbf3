/**
 * JSONL dataset loader.
 *
 * Reads one JSON record per line. Field names are accepted in snake_case or
 * camelCase, and a few aliases used by existing datasets are recognized
 * (`data` for `text`, `has_pii` for `expected_pii`, `entities` for
 * `expected_entities`).
 */

import { z } from 'zod';
import { PIIType } from '../../types';
import type { DatasetLoader, ExpectedEntity, Sample } from './types';

const ExpectedEntitySchema = z.object({
  type: z.nativeEnum(PIIType),
  value: z.string(),
});

const RawSample = z.object({
  id: z.union([z.string().min(1), z.number()]).optional(),
  text: z.string().optional(),
  data: z.string().optional(),
  expected_pii: z.boolean().optional(),
  expectedPii: z.boolean().optional(),
  has_pii: z.boolean().optional(),
  expected_entities: z.array(ExpectedEntitySchema).optional(),
  expectedEntities: z.array(ExpectedEntitySchema).optional(),
  entities: z.array(ExpectedEntitySchema).optional(),
});

type RawSample = z.infer<typeof RawSample>;

export interface JsonlDatasetLoaderOptions {
  /** Reject records that carry neither a PII label nor expected entities. */
  requireLabels?: boolean;
}

/**
 * Normalize a raw record to the standard Sample format.
 *
 * @param lineNumber - 1-based line number, used as the id when the record has none.
 */
function normalizeSample(raw: RawSample, lineNumber: number, requireLabels: boolean): Sample {
  const text = raw.text ?? raw.data;
  if (text === undefined) {
    throw new Error('Missing text field');
  }

  const entities: ExpectedEntity[] | undefined = raw.expected_entities ?? raw.expectedEntities ?? raw.entities;
  let expectedPii = raw.expected_pii ?? raw.expectedPii ?? raw.has_pii;
  if (expectedPii === undefined && entities !== undefined) {
    expectedPii = entities.length > 0;
  }
  if (requireLabels && expectedPii === undefined) {
    throw new Error('Missing expected_pii or expected_entities field');
  }

  return {
    id: raw.id === undefined ? String(lineNumber) : String(raw.id),
    text,
    ...(expectedPii === undefined ? {} : { expectedPii }),
    expectedEntities: entities ?? [],
  };
}

/**
 * Loads and validates datasets from JSONL files.
 */
export class JsonlDatasetLoader implements DatasetLoader {
  private readonly requireLabels: boolean;

  constructor(options: JsonlDatasetLoaderOptions = {}) {
    this.requireLabels = options.requireLabels ?? true;
  }

  /**
   * Parse JSONL content that is already in memory.
   *
   * @throws {Error} On the first line that is not valid JSON or not a valid record.
   */
  parse(content: string): Sample[] {
    const samples: Sample[] = [];
    const lines = content.split('\n');

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) {
        continue;
      }

      try {
        const record = RawSample.safeParse(JSON.parse(line));
        if (!record.success) {
          const details = record.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
          throw new Error(details);
        }
        samples.push(normalizeSample(record.data, i + 1, this.requireLabels));
      } catch (error) {
        throw new Error(
          `Invalid record in dataset at line ${i + 1}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    return samples;
  }

  /**
   * Load and validate dataset from a JSONL file.
   *
   * @throws {Error} If the file does not exist or any line is invalid.
   */
  async load(path: string): Promise<Sample[]> {
    const fs = await import('fs/promises');

    if (!(await fs.stat(path).catch(() => false))) {
      throw new Error(`Dataset file not found: ${path}`);
    }

    const content = await fs.readFile(path, 'utf-8');
    const samples = this.parse(content);
    console.info(`Loaded ${samples.length} samples from ${path}`);
    return samples;
  }
}
