/**
 * Unit tests for the JSONL dataset loader.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { JsonlDatasetLoader } from '../../../evals/core/jsonl-loader';
import { PIIType } from '../../../types';

describe('JsonlDatasetLoader', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('normalizes records and their aliases', () => {
    const content = [
      '{"id": 7, "text": "CPF 123.456.789-09", "expected_entities": [{"type": "CPF", "value": "123.456.789-09"}]}',
      '',
      '{"data": "sem dados", "has_pii": false}',
    ].join('\n');

    expect(new JsonlDatasetLoader().parse(content)).toEqual([
      {
        id: '7',
        text: 'CPF 123.456.789-09',
        expectedPii: true,
        expectedEntities: [{ type: PIIType.CPF, value: '123.456.789-09' }],
      },
      { id: '3', text: 'sem dados', expectedPii: false, expectedEntities: [] },
    ]);
  });

  it('requires a label unless told otherwise', () => {
    expect(() => new JsonlDatasetLoader().parse('{"text": "x"}')).toThrow(
      'Invalid record in dataset at line 1: Missing expected_pii or expected_entities field'
    );
    expect(new JsonlDatasetLoader({ requireLabels: false }).parse('{"text": "x"}')).toEqual([
      { id: '1', text: 'x', expectedEntities: [] },
    ]);
  });

  it('rejects unknown entity types', () => {
    expect(() =>
      new JsonlDatasetLoader().parse('{"text": "x", "entities": [{"type": "SSN", "value": "1"}]}')
    ).toThrow(/^Invalid record in dataset at line 1: entities\.0\.type: /);
  });

  it('rejects lines that are not JSON', () => {
    expect(() => new JsonlDatasetLoader().parse('{"text": "x", "has_pii": true}\nnot json')).toThrow(
      /^Invalid record in dataset at line 2: /
    );
  });

  it('loads a file', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pii-radar-loader-'));
    const file = path.join(dir, 'data.jsonl');
    await fs.writeFile(file, '{"text": "a", "expected_pii": false}\n{"text": "b", "expected_pii": true}\n', 'utf-8');

    try {
      const samples = await new JsonlDatasetLoader().load(file);
      expect(samples.map((sample) => sample.id)).toEqual(['1', '2']);
      expect(console.info).toHaveBeenCalledWith(`Loaded 2 samples from ${file}`);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing file', async () => {
    const missing = path.join(os.tmpdir(), 'pii-radar-missing', 'data.jsonl');
    await expect(new JsonlDatasetLoader().load(missing)).rejects.toThrow(`Dataset file not found: ${missing}`);
  });
});
