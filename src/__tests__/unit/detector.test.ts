/**
 * Unit tests for the detection pipeline.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CueRecognizer } from '../../contextual/cue-recognizer';
import type { ContextualCandidate, ContextualRecognizer, RecognizeOptions } from '../../contextual/types';
import { detectPii, PiiDetector } from '../../detector';
import { SyntheticDatasetGenerator } from '../../evals/core/synthetic';
import { EntityContractError, InputEncodingError, PolicyConfigurationError } from '../../exceptions';
import { PIIType } from '../../types';

function fakeRecognizer(
  recognize: (text: string, options?: RecognizeOptions) => Promise<ContextualCandidate[]>
): ContextualRecognizer {
  return { name: 'fake', maxConcurrency: 3, recognize };
}

describe('PiiDetector', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports a single valid CPF', async () => {
    const result = await new PiiDetector().detect('Meu CPF é 123.456.789-09');

    expect(result).toEqual({
      hasPii: true,
      classification: 'NON_PUBLIC',
      entities: [
        {
          type: PIIType.CPF,
          rawValue: '123.456.789-09',
          normalizedValue: '123.456.789-09',
          start: 10,
          end: 24,
          confidence: 0.98,
          validationStatus: 'valid',
          sources: ['regex'],
          reason: 'unique',
        },
      ],
      aggregateConfidence: 0.98,
      mode: 'balanced',
      summary: { total: 1, byType: { CPF: 1 } },
      metadata: {
        contextual: 'disabled',
        truncated: false,
        textLength: 24,
        afn: { triggered: true, passes: 1 },
      },
    });
  });

  it('classifies text without PII as PUBLIC', async () => {
    const result = await detectPii('Gostaria de saber o orçamento da escola.', { mode: 'precise' });

    expect(result.hasPii).toBe(false);
    expect(result.classification).toBe('PUBLIC');
    expect(result.entities).toEqual([]);
    expect(result.aggregateConfidence).toBe(0);
    expect(result.metadata.afn).toEqual({ triggered: false, passes: 0 });
  });

  it('skips empty input', async () => {
    const detector = new PiiDetector();

    expect((await detector.detect('   ')).metadata).toEqual({
      contextual: 'skipped',
      truncated: false,
      textLength: 3,
      afn: { triggered: false, passes: 0 },
    });
    expect((await detector.detect(null)).metadata.textLength).toBe(0);
    expect((await detector.detect(undefined)).classification).toBe('PUBLIC');
  });

  it('does not report partially masked values', async () => {
    const result = await new PiiDetector({ mode: 'strict' }).detect('CPF: ***.456.789-**');
    expect(result.entities).toEqual([]);
  });

  it('decodes UTF-8 bytes and rejects malformed ones', async () => {
    const detector = new PiiDetector();

    const result = await detector.detect(new TextEncoder().encode('Meu CPF é 123.456.789-09'));
    expect(result.entities.map((entity) => entity.start)).toEqual([10]);

    await expect(detector.detect(new Uint8Array([0xff, 0xfe]))).rejects.toBeInstanceOf(InputEncodingError);
  });

  it('treats input that is neither text nor bytes as empty', async () => {
    const result = await new PiiDetector().detect(JSON.parse('42'));

    expect(result.classification).toBe('PUBLIC');
    expect(result.metadata.contextual).toBe('skipped');
  });

  it('recovers a digit run glued to letters', async () => {
    const text = 'protocoloABC52998224725XYZ';

    const balanced = await detectPii(text);
    expect(balanced.entities).toEqual([
      {
        type: PIIType.CPF,
        rawValue: '52998224725',
        normalizedValue: '529.982.247-25',
        start: 12,
        end: 23,
        confidence: 0.8,
        validationStatus: 'valid',
        sources: ['afn'],
        reason: 'unique',
      },
    ]);

    const precise = await detectPii(text, { mode: 'precise' });
    expect(precise.entities).toEqual([]);
  });

  it('recovers a CPF whose digit run continues past it', async () => {
    const result = await detectPii('ref529.982.247-25 3');

    expect(result.entities).toEqual([
      {
        type: PIIType.CPF,
        rawValue: '529.982.247-25',
        normalizedValue: '529.982.247-25',
        start: 3,
        end: 17,
        confidence: 0.8,
        validationStatus: 'valid',
        sources: ['afn'],
        reason: 'unique',
      },
    ]);
  });

  it('reports a labelled phone number without area code', async () => {
    const balanced = await detectPii('Meu telefone é 98765-4321');
    expect(balanced.entities).toEqual([
      {
        type: PIIType.PHONE,
        rawValue: '98765-4321',
        normalizedValue: '987654321',
        start: 15,
        end: 25,
        confidence: 0.69,
        validationStatus: 'invalid',
        sources: ['afn'],
        reason: 'unique',
      },
    ]);

    const strict = await detectPii('Meu telefone é 98765-4321', { mode: 'strict' });
    expect(strict.entities.map((entity) => [entity.confidence, entity.sources, entity.reason])).toEqual([
      [0.71, ['regex', 'afn'], 'corroborated'],
    ]);

    const precise = await detectPii('Meu telefone é 98765-4321', { mode: 'precise' });
    expect(precise.entities).toEqual([]);
  });

  it('finds more as modes get less strict', async () => {
    const text = 'Contato: 61 99876-5432, CPF 529.982.247-25 e CNPJ 11222333000181';
    const spans = async (mode: string) =>
      (await detectPii(text, { mode })).entities.map((entity) => `${entity.type}:${entity.start}:${entity.end}`);

    const precise = await spans('precise');
    const balanced = await spans('balanced');
    const strict = await spans('strict');

    expect(precise.map((span) => span.split(':')[0])).toEqual(['PHONE', 'CPF']);
    expect(balanced.map((span) => span.split(':')[0])).toEqual(['PHONE', 'CPF', 'CNPJ']);
    expect(balanced).toEqual(expect.arrayContaining(precise));
    expect(strict).toEqual(expect.arrayContaining(balanced));
  });

  it('gives the same result for the same input', async () => {
    const detector = new PiiDetector({ mode: 'strict', recognizer: new CueRecognizer() });
    const text = 'Sr. Carlos Mendes, telefone (61) 99876-5432, CEP 70040-010.';

    const first = await detector.detect(text);
    const second = await detector.detect(text);
    const fresh = await new PiiDetector({ mode: 'strict', recognizer: new CueRecognizer() }).detect(text);

    expect(first.entities.length).toBeGreaterThan(0);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(JSON.stringify(fresh)).toBe(JSON.stringify(first));
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('never reports overlapping spans, whatever the candidates', async () => {
    const cues = new CueRecognizer();
    const recognizer = fakeRecognizer(async (text, options) => {
      const candidates = await cues.recognize(text, options);
      for (const match of text.matchAll(/\d[\d.\-/() ]{6,}\d/g)) {
        const start = match.index ?? 0;
        candidates.push({
          type: PIIType.ADDRESS,
          start: Math.max(0, start - 3),
          end: Math.min(text.length, start + match[0].length + 2),
          confidence: 0.8,
        });
      }
      return candidates;
    });
    const texts = new SyntheticDatasetGenerator(5).generate(150, 0.8).map((record) => record.text);

    for (const mode of ['strict', 'balanced', 'precise']) {
      const detector = new PiiDetector({ mode, recognizer });
      for (const text of texts) {
        const { entities } = await detector.detect(text);
        for (let i = 1; i < entities.length; i++) {
          expect(entities[i].start).toBeGreaterThanOrEqual(entities[i - 1].end);
        }
      }
    }
  });

  it('fuses contextual names with regex identifiers', async () => {
    const detector = new PiiDetector({ recognizer: new CueRecognizer() });

    const result = await detector.detect('Meu nome é Maria da Silva, CPF 123.456.789-09.');

    expect(result.entities.map((entity) => [entity.type, entity.rawValue, entity.confidence, entity.sources])).toEqual([
      [PIIType.NAME, 'Maria da Silva', 0.88, ['contextual']],
      [PIIType.CPF, '123.456.789-09', 0.98, ['regex']],
    ]);
    expect(result.metadata.contextual).toBe('ok');
    expect(result.metadata.afn).toEqual({ triggered: false, passes: 0 });
  });

  it('falls back to pattern detection when the recognizer fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const detector = new PiiDetector({
      recognizer: fakeRecognizer(async () => {
        throw new Error('offline');
      }),
    });

    const result = await detector.detect('Meu CPF é 123.456.789-09');
    await detector.detect('Meu CPF é 123.456.789-09');

    expect(result.entities).toHaveLength(1);
    expect(result.metadata.contextual).toBe('degraded');
    expect(result.metadata.degradedReason).toBe("Contextual recognizer 'fake' failed: offline");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "Contextual recognizer unavailable, continuing with pattern detection only: Contextual recognizer 'fake' failed: offline"
    );
  });

  it('degrades on a recognizer timeout', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const detector = new PiiDetector({
      recognizer: fakeRecognizer(() => new Promise<ContextualCandidate[]>(() => undefined)),
      contextualTimeoutMs: 10,
    });

    const result = await detector.detect('texto qualquer');

    expect(result.metadata.degradedReason).toBe("Contextual recognizer 'fake' unavailable: timed out after 10ms");
  });

  it('asks the recognizer again with a lower cutoff in strict mode', async () => {
    const cutoffs: Array<number | undefined> = [];
    const detector = new PiiDetector({
      mode: 'strict',
      recognizer: fakeRecognizer(async (_text, options) => {
        cutoffs.push(options?.minConfidence);
        const candidates: ContextualCandidate[] = [{ type: PIIType.NAME, start: 10, end: 15, confidence: 0.3 }];
        return candidates.filter((candidate) => candidate.confidence >= (options?.minConfidence ?? 0));
      }),
    });

    const result = await detector.detect('Falei com Joana ontem.');

    expect(cutoffs).toEqual([0.5, 0.25]);
    expect(result.entities).toEqual([
      {
        type: PIIType.NAME,
        rawValue: 'Joana',
        normalizedValue: 'Joana',
        start: 10,
        end: 15,
        confidence: 0.3,
        validationStatus: 'not_applicable',
        sources: ['afn'],
        reason: 'unique',
      },
    ]);
    expect(result.metadata).toEqual({
      contextual: 'ok',
      truncated: false,
      textLength: 22,
      afn: { triggered: true, passes: 2 },
    });
  });

  it('rejects recognizer answers that break the contract', async () => {
    const detector = new PiiDetector({
      recognizer: fakeRecognizer(async () => [{ type: PIIType.NAME, start: 0, end: 99, confidence: 0.9 }]),
    });
    await expect(detector.detect('texto')).rejects.toBeInstanceOf(EntityContractError);
  });

  it('takes its concurrency from the recognizer', () => {
    expect(new PiiDetector({ recognizer: fakeRecognizer(async () => []) }).maxConcurrency).toBe(3);
    expect(new PiiDetector().maxConcurrency).toBe(Number.POSITIVE_INFINITY);
  });

  it('rejects an unknown mode at construction', () => {
    expect(() => new PiiDetector({ mode: 'paranoid' })).toThrow(PolicyConfigurationError);
  });

  it('accepts a custom policy record', async () => {
    const result = await detectPii('Meu CPF é 123.456.789-00', {
      mode: {
        name: 'audit',
        base_threshold: 0.9,
        aggressive_regex: 'off',
        afn_passes: 'none',
        accept_invalid_checksum: true,
      },
    });

    expect(result.mode).toBe('audit');
    expect(result.entities.map((entity) => [entity.validationStatus, entity.confidence])).toEqual([['invalid', 0.48]]);
  });
});
