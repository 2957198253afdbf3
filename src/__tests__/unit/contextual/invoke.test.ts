/**
 * Unit tests for the recognizer boundary.
 */

import { describe, it, expect } from 'vitest';
import { checkCandidates, invokeRecognizer } from '../../../contextual/invoke';
import type { ContextualCandidate, ContextualRecognizer, RecognizeOptions } from '../../../contextual/types';
import { ContextualUnavailableError, EntityContractError } from '../../../exceptions';
import { PIIType } from '../../../types';

function fakeRecognizer(
  recognize: (text: string, options?: RecognizeOptions) => Promise<ContextualCandidate[]>,
  maxLength?: number
): ContextualRecognizer {
  return { name: 'fake', maxLength, recognize };
}

describe('invokeRecognizer', () => {
  it('returns the candidates', async () => {
    const candidate: ContextualCandidate = { type: PIIType.NAME, start: 0, end: 4, confidence: 0.9 };
    const outcome = await invokeRecognizer(fakeRecognizer(async () => [candidate]), 'Joana');

    expect(outcome).toEqual({ status: 'ok', candidates: [candidate], truncated: false });
  });

  it('passes the confidence cutoff through', async () => {
    let seen: number | undefined;
    await invokeRecognizer(
      fakeRecognizer(async (_text, options) => {
        seen = options?.minConfidence;
        return [];
      }),
      'texto',
      { minConfidence: 0.35 }
    );
    expect(seen).toBe(0.35);
  });

  it('marks text longer than the recognizer reads as truncated', async () => {
    const outcome = await invokeRecognizer(fakeRecognizer(async () => [], 5), 'texto longo');
    expect(outcome.truncated).toBe(true);
  });

  it('reports a failing recognizer as unavailable', async () => {
    const outcome = await invokeRecognizer(
      fakeRecognizer(async () => {
        throw new Error('boom');
      }),
      'texto'
    );
    expect(outcome).toEqual({
      status: 'unavailable',
      reason: "Contextual recognizer 'fake' failed: boom",
      truncated: false,
    });
  });

  it('keeps the message of an unavailability signal', async () => {
    const outcome = await invokeRecognizer(
      fakeRecognizer(async () => {
        throw new ContextualUnavailableError('fake', 'rate limited');
      }),
      'texto'
    );
    expect(outcome).toMatchObject({ reason: "Contextual recognizer 'fake' unavailable: rate limited" });
  });

  it('gives up after the timeout and aborts the call', async () => {
    let signal: AbortSignal | undefined;
    const outcome = await invokeRecognizer(
      fakeRecognizer((_text, options) => {
        signal = options?.signal;
        return new Promise<ContextualCandidate[]>(() => undefined);
      }),
      'texto',
      { timeoutMs: 10 }
    );

    expect(outcome).toEqual({
      status: 'unavailable',
      reason: "Contextual recognizer 'fake' unavailable: timed out after 10ms",
      truncated: false,
    });
    expect(signal?.aborted).toBe(true);
  });

  it('rejects spans outside the text', async () => {
    const recognizer = fakeRecognizer(async () => [{ type: PIIType.NAME, start: 0, end: 50, confidence: 0.9 }]);

    await expect(invokeRecognizer(recognizer, 'texto')).rejects.toThrow(
      "Recognizer 'fake' returned span [0, 50) outside text of length 5"
    );
  });
});

describe('checkCandidates', () => {
  it('rejects types a recognizer may not produce', () => {
    expect(() => checkCandidates([{ type: 'CPF', start: 0, end: 3, confidence: 0.5 }], 'abcdef', 'fake')).toThrow(
      EntityContractError
    );
  });

  it('rejects confidences outside [0, 1]', () => {
    expect(() => checkCandidates([{ type: 'NAME', start: 0, end: 3, confidence: 1.5 }], 'abcdef', 'fake')).toThrow(
      "Recognizer 'fake' returned candidates outside the contract"
    );
  });

  it('rejects empty spans', () => {
    expect(() => checkCandidates([{ type: 'NAME', start: 3, end: 3, confidence: 0.5 }], 'abcdef', 'fake')).toThrow(
      EntityContractError
    );
  });
});
