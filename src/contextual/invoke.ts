/**
 * The single awaited boundary between the core and a contextual recognizer.
 */

import { z } from 'zod';
import { ContextualUnavailableError, EntityContractError } from '../exceptions';
import { PIIType } from '../types';
import type { ContextualCandidate, ContextualRecognizer, RecognitionOutcome } from './types';

export const DEFAULT_CONTEXTUAL_TIMEOUT_MS = 5000;

export const ContextualType = z.union([
  z.literal(PIIType.NAME),
  z.literal(PIIType.ADDRESS),
  z.literal(PIIType.BIRTH_DATE),
  z.literal(PIIType.ORG),
]);

const CandidateSchema = z
  .object({
    type: ContextualType,
    start: z.number().int().min(0),
    end: z.number().int().min(1),
    confidence: z.number().finite().min(0).max(1),
  })
  .refine((candidate) => candidate.start < candidate.end, { message: 'start must be before end' });

export interface InvokeOptions {
  minConfidence?: number;
  timeoutMs?: number;
}

/**
 * Check a recognizer answer against the entity contract.
 *
 * @throws {EntityContractError} On unknown types, bad confidences or spans outside the text.
 */
export function checkCandidates(raw: unknown, text: string, recognizer: string): ContextualCandidate[] {
  const parsed = z.array(CandidateSchema).safeParse(raw);
  if (!parsed.success) {
    throw new EntityContractError(
      `Recognizer '${recognizer}' returned candidates outside the contract`,
      parsed.error.issues
    );
  }

  for (const candidate of parsed.data) {
    if (candidate.end > text.length) {
      throw new EntityContractError(
        `Recognizer '${recognizer}' returned span [${candidate.start}, ${candidate.end}) ` +
          `outside text of length ${text.length}`
      );
    }
  }
  return parsed.data;
}

function describeFailure(recognizer: string, error: unknown): string {
  if (error instanceof ContextualUnavailableError) {
    return error.message;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `Contextual recognizer '${recognizer}' failed: ${message}`;
}

/**
 * Ask the recognizer for candidates within a bounded time.
 *
 * Failures and timeouts come back as an `unavailable` outcome. The timer is
 * always cleared and the recognizer's signal is aborted on timeout.
 *
 * @throws {EntityContractError} When the answer breaks the entity contract.
 */
export async function invokeRecognizer(
  recognizer: ContextualRecognizer,
  text: string,
  options: InvokeOptions = {}
): Promise<RecognitionOutcome> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONTEXTUAL_TIMEOUT_MS;
  const truncated = recognizer.maxLength !== undefined && text.length > recognizer.maxLength;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ContextualUnavailableError(recognizer.name, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  let raw: unknown;
  try {
    raw = await Promise.race([
      Promise.resolve().then(() =>
        recognizer.recognize(text, { minConfidence: options.minConfidence, signal: controller.signal })
      ),
      timeout,
    ]);
  } catch (error) {
    if (error instanceof EntityContractError) {
      throw error;
    }
    return { status: 'unavailable', reason: describeFailure(recognizer.name, error), truncated };
  } finally {
    clearTimeout(timer);
  }

  return { status: 'ok', candidates: checkCandidates(raw, text, recognizer.name), truncated };
}
