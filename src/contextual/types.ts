/**
 * Contract between the detection core and a contextual recognizer.
 *
 * A recognizer finds names, addresses, birth dates and organizations that
 * have no fixed structure. It signals "cannot answer" by throwing
 * `ContextualUnavailableError`, which is different from answering with an
 * empty list.
 */

import type { ContextualPIIType } from '../types';

export interface ContextualCandidate {
  type: ContextualPIIType;
  start: number;
  end: number;
  confidence: number;
}

export interface RecognizeOptions {
  /** Candidates below this confidence may be left out. */
  minConfidence?: number;
  /** Aborted when the caller stops waiting. */
  signal?: AbortSignal;
}

export interface ContextualRecognizer {
  readonly name: string;
  /** The recognizer only reads this many leading characters. */
  readonly maxLength?: number;
  /** Upper bound on calls it can serve at once. */
  readonly maxConcurrency?: number;
  recognize(text: string, options?: RecognizeOptions): Promise<ContextualCandidate[]>;
}

export type RecognitionOutcome =
  | { status: 'ok'; candidates: ContextualCandidate[]; truncated: boolean }
  | { status: 'unavailable'; reason: string; truncated: boolean };
