/**
 * Working representation of an entity while the pipeline is still deciding
 * about it. Drafts are replaced, never edited in place.
 */

import type { ContextualCandidate } from '../contextual/types';
import type { ScoringWeights } from '../policy';
import {
  EntitySource,
  FusionReason,
  PIIType,
  SOURCE_ORDER,
  ValidationFailure,
  ValidationStatus,
} from '../types';
import type { RawCandidate } from './patterns';
import { CHECK_DIGIT_TYPES, validate } from './validators';

export interface EntityDraft {
  readonly type: PIIType;
  readonly rawValue: string;
  readonly normalizedValue: string;
  readonly start: number;
  readonly end: number;
  /** Confidence assigned by the producing stage, after any validity penalty. */
  readonly baseConfidence: number;
  /** Current confidence; equals `baseConfidence` until scored. */
  readonly confidence: number;
  readonly validationStatus: ValidationStatus;
  readonly validationFailure?: ValidationFailure;
  readonly sources: ReadonlySet<EntitySource>;
  readonly reason: FusionReason;
  /** Set once a context window has produced the keyword bonus; never cleared. */
  readonly contextBoosted: boolean;
}

export function spanLength(draft: Pick<EntityDraft, 'start' | 'end'>): number {
  return draft.end - draft.start;
}

export function overlaps(a: Pick<EntityDraft, 'start' | 'end'>, b: Pick<EntityDraft, 'start' | 'end'>): boolean {
  return a.start < b.end && b.start < a.end;
}

export function orderedSources(sources: ReadonlySet<EntitySource>): EntitySource[] {
  return SOURCE_ORDER.filter((source) => sources.has(source));
}

/**
 * Validate a pattern candidate and turn it into a draft.
 *
 * An invalid verdict scales the base confidence down: by
 * `invalid_checksum_factor` for CPF/CNPJ, by `invalid_structure_factor`
 * for the other validated types.
 */
export function annotate(
  candidate: RawCandidate,
  weights: ScoringWeights,
  source: EntitySource = 'regex'
): EntityDraft {
  const outcome = validate(candidate.type, candidate.rawValue);
  let baseConfidence = candidate.baseConfidence;
  if (outcome.status === 'invalid') {
    baseConfidence *= CHECK_DIGIT_TYPES.has(candidate.type)
      ? weights.invalid_checksum_factor
      : weights.invalid_structure_factor;
  }
  baseConfidence = roundConfidence(baseConfidence);

  return {
    type: candidate.type,
    rawValue: candidate.rawValue,
    normalizedValue: outcome.normalizedValue,
    start: candidate.start,
    end: candidate.end,
    baseConfidence,
    confidence: baseConfidence,
    validationStatus: outcome.status,
    validationFailure: outcome.failure,
    sources: new Set<EntitySource>([source]),
    reason: 'unique',
    contextBoosted: false,
  };
}

/**
 * Draft for a contextual candidate. Spans were checked at the collaborator
 * boundary.
 */
export function fromContextual(
  candidate: ContextualCandidate,
  text: string,
  source: EntitySource = 'contextual'
): EntityDraft {
  const rawValue = text.slice(candidate.start, candidate.end);
  const outcome = validate(candidate.type, rawValue);
  const confidence = roundConfidence(candidate.confidence);

  return {
    type: candidate.type,
    rawValue,
    normalizedValue: outcome.normalizedValue,
    start: candidate.start,
    end: candidate.end,
    baseConfidence: confidence,
    confidence,
    validationStatus: outcome.status,
    validationFailure: outcome.failure,
    sources: new Set<EntitySource>([source]),
    reason: 'unique',
    contextBoosted: false,
  };
}

/**
 * Clamp to [0, 1] and round to four decimals so repeated additions do not
 * leave float noise in serialized results.
 */
export function roundConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.round(Math.min(1, Math.max(0, value)) * 10000) / 10000;
}
