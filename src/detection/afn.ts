/**
 * Anti-false-negative escalation.
 *
 * When a text yields few entities, a second look trades precision for
 * recall: digit runs the patterns rejected are re-checked against the
 * CPF/CNPJ validators, numbers written right after a phone or CPF label are
 * taken at their word, the recognizer may be asked again with a lower
 * cutoff, and entities still short of their threshold get a wider context
 * window. Everything added here carries the `afn` source.
 */

import type { ContextualCandidate } from '../contextual/types';
import { ModePolicy, retentionThreshold } from '../policy';
import { EntitySource, PatternPIIType, PIIType } from '../types';
import { digitsOnly, touchesMask } from '../utils/text';
import { annotate, EntityDraft, fromContextual, overlaps, roundConfidence } from './draft';
import { fuse } from './fusion';
import type { RawCandidate } from './patterns';
import { contextWindow, score, scoreAll } from './scoring';
import { validateCnpj, validateCpf } from './validators';

/** Digit groups joined by single separators, not touching other digits. */
const DIGIT_RUN = /(?<!\d)\d+(?:[.\-/ ]\d+)*(?!\d)/g;
const DIGIT_GROUP = /\d+/g;

const CPF_LENGTH = 11;
const CNPJ_LENGTH = 14;

/** A phone label, then an 8 or 9 digit number without area code. */
const PHONE_CUE =
  /(?<![\p{L}\d])(?:telefone|celular|fone|contato|número)[\s:]+(?:(?:é|eh)[\s:]+)?(\d{4,5}[-\s]?\d{4})(?!\d)/giu;

/** A CPF label, then a digit run of any length the validator may reject. */
const CPF_CUE =
  /(?<![\p{L}\d])(?:cpf|c\.p\.f\.?|cadastro)[\s:]+(?:(?:é|eh|n[º°o]\.?)[\s:]+)?(\d[\d.\-\s]{6,16}\d)(?!\d)/giu;

const PHONE_CUE_CONFIDENCE = 0.88;
const CPF_CUE_CONFIDENCE = 0.85;
/** Fewer digits than this after a CPF label is not worth reporting. */
const CPF_CUE_MIN_DIGITS = 9;

/**
 * Whether the policy asks for escalation given how many entities the first
 * pass kept.
 */
export function shouldEscalate(policy: ModePolicy, entityCount: number): boolean {
  if (policy.afn_passes === 'none') {
    return false;
  }
  return policy.afn_trigger_below === null || entityCount < policy.afn_trigger_below;
}

export interface DigitWindow {
  start: number;
  end: number;
  digits: string;
}

/**
 * CPF- and CNPJ-length stretches of a separator-joined digit run. Each
 * window starts and ends on group boundaries; from any one group, the
 * longer window comes first.
 *
 * @param offset - Position of `run` in the whole text.
 */
export function digitWindows(run: string, offset = 0): DigitWindow[] {
  const groups = Array.from(run.matchAll(DIGIT_GROUP), (match) => ({
    start: offset + (match.index ?? 0),
    digits: match[0],
  }));

  const windows: DigitWindow[] = [];
  for (let i = 0; i < groups.length; i++) {
    const fromHere: DigitWindow[] = [];
    let digits = '';
    for (let j = i; j < groups.length && digits.length < CNPJ_LENGTH; j++) {
      digits += groups[j].digits;
      if (digits.length === CPF_LENGTH || digits.length === CNPJ_LENGTH) {
        fromHere.unshift({ start: groups[i].start, end: groups[j].start + groups[j].digits.length, digits });
      }
    }
    windows.push(...fromHere);
  }
  return windows;
}

function isCovered(entities: readonly EntityDraft[], span: { start: number; end: number }, policy: ModePolicy): boolean {
  return entities.some((entity) => overlaps(entity, span) && entity.confidence >= policy.afn_confidence);
}

/**
 * Re-scan the whole text for CPF/CNPJ-length digit runs that pass their
 * check digits. A run longer than a document is split on its separators,
 * so `529.982.247-25 3` still yields the CPF.
 *
 * Runs overlapping an entity already at `afn_confidence` or above are left
 * alone, and so are runs next to mask characters.
 */
export function numericRescan(text: string, entities: readonly EntityDraft[], policy: ModePolicy): EntityDraft[] {
  const additions: EntityDraft[] = [];

  for (const match of text.matchAll(new RegExp(DIGIT_RUN.source, DIGIT_RUN.flags))) {
    let claimedUntil = -1;

    for (const stretch of digitWindows(match[0], match.index ?? 0)) {
      if (stretch.start < claimedUntil) {
        continue;
      }
      if (isCovered(entities, stretch, policy) || touchesMask(text, stretch.start, stretch.end)) {
        continue;
      }

      const type = stretch.digits.length === CPF_LENGTH ? PIIType.CPF : PIIType.CNPJ;
      const outcome = type === PIIType.CPF ? validateCpf(stretch.digits) : validateCnpj(stretch.digits);
      if (outcome.status !== 'valid') {
        continue;
      }

      claimedUntil = stretch.end;
      const confidence = roundConfidence(policy.afn_confidence);
      additions.push({
        type,
        rawValue: text.slice(stretch.start, stretch.end),
        normalizedValue: outcome.normalizedValue,
        start: stretch.start,
        end: stretch.end,
        baseConfidence: confidence,
        confidence,
        validationStatus: 'valid',
        sources: new Set<EntitySource>(['afn']),
        reason: 'unique',
        contextBoosted: false,
      });
    }
  }

  return additions;
}

/**
 * Numbers written right after an explicit label: "telefone: 98765-4321",
 * "CPF nº 123.456.789". The label vouches for the type, so these are
 * reported even when the value fails validation; the validator's verdict
 * still lowers their confidence as it does for pattern matches.
 *
 * Skips values overlapping an entity at `afn_confidence` or above, and
 * values next to mask characters.
 */
export function keywordRescan(text: string, entities: readonly EntityDraft[], policy: ModePolicy): EntityDraft[] {
  const additions: EntityDraft[] = [];
  const cues: Array<[RegExp, PatternPIIType, number]> = [
    [PHONE_CUE, PIIType.PHONE, PHONE_CUE_CONFIDENCE],
    [CPF_CUE, PIIType.CPF, CPF_CUE_CONFIDENCE],
  ];

  for (const [cue, type, confidence] of cues) {
    for (const match of text.matchAll(new RegExp(cue.source, cue.flags))) {
      const value = match[1];
      const end = (match.index ?? 0) + match[0].length;
      const span = { start: end - value.length, end };

      if (type === PIIType.CPF && digitsOnly(value).length < CPF_CUE_MIN_DIGITS) {
        continue;
      }
      if (
        isCovered(entities, span, policy) ||
        additions.some((addition) => overlaps(addition, span)) ||
        touchesMask(text, span.start, span.end)
      ) {
        continue;
      }

      const candidate: RawCandidate = {
        type,
        rawValue: value,
        ...span,
        baseConfidence: confidence,
        tier: 'loose',
        patternId: `afn.${type.toLowerCase()}-cue`,
      };
      additions.push(annotate(candidate, policy.scoring, 'afn'));
    }
  }

  return additions;
}

/**
 * Candidates from the lowered-threshold recognizer call that the first
 * call's cutoff kept out.
 */
export function admitLowConfidence(
  candidates: readonly ContextualCandidate[],
  text: string,
  policy: ModePolicy
): EntityDraft[] {
  const floor = policy.base_threshold / 2;
  return candidates
    .filter((candidate) => candidate.confidence >= floor && candidate.confidence < policy.base_threshold)
    .map((candidate) => fromContextual(candidate, text, 'afn'));
}

/**
 * Re-score entities still below their threshold with an unclipped window of
 * twice the usual radius. Entities that already earned the keyword bonus are
 * left as they are.
 */
export function expandContext(entities: readonly EntityDraft[], text: string, policy: ModePolicy): EntityDraft[] {
  const radius = policy.scoring.context_window * 2;
  return entities.map((entity) => {
    if (entity.contextBoosted || entity.confidence >= retentionThreshold(policy, entity.sources)) {
      return entity;
    }
    return score(entity, contextWindow(text, entity, radius), policy.scoring);
  });
}

/**
 * Fold the escalation's additions into the scored entity set: re-fuse,
 * re-score, then widen the context of whatever is still short.
 */
export function escalate(
  text: string,
  entities: readonly EntityDraft[],
  additions: readonly EntityDraft[],
  policy: ModePolicy
): EntityDraft[] {
  const fused = fuse(entities, additions);
  const rescored = scoreAll(fused, text, policy.scoring);
  return expandContext(rescored, text, policy);
}
