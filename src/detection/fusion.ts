/**
 * Fusion engine: merges regex and contextual candidates into one
 * non-overlapping entity set.
 *
 * Greedy interval resolution over candidates sorted by start. Every kept
 * entity records why it was kept, so a result can be explained after the fact.
 */

import { FusionReason, typeRank } from '../types';
import { EntityDraft, overlaps, spanLength } from './draft';

/** Boundary slack under which two spans count as the same span. */
export const NEAR_EXACT_TOLERANCE = 2;

export interface OverlapVerdict {
  challengerWins: boolean;
  reason: FusionReason;
}

/**
 * validated regex (or afn) > contextual > unvalidated regex
 */
function sourcePriority(draft: EntityDraft): number {
  if (draft.validationStatus === 'valid') {
    return 0;
  }
  return draft.sources.has('contextual') ? 1 : 2;
}

export function sortCandidates(drafts: readonly EntityDraft[]): EntityDraft[] {
  return [...drafts].sort(
    (a, b) =>
      a.start - b.start ||
      spanLength(b) - spanLength(a) ||
      sourcePriority(a) - sourcePriority(b) ||
      typeRank(a.type) - typeRank(b.type)
  );
}

/**
 * Decide between an accepted entity and a challenger that overlaps it.
 *
 * Higher confidence wins, then a valid verdict, then the longer span. A full
 * tie keeps the incumbent.
 */
export function resolveOverlap(incumbent: EntityDraft, challenger: EntityDraft): OverlapVerdict {
  if (challenger.confidence !== incumbent.confidence) {
    return { challengerWins: challenger.confidence > incumbent.confidence, reason: 'higher_confidence' };
  }

  const challengerValid = challenger.validationStatus === 'valid';
  const incumbentValid = incumbent.validationStatus === 'valid';
  if (challengerValid !== incumbentValid) {
    return { challengerWins: challengerValid, reason: 'validation' };
  }

  const challengerLength = spanLength(challenger);
  const incumbentLength = spanLength(incumbent);
  if (challengerLength !== incumbentLength) {
    return { challengerWins: challengerLength > incumbentLength, reason: 'longer_span' };
  }

  return { challengerWins: false, reason: 'earlier_match' };
}

function isNearExact(a: EntityDraft, b: EntityDraft, tolerance: number): boolean {
  return Math.abs(a.start - b.start) <= tolerance && Math.abs(a.end - b.end) <= tolerance;
}

function bringsNewSource(incumbent: EntityDraft, challenger: EntityDraft): boolean {
  for (const source of challenger.sources) {
    if (!incumbent.sources.has(source)) {
      return true;
    }
  }
  return false;
}

/** Same type, near-exact span, and at least one source the incumbent lacks. */
function corroborates(incumbent: EntityDraft, challenger: EntityDraft, tolerance: number): boolean {
  return (
    incumbent.type === challenger.type &&
    isNearExact(incumbent, challenger, tolerance) &&
    bringsNewSource(incumbent, challenger)
  );
}

/**
 * Merge two drafts describing the same span from different sources.
 *
 * Identity (type, values, span) comes from the stronger draft, but the
 * challenger's span is only adopted when it overlaps nothing else.
 */
function corroborate(incumbent: EntityDraft, challenger: EntityDraft, mayMoveSpan: boolean): EntityDraft {
  const { challengerWins } = resolveOverlap(incumbent, challenger);
  const identity = challengerWins && mayMoveSpan ? challenger : incumbent;

  return {
    ...identity,
    baseConfidence: Math.max(incumbent.baseConfidence, challenger.baseConfidence),
    confidence: Math.max(incumbent.confidence, challenger.confidence),
    sources: new Set([...incumbent.sources, ...challenger.sources]),
    reason: 'corroborated',
    contextBoosted: incumbent.contextBoosted || challenger.contextBoosted,
  };
}

/**
 * Fuse candidate sets into a non-overlapping entity list sorted by start.
 *
 * A challenger replaces an accepted entity only when it overlaps exactly
 * that one and beats it; one candidate never swallows several entities.
 */
export function fuse(
  regexCandidates: readonly EntityDraft[],
  contextualCandidates: readonly EntityDraft[],
  tolerance: number = NEAR_EXACT_TOLERANCE
): EntityDraft[] {
  const accepted: EntityDraft[] = [];

  for (const candidate of sortCandidates([...regexCandidates, ...contextualCandidates])) {
    const overlapping: number[] = [];
    accepted.forEach((entity, index) => {
      if (overlaps(entity, candidate)) {
        overlapping.push(index);
      }
    });

    if (overlapping.length === 0) {
      accepted.push(candidate);
      continue;
    }

    const partner = overlapping.find((index) => corroborates(accepted[index], candidate, tolerance));
    if (partner !== undefined) {
      accepted[partner] = corroborate(accepted[partner], candidate, overlapping.length === 1);
      continue;
    }

    if (overlapping.length > 1) {
      continue;
    }

    const index = overlapping[0];
    const verdict = resolveOverlap(accepted[index], candidate);
    accepted[index] = verdict.challengerWins
      ? { ...candidate, reason: verdict.reason }
      : { ...accepted[index], reason: verdict.reason };
  }

  return accepted.sort((a, b) => a.start - b.start);
}
