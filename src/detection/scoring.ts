/**
 * Confidence scorer.
 *
 * Final confidence = min(1, base + bonuses), where the bonuses reward a valid
 * check, an indicator keyword near the span, and corroboration by more than
 * one source. Only `confidence` and the sticky `contextBoosted` flag change.
 */

import type { ScoringWeights } from '../policy';
import { foldText } from '../utils/text';
import { EntityDraft, roundConfidence } from './draft';
import { CHECKSUM_BONUS_TYPES } from './validators';

/**
 * Words that signal personal data nearby. Matched as case- and
 * accent-insensitive substrings.
 */
export const INDICATOR_KEYWORDS: readonly string[] = Object.freeze(
  [
    'cpf',
    'cnpj',
    'documento',
    'identidade',
    'nascimento',
    'nascido',
    'endereço',
    'residente',
    'domicílio',
    'telefone',
    'celular',
    'whatsapp',
    'contato',
    'e-mail',
    'email',
    'nome',
    'cep',
    'habilitação',
    'cnh',
    'registro geral',
    'inscrito',
  ].map(foldText)
);

/**
 * Text on either side of a span, excluding the span itself.
 */
export interface ContextWindow {
  before: string;
  after: string;
}

/**
 * Cut the context window around `span`.
 *
 * @param radius - Characters taken on each side.
 * @param bounds - Optional hard limits, used to stop at neighbouring entities.
 */
export function contextWindow(
  text: string,
  span: { start: number; end: number },
  radius: number,
  bounds: { min?: number; max?: number } = {}
): ContextWindow {
  const from = Math.max(0, span.start - radius, bounds.min ?? 0);
  const to = Math.min(text.length, span.end + radius, bounds.max ?? text.length);
  return {
    before: text.slice(Math.min(from, span.start), span.start),
    after: text.slice(span.end, Math.max(to, span.end)),
  };
}

export function hasIndicatorKeyword(window: ContextWindow): boolean {
  const before = foldText(window.before);
  const after = foldText(window.after);
  return INDICATOR_KEYWORDS.some((keyword) => before.includes(keyword) || after.includes(keyword));
}

/**
 * Recompute a draft's confidence from its base.
 *
 * Idempotent: scoring twice gives the same confidence, and the keyword bonus
 * is counted once however many windows mention a keyword.
 */
export function score(entity: EntityDraft, window: ContextWindow, weights: ScoringWeights): EntityDraft {
  const contextBoosted = entity.contextBoosted || hasIndicatorKeyword(window);

  let confidence = entity.baseConfidence;
  if (entity.validationStatus === 'valid' && CHECKSUM_BONUS_TYPES.has(entity.type)) {
    confidence += weights.valid_bonus;
  }
  if (contextBoosted) {
    confidence += weights.keyword_bonus;
  }
  if (entity.sources.size > 1) {
    confidence += weights.corroboration_bonus;
  }

  return { ...entity, confidence: roundConfidence(confidence), contextBoosted };
}

/**
 * Score a fused, start-sorted entity list. Each window stops at the
 * neighbouring entities, so a keyword only counts for the spans it sits
 * between.
 */
export function scoreAll(entities: readonly EntityDraft[], text: string, weights: ScoringWeights): EntityDraft[] {
  return entities.map((entity, index) => {
    const window = contextWindow(text, entity, weights.context_window, {
      min: entities[index - 1]?.end,
      max: entities[index + 1]?.start,
    });
    return score(entity, window, weights);
  });
}
