/**
 * Draft builders shared by the detection stage tests.
 */

import type { EntityDraft } from '../../../detection/draft';
import { EntitySource, PIIType } from '../../../types';

export function makeDraft(
  overrides: Partial<Omit<EntityDraft, 'sources'>> & { sources?: EntitySource[] } = {}
): EntityDraft {
  const { sources, ...rest } = overrides;
  const confidence = rest.confidence ?? rest.baseConfidence ?? 0.9;
  return {
    type: PIIType.CPF,
    rawValue: '123.456.789-09',
    normalizedValue: '123.456.789-09',
    start: 0,
    end: 14,
    validationStatus: 'valid',
    reason: 'unique',
    contextBoosted: false,
    ...rest,
    baseConfidence: rest.baseConfidence ?? confidence,
    confidence,
    sources: new Set<EntitySource>(sources ?? ['regex']),
  };
}
