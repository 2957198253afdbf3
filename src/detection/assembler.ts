/**
 * Decision assembler: applies the policy's retention rules and builds the
 * frozen result.
 */

import { ModePolicy, retentionThreshold } from '../policy';
import { DetectionMetadata, DetectionResult, DetectionSummary, Entity, PII_TYPE_ORDER, PIIType } from '../types';
import { EntityDraft, orderedSources } from './draft';
import { CHECK_DIGIT_TYPES } from './validators';

/**
 * Whether an entity survives into the result.
 *
 * Below-threshold CPF/CNPJ values whose only fault is their check digits are
 * kept when the policy accepts invalid checksums.
 */
export function retains(draft: EntityDraft, policy: ModePolicy): boolean {
  if (policy.excluded_types.includes(draft.type)) {
    return false;
  }
  if (draft.confidence >= retentionThreshold(policy, draft.sources)) {
    return true;
  }
  return (
    policy.accept_invalid_checksum && CHECK_DIGIT_TYPES.has(draft.type) && draft.validationFailure === 'checksum'
  );
}

function freezeEntity(draft: EntityDraft): Entity {
  return Object.freeze({
    type: draft.type,
    rawValue: draft.rawValue,
    normalizedValue: draft.normalizedValue,
    start: draft.start,
    end: draft.end,
    confidence: draft.confidence,
    validationStatus: draft.validationStatus,
    sources: Object.freeze(orderedSources(draft.sources)),
    reason: draft.reason,
  });
}

export function summarize(entities: readonly Entity[]): DetectionSummary {
  const byType: Partial<Record<PIIType, number>> = {};
  for (const type of PII_TYPE_ORDER) {
    const count = entities.filter((entity) => entity.type === type).length;
    if (count > 0) {
      byType[type] = count;
    }
  }
  return Object.freeze({ total: entities.length, byType: Object.freeze(byType) });
}

function freezeMetadata(metadata: DetectionMetadata): DetectionMetadata {
  return Object.freeze({ ...metadata, afn: Object.freeze({ ...metadata.afn }) });
}

/**
 * Build the result from the final drafts.
 */
export function assemble(
  drafts: readonly EntityDraft[],
  policy: ModePolicy,
  metadata: DetectionMetadata
): DetectionResult {
  const entities = Object.freeze(
    drafts
      .filter((draft) => retains(draft, policy))
      .sort((a, b) => a.start - b.start)
      .map(freezeEntity)
  );
  const hasPii = entities.length > 0;

  const result: DetectionResult = {
    hasPii,
    classification: hasPii ? 'NON_PUBLIC' : 'PUBLIC',
    entities,
    aggregateConfidence: entities.reduce((max, entity) => Math.max(max, entity.confidence), 0),
    mode: policy.name,
    summary: summarize(entities),
    metadata: freezeMetadata(metadata),
  };
  return Object.freeze(result);
}
