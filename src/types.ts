/**
 * Type definitions for PII detection.
 *
 * This module provides the core types shared by every detection stage:
 * - The `PIIType` enum, the closed set of categories an entity may carry.
 * - The `Entity` interface, one detected span in the original text.
 * - The `DetectionResult` interface, the immutable outcome of a detection call.
 */

/**
 * Supported PII categories.
 *
 * Declaration order is significant: it breaks ordering ties between
 * candidates that start at the same offset.
 */
export enum PIIType {
  CPF = 'CPF',
  CNPJ = 'CNPJ',
  PHONE = 'PHONE',
  EMAIL = 'EMAIL',
  CEP = 'CEP',
  RG = 'RG',
  CNH = 'CNH',
  NAME = 'NAME',
  ADDRESS = 'ADDRESS',
  BIRTH_DATE = 'BIRTH_DATE',
  ORG = 'ORG',
}

/** Types matched structurally by the pattern library. */
export type PatternPIIType =
  | PIIType.CPF
  | PIIType.CNPJ
  | PIIType.PHONE
  | PIIType.EMAIL
  | PIIType.CEP
  | PIIType.RG
  | PIIType.CNH;

/** Types produced by a contextual recognizer. */
export type ContextualPIIType = PIIType.NAME | PIIType.ADDRESS | PIIType.BIRTH_DATE | PIIType.ORG;

export const PII_TYPE_ORDER: readonly PIIType[] = Object.freeze(Object.values(PIIType));

/**
 * Position of a type in declaration order.
 */
export function typeRank(type: PIIType): number {
  return PII_TYPE_ORDER.indexOf(type);
}

export type ValidationStatus = 'valid' | 'invalid' | 'not_applicable';

/**
 * Why a validator rejected a value. Only `checksum` means the value was
 * structurally correct.
 */
export type ValidationFailure = 'length' | 'repeated' | 'checksum' | 'area_code' | 'range' | 'format';

export type EntitySource = 'regex' | 'contextual' | 'afn';

export const SOURCE_ORDER: readonly EntitySource[] = Object.freeze(['regex', 'contextual', 'afn']);

/**
 * Reason an entity survived overlap resolution.
 */
export type FusionReason =
  | 'unique'
  | 'higher_confidence'
  | 'validation'
  | 'longer_span'
  | 'earlier_match'
  | 'corroborated';

/**
 * A detected PII span. Offsets are half-open indices into the original text.
 */
export interface Entity {
  readonly type: PIIType;
  readonly rawValue: string;
  readonly normalizedValue: string;
  readonly start: number;
  readonly end: number;
  /** Final confidence in [0, 1]. */
  readonly confidence: number;
  readonly validationStatus: ValidationStatus;
  /** Stages that produced or corroborated the entity, in `SOURCE_ORDER`. */
  readonly sources: readonly EntitySource[];
  readonly reason: FusionReason;
}

export type Classification = 'PUBLIC' | 'NON_PUBLIC';

/**
 * State of the contextual collaborator for one call.
 *
 * - `ok`: the recognizer answered.
 * - `degraded`: it failed or timed out; detection ran regex-only.
 * - `disabled`: no recognizer is configured.
 * - `skipped`: the input was empty, so nothing ran.
 */
export type ContextualStatus = 'ok' | 'degraded' | 'disabled' | 'skipped';

export interface DetectionMetadata {
  readonly contextual: ContextualStatus;
  readonly degradedReason?: string;
  /** True when the recognizer only saw a prefix of the text. */
  readonly truncated: boolean;
  readonly textLength: number;
  readonly afn: {
    readonly triggered: boolean;
    readonly passes: number;
  };
}

export interface DetectionSummary {
  readonly total: number;
  readonly byType: Readonly<Partial<Record<PIIType, number>>>;
}

/**
 * Outcome of a detection call. Deeply frozen.
 */
export interface DetectionResult {
  readonly hasPii: boolean;
  readonly classification: Classification;
  /** Sorted by `start`; no two entities overlap. */
  readonly entities: readonly Entity[];
  readonly aggregateConfidence: number;
  readonly mode: string;
  readonly summary: DetectionSummary;
  readonly metadata: DetectionMetadata;
}

/**
 * Accepted detection input. Bytes are decoded as UTF-8.
 */
export type DetectionInput = string | Uint8Array | null | undefined;
