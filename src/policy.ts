/**
 * Operating-mode policies.
 *
 * A policy fixes the acceptance threshold, how far the pattern library
 * reaches, how hard the anti-false-negative pass escalates, and the scoring
 * weights. Policies are validated with zod when they are built, so a bad
 * value fails before any text is scanned.
 */

import { z } from 'zod';
import type { RegexAggressiveness } from './detection/patterns';
import { PolicyConfigurationError } from './exceptions';
import { EntitySource, PIIType } from './types';

export const AfnPasses = z.enum(['none', 'single', 'double']);
export type AfnPasses = z.infer<typeof AfnPasses>;

/**
 * Accepts the three-level setting or a plain boolean (`true` is `on`,
 * `false` is `off`).
 */
export const AggressiveRegex = z
  .union([z.boolean(), z.enum(['off', 'partial', 'on'])])
  .transform((value): RegexAggressiveness => {
    if (value === true) {
      return 'on';
    }
    if (value === false) {
      return 'off';
    }
    return value;
  });

/**
 * Tunable scoring constants.
 */
export const ScoringWeights = z
  .object({
    valid_bonus: z.number().min(0).max(1).default(0.05),
    keyword_bonus: z.number().min(0).max(1).default(0.03),
    corroboration_bonus: z.number().min(0).max(1).default(0.02),
    /** Characters inspected on each side of a span for indicator keywords. */
    context_window: z.number().int().min(0).max(1000).default(50),
    /** Multiplier applied to a CPF/CNPJ whose check digits fail. */
    invalid_checksum_factor: z.number().min(0).max(1).default(0.5),
    /** Multiplier applied to other validated types that fail validation. */
    invalid_structure_factor: z.number().min(0).max(1).default(0.75),
  })
  .strict();

export type ScoringWeights = z.infer<typeof ScoringWeights>;

export const ModePolicy = z
  .object({
    name: z.string().trim().min(1),
    base_threshold: z.number().gt(0).lt(1),
    aggressive_regex: AggressiveRegex,
    afn_passes: AfnPasses,
    accept_invalid_checksum: z.boolean(),
    /** Escalate when fewer entities than this were found; null escalates always. */
    afn_trigger_below: z.number().int().positive().nullable().default(2),
    afn_confidence: z.number().gt(0).max(1).default(0.75),
    excluded_types: z.array(z.nativeEnum(PIIType)).default([PIIType.ORG]),
    scoring: ScoringWeights.default({}),
  })
  .strict();

export type ModePolicy = z.infer<typeof ModePolicy>;
export type ModePolicyInput = z.input<typeof ModePolicy>;

/**
 * Validate and freeze a policy record.
 *
 * @throws {PolicyConfigurationError} When any field is missing or out of range.
 */
export function parsePolicy(input: unknown): ModePolicy {
  const parsed = ModePolicy.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PolicyConfigurationError(`Invalid mode policy: ${details}`, parsed.error.issues);
  }

  const policy = parsed.data;
  Object.freeze(policy.excluded_types);
  Object.freeze(policy.scoring);
  return Object.freeze(policy);
}

export type PresetName = 'strict' | 'balanced' | 'precise';

export const DEFAULT_MODE: PresetName = 'balanced';

/**
 * The named presets, from most to least recall-oriented.
 *
 * `strict` escalates on every text so its recall never falls below
 * `balanced`, which only escalates when fewer than two entities were found.
 */
export const MODE_PRESETS: readonly ModePolicy[] = Object.freeze([
  parsePolicy({
    name: 'strict',
    base_threshold: 0.5,
    aggressive_regex: 'on',
    afn_passes: 'double',
    accept_invalid_checksum: true,
    afn_trigger_below: null,
  }),
  parsePolicy({
    name: 'balanced',
    base_threshold: 0.7,
    aggressive_regex: 'partial',
    afn_passes: 'single',
    accept_invalid_checksum: false,
  }),
  parsePolicy({
    name: 'precise',
    base_threshold: 0.85,
    aggressive_regex: 'off',
    afn_passes: 'none',
    accept_invalid_checksum: false,
  }),
]);

/**
 * Threshold an entity must reach to be kept. Entities recovered by the
 * anti-false-negative pass are held to half the base threshold.
 */
export function retentionThreshold(policy: ModePolicy, sources: ReadonlySet<EntitySource>): number {
  return sources.has('afn') ? policy.base_threshold / 2 : policy.base_threshold;
}
