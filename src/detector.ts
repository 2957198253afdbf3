/**
 * PII detector.
 *
 * Runs the detection pipeline over one text: pattern extraction and the
 * contextual recognizer, validation, fusion, scoring, the anti-false-negative
 * escalation and assembly, all under one mode policy. The recognizer call is
 * the only awaited step; everything else is synchronous and deterministic.
 *
 * @example
 * ```typescript
 * const detector = new PiiDetector({ mode: 'strict', recognizer: new CueRecognizer() });
 * const result = await detector.detect('Meu CPF é 123.456.789-09');
 * console.log(result.classification); // NON_PUBLIC
 * ```
 */

import { DEFAULT_CONTEXTUAL_TIMEOUT_MS, invokeRecognizer } from './contextual/invoke';
import type { ContextualCandidate, ContextualRecognizer } from './contextual/types';
import { admitLowConfidence, escalate, keywordRescan, numericRescan, shouldEscalate } from './detection/afn';
import { assemble, retains } from './detection/assembler';
import { annotate, fromContextual } from './detection/draft';
import { fuse } from './detection/fusion';
import { extract } from './detection/patterns';
import { scoreAll } from './detection/scoring';
import { DEFAULT_MODE, ModePolicy, ModePolicyInput } from './policy';
import { defaultPolicyRegistry, PolicyRegistry, resolvePolicy } from './registry';
import { ContextualStatus, DetectionInput, DetectionMetadata, DetectionResult } from './types';
import { decodeInput } from './utils/text';

export interface PiiDetectorOptions {
  /** Preset name or a custom policy record. Defaults to `balanced`. */
  mode?: string | ModePolicyInput | ModePolicy;
  /** Contextual collaborator; detection is regex-only without one. */
  recognizer?: ContextualRecognizer | null;
  contextualTimeoutMs?: number;
  /** Where mode names are looked up. */
  registry?: PolicyRegistry;
}

interface ContextualPass {
  status: ContextualStatus;
  degradedReason?: string;
  truncated: boolean;
  candidates: ContextualCandidate[];
}

export class PiiDetector {
  readonly policy: ModePolicy;
  private readonly recognizer: ContextualRecognizer | null;
  private readonly contextualTimeoutMs: number;
  private shownDegradedWarnings = new Set<string>();

  /**
   * @throws {PolicyConfigurationError} For an unknown mode name or an invalid policy.
   */
  constructor(options: PiiDetectorOptions = {}) {
    this.policy = resolvePolicy(options.mode ?? DEFAULT_MODE, options.registry ?? defaultPolicyRegistry);
    this.recognizer = options.recognizer ?? null;
    this.contextualTimeoutMs = options.contextualTimeoutMs ?? DEFAULT_CONTEXTUAL_TIMEOUT_MS;
  }

  /**
   * How many detections may usefully run at once: the recognizer's limit, or
   * unbounded without one.
   */
  get maxConcurrency(): number {
    return this.recognizer?.maxConcurrency ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Detect PII in a text.
   *
   * Empty, whitespace-only, null and undefined input give an empty PUBLIC
   * result. A failing recognizer degrades the call to regex-only detection.
   *
   * @throws {InputEncodingError} When the input cannot be decoded.
   * @throws {EntityContractError} When the recognizer breaks the entity contract.
   */
  async detect(input: DetectionInput): Promise<DetectionResult> {
    const text = decodeInput(input);
    if (text === null || text.trim() === '') {
      return assemble([], this.policy, {
        contextual: 'skipped',
        truncated: false,
        textLength: text?.length ?? 0,
        afn: { triggered: false, passes: 0 },
      });
    }

    const policy = this.policy;
    const regexDrafts = extract(text, policy.aggressive_regex).map((candidate) =>
      annotate(candidate, policy.scoring)
    );
    const contextual = await this.contextualPass(text, policy.base_threshold);
    const contextualDrafts = contextual.candidates.map((candidate) => fromContextual(candidate, text));

    let entities = scoreAll(fuse(regexDrafts, contextualDrafts), text, policy.scoring);
    const kept = entities.filter((entity) => retains(entity, policy)).length;

    let passes = 0;
    let degradedReason = contextual.degradedReason;
    const triggered = shouldEscalate(policy, kept);
    if (triggered) {
      const additions = numericRescan(text, entities, policy);
      additions.push(...keywordRescan(text, [...entities, ...additions], policy));
      passes = 1;

      if (policy.afn_passes === 'double' && contextual.status === 'ok') {
        const lowered = await this.contextualPass(text, policy.base_threshold / 2);
        if (lowered.status === 'ok') {
          passes = 2;
          additions.push(...admitLowConfidence(lowered.candidates, text, policy));
        } else {
          degradedReason = lowered.degradedReason;
        }
      }

      entities = escalate(text, entities, additions, policy);
    }

    const metadata: DetectionMetadata = {
      contextual: degradedReason !== undefined ? 'degraded' : contextual.status,
      ...(degradedReason !== undefined ? { degradedReason } : {}),
      truncated: contextual.truncated,
      textLength: text.length,
      afn: { triggered, passes },
    };
    return assemble(entities, policy, metadata);
  }

  private async contextualPass(text: string, minConfidence: number): Promise<ContextualPass> {
    if (!this.recognizer) {
      return { status: 'disabled', truncated: false, candidates: [] };
    }

    const outcome = await invokeRecognizer(this.recognizer, text, {
      minConfidence,
      timeoutMs: this.contextualTimeoutMs,
    });
    if (outcome.status === 'unavailable') {
      this.warnDegraded(outcome.reason);
      return {
        status: 'degraded',
        degradedReason: outcome.reason,
        truncated: outcome.truncated,
        candidates: [],
      };
    }

    return { status: 'ok', truncated: outcome.truncated, candidates: outcome.candidates };
  }

  private warnDegraded(reason: string): void {
    if (this.shownDegradedWarnings.has(reason)) {
      return;
    }
    this.shownDegradedWarnings.add(reason);
    console.warn(`Contextual recognizer unavailable, continuing with pattern detection only: ${reason}`);
  }
}

/**
 * One-shot detection with a fresh detector.
 */
export async function detectPii(input: DetectionInput, options: PiiDetectorOptions = {}): Promise<DetectionResult> {
  return new PiiDetector(options).detect(input);
}
