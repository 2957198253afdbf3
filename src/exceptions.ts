/**
 * Exception types raised by the detector.
 *
 * Every error thrown on purpose derives from `PiiRadarError` so callers can
 * separate detection failures from programming errors with one `instanceof`.
 */

import type { ZodIssue } from 'zod';

/**
 * Base class for all detector errors.
 */
export class PiiRadarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised at configuration time when a mode name is unknown or a policy or
 * config file fails validation. Nothing has been detected when this is thrown.
 */
export class PolicyConfigurationError extends PiiRadarError {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super(message);
    this.issues = issues;
  }
}

/**
 * Raised when input bytes are not valid UTF-8 or a string holds unpaired
 * surrogates. Text that cannot be decoded cannot be scanned.
 */
export class InputEncodingError extends PiiRadarError {}

/**
 * Signal from a contextual recognizer that it cannot answer right now.
 * Distinct from answering with no candidates.
 */
export class ContextualUnavailableError extends PiiRadarError {
  readonly recognizer: string;

  constructor(recognizer: string, reason: string) {
    super(`Contextual recognizer '${recognizer}' unavailable: ${reason}`);
    this.recognizer = recognizer;
  }
}

/**
 * Raised when a recognizer hands back a candidate that breaks the entity
 * contract (unknown type, span outside the text, confidence outside [0, 1]).
 */
export class EntityContractError extends PiiRadarError {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super(message);
    this.issues = issues;
  }
}
