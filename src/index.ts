/**
 * PII Radar public API surface.
 *
 * Detects personal data in Portuguese text: pattern matching with check-digit
 * validation, an optional contextual recognizer for names and addresses, and
 * per-mode policies deciding what is reported.
 */

// Core types
export { PIIType, PII_TYPE_ORDER, SOURCE_ORDER } from './types';
export type {
  Classification,
  ContextualPIIType,
  ContextualStatus,
  DetectionInput,
  DetectionMetadata,
  DetectionResult,
  DetectionSummary,
  Entity,
  EntitySource,
  FusionReason,
  PatternPIIType,
  ValidationFailure,
  ValidationStatus,
} from './types';

// Exception types
export {
  PiiRadarError,
  PolicyConfigurationError,
  InputEncodingError,
  ContextualUnavailableError,
  EntityContractError,
} from './exceptions';

// Detection
export { PiiDetector, detectPii } from './detector';
export type { PiiDetectorOptions } from './detector';

// Policies and registry
export { ModePolicy, MODE_PRESETS, DEFAULT_MODE, parsePolicy } from './policy';
export type { ModePolicyInput, PresetName } from './policy';
export { PolicyRegistry, defaultPolicyRegistry, resolvePolicy } from './registry';
export type { PolicyMetadata } from './registry';

// Configuration
export {
  ContextualConfig,
  DetectorConfig,
  parseDetectorConfig,
  loadDetectorConfig,
  loadDetectorConfigFromFile,
  createDetector,
} from './config';
export type { CreateDetectorOptions, DetectorConfigInput } from './config';

// Contextual recognizers
export { CueRecognizer } from './contextual/cue-recognizer';
export { LlmRecognizer, LlmRecognizerConfig } from './contextual/llm-recognizer';
export type { ChatCompletionClient, LlmRecognizerConfigInput } from './contextual/llm-recognizer';
export type { ContextualCandidate, ContextualRecognizer, RecognizeOptions } from './contextual/types';

// Validators
export { validate, validateCpf, validateCnpj, validateCep, validateEmail, validatePhone } from './detection/validators';
export type { ValidationOutcome } from './detection/validators';

// Output formatting
export { formatResult, explainResult, OUTPUT_FORMATS } from './utils/format';
export type { OutputFormat } from './utils/format';

// Batch processing and evaluation
export { runBatchCLI, summarizeBatch } from './batch';
export type { BatchOptions, BatchSummary } from './batch';
export { DetectionEval, runEvaluationCLI } from './evals/detection-evals';
export type { DetectionEvalOptions } from './evals/detection-evals';
export * from './evals/core';

// CLI tool
export { main as cli } from './cli';
