/**
 * Detector configuration files.
 *
 * A config file picks the mode and the contextual recognizer:
 *
 * ```json
 * {
 *   "mode": "balanced",
 *   "contextual": { "provider": "llm", "model": "gpt-4.1-mini", "timeout_ms": 5000 }
 * }
 * ```
 *
 * `mode` is a preset name or a full policy record.
 */

import { OpenAI } from 'openai';
import { z } from 'zod';
import { DEFAULT_CONTEXTUAL_TIMEOUT_MS } from './contextual/invoke';
import { CueRecognizer } from './contextual/cue-recognizer';
import { ChatCompletionClient, LlmRecognizer } from './contextual/llm-recognizer';
import type { ContextualRecognizer } from './contextual/types';
import { PiiDetector } from './detector';
import { PolicyConfigurationError } from './exceptions';
import { DEFAULT_MODE, ModePolicy } from './policy';
import type { PolicyRegistry } from './registry';

export const ContextualConfig = z
  .object({
    provider: z.enum(['cues', 'llm', 'none']).default('cues'),
    timeout_ms: z.number().int().positive().default(DEFAULT_CONTEXTUAL_TIMEOUT_MS),
    model: z.string().min(1).optional(),
    max_length: z.number().int().positive().optional(),
    max_concurrency: z.number().int().positive().optional(),
  })
  .strict();

export type ContextualConfig = z.infer<typeof ContextualConfig>;

export const DetectorConfig = z
  .object({
    mode: z.union([z.string().trim().min(1), ModePolicy]).default(DEFAULT_MODE),
    contextual: ContextualConfig.default({}),
  })
  .strict();

export type DetectorConfig = z.infer<typeof DetectorConfig>;
export type DetectorConfigInput = z.input<typeof DetectorConfig>;

/**
 * Validate a config value that has already been parsed from JSON.
 *
 * @throws {PolicyConfigurationError} When the config does not match the schema.
 */
export function parseDetectorConfig(value: unknown): DetectorConfig {
  const parsed = DetectorConfig.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PolicyConfigurationError(`Invalid detector config: ${details}`, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Load a detector config from a JSON string.
 *
 * @throws {PolicyConfigurationError} For invalid JSON or an invalid config.
 */
export function loadDetectorConfig(jsonString: string): DetectorConfig {
  let value: unknown;
  try {
    value = JSON.parse(jsonString);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PolicyConfigurationError(`Invalid JSON: ${message}`);
  }
  return parseDetectorConfig(value);
}

/**
 * Load a detector config from a JSON file.
 */
export async function loadDetectorConfigFromFile(filePath: string): Promise<DetectorConfig> {
  const fs = await import('fs/promises');
  const content = await fs.readFile(filePath, 'utf-8');
  return loadDetectorConfig(content);
}

export interface CreateDetectorOptions {
  /** Client for the `llm` provider; built from the environment when absent. */
  client?: ChatCompletionClient;
  apiKey?: string;
  baseUrl?: string;
  registry?: PolicyRegistry;
}

function createRecognizer(config: ContextualConfig, options: CreateDetectorOptions): ContextualRecognizer | null {
  switch (config.provider) {
    case 'none':
      return null;
    case 'cues':
      return new CueRecognizer();
    case 'llm': {
      const client =
        options.client ??
        new OpenAI({
          ...(options.apiKey ? { apiKey: options.apiKey } : {}),
          ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
        });
      return new LlmRecognizer(client, {
        model: config.model,
        max_length: config.max_length,
        max_concurrency: config.max_concurrency,
      });
    }
  }
}

/**
 * Build a detector from a config.
 *
 * @throws {PolicyConfigurationError} When the mode is unknown or the policy invalid.
 */
export function createDetector(
  config: DetectorConfig | DetectorConfigInput = {},
  options: CreateDetectorOptions = {}
): PiiDetector {
  const parsed = parseDetectorConfig(config);
  return new PiiDetector({
    mode: parsed.mode,
    recognizer: createRecognizer(parsed.contextual, options),
    contextualTimeoutMs: parsed.contextual.timeout_ms,
    registry: options.registry,
  });
}
