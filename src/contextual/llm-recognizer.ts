/**
 * LLM-backed contextual recognizer.
 *
 * Asks a chat completion model for the names, addresses, birth dates and
 * organizations in a text, as a JSON object, and locates each returned
 * surface form in the text. Any failure to get a well-formed answer is
 * reported as `ContextualUnavailableError` so the detector can fall back to
 * regex-only detection.
 */

import { z } from 'zod';
import type { OpenAI } from 'openai';
import { ContextualUnavailableError } from '../exceptions';
import { typeRank } from '../types';
import { ContextualType } from './invoke';
import type { ContextualCandidate, ContextualRecognizer, RecognizeOptions } from './types';

/**
 * The part of the OpenAI client the recognizer calls. A full `OpenAI`
 * instance satisfies it.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): PromiseLike<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export const LlmRecognizerConfig = z.object({
  /** Chat model used for recognition */
  model: z.string().min(1).default('gpt-4.1-mini'),
  /** Characters of input sent to the model; the rest is not inspected */
  max_length: z.number().int().positive().default(4000),
  /** Requests the backend is expected to serve at once */
  max_concurrency: z.number().int().positive().default(4),
});

export type LlmRecognizerConfig = z.infer<typeof LlmRecognizerConfig>;
export type LlmRecognizerConfigInput = z.input<typeof LlmRecognizerConfig>;

export const LlmRecognizerOutput = z.object({
  entities: z.array(
    z.object({
      text: z.string().min(1),
      type: ContextualType,
      confidence: z.number().min(0).max(1),
    })
  ),
});

export type LlmRecognizerOutput = z.infer<typeof LlmRecognizerOutput>;

export const SYSTEM_PROMPT = `
You find personal data in Brazilian Portuguese text sent to a public agency.

Report every span that is one of:
- NAME: the full or partial name of a natural person
- ADDRESS: a street address, house number or residential sector
- BIRTH_DATE: a person's date of birth
- ORG: the name of a private company or organization

Ignore public bodies, job titles and generic words. Copy each span exactly as
it appears in the text, in order of appearance.

Respond with a json object of the form:
{"entities": [{"text": string, "type": "NAME" | "ADDRESS" | "BIRTH_DATE" | "ORG", "confidence": float (0.0 to 1.0)}]}

Only respond with the json object, nothing else.
`.trim();

/**
 * Remove a ```json code fence around a response, if present.
 */
export function stripJsonCodeFence(text: string): string {
  const lines = text.trim().split('\n');
  if (lines.length < 3) {
    return text;
  }

  const [first, ...body] = lines;
  const last = body.pop();
  if (!first.startsWith('```') || last?.trim() !== '```') {
    return text;
  }
  return body.join('\n');
}

/**
 * Find each entity's surface form in the text, left to right. Entities the
 * model invented (not present after the cursor) are left out.
 */
export function locateEntities(text: string, output: LlmRecognizerOutput): ContextualCandidate[] {
  const found: ContextualCandidate[] = [];
  let cursor = 0;

  for (const entity of output.entities) {
    let start = text.indexOf(entity.text, cursor);
    if (start < 0) {
      // out-of-order answers
      start = text.indexOf(entity.text);
    }
    if (start < 0) {
      continue;
    }
    const end = start + entity.text.length;
    if (found.some((other) => other.start === start && other.end === end)) {
      continue;
    }
    found.push({ type: entity.type, start, end, confidence: entity.confidence });
    cursor = Math.max(cursor, end);
  }

  return found.sort((a, b) => a.start - b.start || typeRank(a.type) - typeRank(b.type) || b.end - a.end);
}

export class LlmRecognizer implements ContextualRecognizer {
  readonly name = 'llm';
  readonly maxLength: number;
  readonly maxConcurrency: number;
  readonly model: string;

  constructor(
    private readonly client: ChatCompletionClient,
    config: LlmRecognizerConfigInput = {}
  ) {
    const parsed = LlmRecognizerConfig.parse(config);
    this.model = parsed.model;
    this.maxLength = parsed.max_length;
    this.maxConcurrency = parsed.max_concurrency;
  }

  async recognize(text: string, options: RecognizeOptions = {}): Promise<ContextualCandidate[]> {
    const visible = text.slice(0, this.maxLength);

    // GPT-5 models reject temperature 0
    const temperature = this.model.includes('gpt-5') ? 1 : 0;

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: `# Text\n\n${visible}` },
          ],
        },
        { signal: options.signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ContextualUnavailableError(this.name, `request failed: ${message}`);
    }

    if (!content) {
      throw new ContextualUnavailableError(this.name, 'model returned no content');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(stripJsonCodeFence(content));
    } catch {
      throw new ContextualUnavailableError(this.name, 'model returned non-JSON or malformed JSON');
    }

    const parsed = LlmRecognizerOutput.safeParse(payload);
    if (!parsed.success) {
      throw new ContextualUnavailableError(this.name, 'model response did not match the expected schema');
    }

    const minConfidence = options.minConfidence ?? 0;
    return locateEntities(visible, parsed.data).filter((candidate) => candidate.confidence >= minConfidence);
  }
}
