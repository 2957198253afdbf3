/**
 * Example: contextual recognition through a local OpenAI-compatible server
 * (Ollama serving gemma3).
 *
 * Names and addresses come from the model; CPF, CNPJ, phones and the other
 * structured types still come from pattern matching. If the server is down
 * the result is marked degraded and pattern detection carries on.
 */

import * as readline from 'readline';
import { OpenAI } from 'openai';
import { explainResult, formatResult, LlmRecognizer, PiiDetector } from '../../src';

async function main(): Promise<void> {
  const client = new OpenAI({
    baseURL: 'http://127.0.0.1:11434/v1/',
    apiKey: 'ollama',
  });
  const detector = new PiiDetector({
    mode: 'strict',
    recognizer: new LlmRecognizer(client, { model: 'gemma3', max_concurrency: 1 }),
    contextualTimeoutMs: 20000,
  });

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.on('close', () => {
    console.log('\nExiting the program.');
    process.exit(0);
  });

  // eslint-disable-next-line no-constant-condition
  while (true) {
    const userInput = await new Promise<string>((resolve) => {
      rl.question('Enter a message: ', resolve);
    });
    if (!userInput.trim()) {
      continue;
    }

    const result = await detector.detect(userInput);
    console.log(`\n${formatResult(result, 'markdown')}\n`);
    console.log(`${explainResult(result)}\n`);
  }
}

main().catch(console.error);
