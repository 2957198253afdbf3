#!/usr/bin/env node
/**
 * Hello World: type a message and see which personal data it carries.
 *
 * Uses the default balanced mode with the built-in cue recognizer, so no API
 * key is needed.
 *
 * Run with: npx tsx hello_world.ts
 */

import * as readline from 'readline';
import { createDetector, explainResult, formatResult, InputEncodingError } from '../../src';

/**
 * Create a readline interface for user input.
 */
function createReadlineInterface(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
}

async function main(): Promise<void> {
  console.log('PII Radar: Hello World\n');
  console.log('Type a message in Portuguese, for example "Meu CPF é 123.456.789-09".');
  console.log('Press Ctrl+C to exit.\n');

  const detector = createDetector({ mode: 'balanced', contextual: { provider: 'cues' } });
  const rl = createReadlineInterface();

  const shutdown = () => {
    console.log('\n\nExiting the program.');
    rl.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // eslint-disable-next-line no-constant-condition
  while (true) {
    const userInput = await new Promise<string>((resolve) => {
      rl.question('Enter a message: ', resolve);
    });

    if (!userInput.trim()) {
      continue;
    }

    try {
      const result = await detector.detect(userInput);
      console.log(`\n${formatResult(result, 'table')}\n`);
      console.log(`${explainResult(result)}\n`);
    } catch (error) {
      if (error instanceof InputEncodingError) {
        console.log(`\nCould not read the message: ${error.message}\n`);
      } else {
        console.error(`\nError: ${error instanceof Error ? error.message : String(error)}\n`);
      }
    }
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
