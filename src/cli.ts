#!/usr/bin/env node

/**
 * Command-line interface for PII Radar.
 *
 * Usage:
 *   pii-radar detect <text> [--file <path>] [--mode <mode>] [--format json|table|markdown] [--explain]
 *   pii-radar batch --input <path> [--output <path>] [--batch-size N]
 *   pii-radar eval --dataset-path <path> [--output-dir DIR] [--batch-size N]
 *   pii-radar generate --output <path> [--size N] [--pii-ratio R] [--seed N]
 *   pii-radar validate <config-file>
 *   pii-radar modes
 *   pii-radar --help
 *
 * Exit codes: 0 on success, 1 on failure, 2 on a usage error.
 */

import { runBatchCLI } from './batch';
import { createDetector, DetectorConfig, loadDetectorConfigFromFile, parseDetectorConfig } from './config';
import { DEFAULT_PII_RATIO, DEFAULT_SEED, runGenerateCLI } from './evals/core/synthetic';
import { runEvaluationCLI } from './evals/detection-evals';
import { defaultPolicyRegistry, resolvePolicy } from './registry';
import { explainResult, formatResult, isOutputFormat } from './utils/format';

type Command = 'detect' | 'batch' | 'eval' | 'generate' | 'validate' | 'modes';

const COMMANDS: readonly Command[] = ['detect', 'batch', 'eval', 'generate', 'validate', 'modes'];

const DEFAULT_GENERATE_SIZE = 1000;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Command line arguments interface.
 */
interface CliArgs {
  command: string;
  positionals: string[];
  file?: string;
  mode?: string;
  configPath?: string;
  format?: string;
  explain?: boolean;
  input?: string;
  output?: string;
  datasetPath?: string;
  outputDir?: string;
  batchSize?: number;
  size?: number;
  piiRatio?: number;
  seed?: number;
  apiKey?: string;
  baseUrl?: string;
  help?: boolean;
}

/**
 * Parse command line arguments.
 *
 * @param argv - Command line arguments, starting with the node binary and script.
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { command: '', positionals: [] };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--file' || arg === '-f') {
      args.file = argv[++i];
    } else if (arg === '--mode' || arg === '-m') {
      args.mode = argv[++i];
    } else if (arg === '--config-path' || arg === '-c') {
      args.configPath = argv[++i];
    } else if (arg === '--format') {
      args.format = argv[++i];
    } else if (arg === '--explain') {
      args.explain = true;
    } else if (arg === '--input') {
      args.input = argv[++i];
    } else if (arg === '--output') {
      args.output = argv[++i];
    } else if (arg === '--dataset-path') {
      args.datasetPath = argv[++i];
    } else if (arg === '--output-dir') {
      args.outputDir = argv[++i];
    } else if (arg === '--batch-size') {
      args.batchSize = parseInt(argv[++i], 10);
    } else if (arg === '--size') {
      args.size = parseInt(argv[++i], 10);
    } else if (arg === '--pii-ratio') {
      args.piiRatio = parseFloat(argv[++i]);
    } else if (arg === '--seed') {
      args.seed = parseInt(argv[++i], 10);
    } else if (arg === '--api-key') {
      args.apiKey = argv[++i];
    } else if (arg === '--base-url') {
      args.baseUrl = argv[++i];
    } else if (!args.command && !arg.startsWith('-')) {
      args.command = arg;
    } else if (!arg.startsWith('-')) {
      args.positionals.push(arg);
    }
  }

  return args;
}

/**
 * Display help information.
 */
function showHelp(): void {
  console.log('PII Radar CLI');
  console.log('');
  console.log('Usage: pii-radar <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  detect <text> [options]       Detect PII in a text');
  console.log('  batch --input <path>          Detect PII in every record of a JSONL file');
  console.log('  eval --dataset-path <path>    Evaluate detection against a labelled JSONL dataset');
  console.log('  generate --output <path>      Write a synthetic labelled JSONL dataset');
  console.log('  validate <config-file>        Validate a detector config file');
  console.log('  modes                         List the available modes');
  console.log('  --help, -h                    Show this help message');
  console.log('');
  console.log('Detection Options:');
  console.log('  --file, -f <path>             Read the text from a UTF-8 file');
  console.log('  --mode, -m <mode>             Mode name: strict, balanced or precise (default: balanced)');
  console.log('  --config-path, -c <path>      Detector config file');
  console.log('  --format <format>             Output format: json, table or markdown (default: json)');
  console.log('  --explain                     Print an explanation of the result');
  console.log('');
  console.log('Batch and Evaluation Options:');
  console.log('  --input <path>                JSONL file with a "text" field per line');
  console.log('  --output <path>               JSONL file for per-record results');
  console.log('  --dataset-path <path>         Labelled JSONL dataset');
  console.log('  --output-dir <dir>            Directory to save evaluation results (default: results/)');
  console.log('  --batch-size <number>         Number of texts to process in parallel (default: 32)');
  console.log('');
  console.log('Generation Options:');
  console.log(`  --size <number>               Number of records (default: ${DEFAULT_GENERATE_SIZE})`);
  console.log(`  --pii-ratio <ratio>           Share of records with PII, 0 to 1 (default: ${DEFAULT_PII_RATIO})`);
  console.log(`  --seed <number>               Random seed (default: ${DEFAULT_SEED})`);
  console.log('');
  console.log('API Configuration:');
  console.log('  --api-key <key>               API key for the llm contextual provider');
  console.log('  --base-url <url>              Base URL for an OpenAI-compatible API');
  console.log('');
  console.log('Examples:');
  console.log('  pii-radar detect "Meu CPF é 123.456.789-09" --format table');
  console.log('  pii-radar detect --file pedido.txt --mode strict --explain');
  console.log('  pii-radar batch --input pedidos.jsonl --output resultados.jsonl');
  console.log('  pii-radar generate --output dataset.jsonl --size 500 --seed 7');
  console.log('  pii-radar eval --dataset-path dataset.jsonl --mode precise');
}

function usageError(message: string): void {
  console.error(`ERROR: ${message}`);
  console.error('Use --help for usage information');
  process.exit(2);
}

function validBatchSize(args: CliArgs): boolean {
  if (args.batchSize !== undefined && (isNaN(args.batchSize) || args.batchSize <= 0)) {
    usageError('--batch-size must be a positive integer');
    return false;
  }
  return true;
}

async function loadConfig(args: CliArgs): Promise<DetectorConfig> {
  return args.configPath ? loadDetectorConfigFromFile(args.configPath) : parseDetectorConfig({});
}

/**
 * Handle detect command.
 */
async function handleDetectCommand(args: CliArgs): Promise<void> {
  const format = args.format ?? 'json';
  if (!isOutputFormat(format)) {
    usageError(`Unknown format '${format}'. Use json, table or markdown`);
    return;
  }
  if (!args.file && args.positionals.length === 0) {
    usageError('detect needs a text argument or --file <path>');
    return;
  }

  try {
    let input: string | Uint8Array = args.positionals.join(' ');
    if (args.file) {
      const fs = await import('fs/promises');
      input = new Uint8Array(await fs.readFile(args.file));
    }

    const config = await loadConfig(args);
    const detector = createDetector(args.mode ? { ...config, mode: args.mode } : config, {
      apiKey: args.apiKey,
      baseUrl: args.baseUrl,
    });
    const result = await detector.detect(input);

    console.log(formatResult(result, format));
    if (args.explain) {
      console.log('');
      console.log(explainResult(result));
    }
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }
}

/**
 * Handle batch command.
 */
async function handleBatchCommand(args: CliArgs): Promise<void> {
  const inputPath = args.input ?? args.positionals[0];
  if (!inputPath) {
    usageError('--input is required for batch processing');
    return;
  }
  if (!validBatchSize(args)) {
    return;
  }

  try {
    const summary = await runBatchCLI({
      inputPath,
      outputPath: args.output ?? null,
      configPath: args.configPath ?? null,
      mode: args.mode ?? null,
      batchSize: args.batchSize,
      apiKey: args.apiKey ?? null,
      baseUrl: args.baseUrl ?? null,
    });
    console.log(JSON.stringify(summary, null, 2));
  } catch (error) {
    console.error('Batch processing failed:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Handle evaluation command.
 */
async function handleEvalCommand(args: CliArgs): Promise<void> {
  if (!args.datasetPath) {
    usageError('--dataset-path is required for evaluation');
    return;
  }
  if (!validBatchSize(args)) {
    return;
  }

  try {
    const metrics = await runEvaluationCLI({
      datasetPath: args.datasetPath,
      configPath: args.configPath ?? null,
      mode: args.mode ?? null,
      batchSize: args.batchSize,
      outputDir: args.outputDir,
      apiKey: args.apiKey ?? null,
      baseUrl: args.baseUrl ?? null,
    });
    console.log(JSON.stringify(metrics, null, 2));
    console.log('Evaluation completed successfully!');
  } catch (error) {
    console.error('Evaluation failed:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Handle dataset generation command.
 */
async function handleGenerateCommand(args: CliArgs): Promise<void> {
  const outputPath = args.output ?? args.positionals[0];
  if (!outputPath) {
    usageError('--output is required for dataset generation');
    return;
  }
  const size = args.size ?? DEFAULT_GENERATE_SIZE;
  if (!Number.isInteger(size) || size <= 0) {
    usageError('--size must be a positive integer');
    return;
  }
  const piiRatio = args.piiRatio ?? DEFAULT_PII_RATIO;
  if (!(piiRatio >= 0 && piiRatio <= 1)) {
    usageError('--pii-ratio must be a number between 0 and 1');
    return;
  }
  if (args.seed !== undefined && !Number.isInteger(args.seed)) {
    usageError('--seed must be an integer');
    return;
  }

  try {
    const summary = await runGenerateCLI({ outputPath, size, piiRatio, seed: args.seed });
    console.log(JSON.stringify(summary, null, 2));
  } catch (error) {
    console.error('Dataset generation failed:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

/**
 * Handle validation command.
 */
async function handleValidateCommand(args: CliArgs): Promise<void> {
  const configFile = args.positionals[0] ?? args.configPath;
  if (!configFile) {
    usageError('Configuration file path is required');
    return;
  }

  try {
    const config = await loadDetectorConfigFromFile(configFile);
    const policy = resolvePolicy(config.mode);
    console.log(`Config valid: mode '${policy.name}', contextual provider '${config.contextual.provider}'`);
    process.exit(0);
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }
}

function handleModesCommand(): void {
  for (const mode of defaultPolicyRegistry.metadata()) {
    console.log(
      `${mode.name.padEnd(10)} threshold=${mode.baseThreshold.toFixed(2)} regex=${mode.aggressiveRegex} ` +
        `afn=${mode.afnPasses} accept_invalid_checksum=${mode.acceptInvalidChecksum}  ${mode.description}`
    );
  }
  process.exit(0);
}

/**
 * Main entry point for the CLI.
 *
 * @param argv - Optional list of arguments for testing or programmatic use.
 */
export function main(argv: string[] = process.argv): void {
  try {
    const args = parseArgs(argv);

    if (args.help || args.command === '') {
      showHelp();
      process.exit(0);
      return;
    }

    if (!isCommand(args.command)) {
      console.error(`Unknown command: ${args.command}`);
      console.error('Use --help for usage information');
      process.exit(2);
      return;
    }

    const handlers: Record<Exclude<Command, 'modes'>, (args: CliArgs) => Promise<void>> = {
      detect: handleDetectCommand,
      batch: handleBatchCommand,
      eval: handleEvalCommand,
      generate: handleGenerateCommand,
      validate: handleValidateCommand,
    };

    if (args.command === 'modes') {
      handleModesCommand();
      return;
    }

    handlers[args.command](args).catch((error) => {
      console.error(`Unexpected error during ${args.command}:`, error);
      process.exit(1);
    });
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }
}

// Run CLI if this file is executed directly
if (require.main === module) {
  main();
}
