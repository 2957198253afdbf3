/**
 * Core evaluation components.
 *
 * This module exports the core evaluation framework components including
 * types, the loader, the run engine, the calculator, the reporter and the
 * synthetic dataset generator.
 */

export * from './types';
export * from './jsonl-loader';
export * from './batch-engine';
export * from './calculator';
export * from './json-reporter';
export * from './synthetic';
