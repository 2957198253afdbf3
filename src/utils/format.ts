/**
 * Renderings of a detection result for people: JSON, an aligned text
 * table, a markdown table and a line-by-line explanation.
 */

import type { DetectionResult, Entity } from '../types';
import { toDisplayLine } from './text';

export type OutputFormat = 'json' | 'table' | 'markdown';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'markdown'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

const COLUMNS = ['Type', 'Value', 'Span', 'Confidence', 'Status', 'Sources'];

function entityRow(entity: Entity): string[] {
  return [
    entity.type,
    toDisplayLine(entity.rawValue),
    `${entity.start}-${entity.end}`,
    entity.confidence.toFixed(4),
    entity.validationStatus,
    entity.sources.join('+'),
  ];
}

function headline(result: DetectionResult): string {
  return `${result.classification} (mode: ${result.mode}, aggregate confidence: ${result.aggregateConfidence.toFixed(4)})`;
}

/**
 * Pad every column to its widest cell and join with two spaces.
 */
export function formatTable(table: string[][]): string {
  if (table.length === 0) {
    return 'No data available';
  }

  const widths = table[0].map((_, col) => Math.max(...table.map((row) => (row[col] ?? '').length)));
  return table
    .map((row) =>
      row
        .map((cell, i) => cell.padEnd(widths[i]))
        .join('  ')
        .trimEnd()
    )
    .join('\n');
}

function escapeMarkdown(cell: string): string {
  return cell.replace(/\|/g, '\\|');
}

function formatMarkdown(result: DetectionResult): string {
  const lines = [`**${headline(result)}**`, ''];
  if (result.entities.length === 0) {
    lines.push('No PII found.');
    return lines.join('\n');
  }

  lines.push(`| ${COLUMNS.join(' | ')} |`);
  lines.push(`| ${COLUMNS.map(() => '---').join(' | ')} |`);
  for (const entity of result.entities) {
    lines.push(`| ${entityRow(entity).map(escapeMarkdown).join(' | ')} |`);
  }
  return lines.join('\n');
}

/**
 * Serialize a result in one of the output formats.
 */
export function formatResult(result: DetectionResult, format: OutputFormat = 'json'): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result, null, 2);
    case 'table': {
      const body =
        result.entities.length === 0 ? 'No PII found.' : formatTable([COLUMNS, ...result.entities.map(entityRow)]);
      return `${headline(result)}\n${body}`;
    }
    case 'markdown':
      return formatMarkdown(result);
  }
}

/**
 * Plain-language account of why the result came out as it did, one line per
 * entity.
 */
export function explainResult(result: DetectionResult): string {
  const count = result.summary.total;
  const lines = [
    `${result.classification}: ${count} ${count === 1 ? 'entity' : 'entities'} found in mode '${result.mode}'`,
  ];

  for (const entity of result.entities) {
    lines.push(
      `- ${entity.type} "${toDisplayLine(entity.rawValue)}" at [${entity.start}, ${entity.end}): ` +
        `confidence ${entity.confidence.toFixed(2)}, ${entity.validationStatus}, ` +
        `from ${entity.sources.join(' + ')} (${entity.reason})`
    );
  }

  const { metadata } = result;
  let contextual = `Contextual recognizer: ${metadata.contextual}`;
  if (metadata.degradedReason) {
    contextual += ` (${metadata.degradedReason})`;
  }
  if (metadata.truncated) {
    contextual += ', input truncated';
  }
  lines.push(contextual);

  if (metadata.afn.triggered) {
    lines.push(`Anti-false-negative pass: triggered, ${metadata.afn.passes} pass(es)`);
  }
  return lines.join('\n');
}
