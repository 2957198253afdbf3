/**
 * Text helpers shared by the detection stages.
 */

import { InputEncodingError } from '../exceptions';
import type { DetectionInput } from '../types';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Characters used to mask digits in already-protected text. */
export const MASK_CHARS = '*#•';
const MASK_SET = new Set(MASK_CHARS);
const SEPARATORS = new Set(['.', '-', '/', ' ']);

/**
 * Decode detection input into a string.
 *
 * @returns The text, or null when there is nothing to scan. Values that are
 *   neither text nor bytes count as nothing to scan.
 * @throws {InputEncodingError} On malformed UTF-8 bytes or unpaired surrogates.
 */
export function decodeInput(input: DetectionInput): string | null {
  if (input === null || input === undefined) {
    return null;
  }

  if (typeof input === 'string') {
    if (LONE_SURROGATE.test(input)) {
      throw new InputEncodingError('Input contains unpaired UTF-16 surrogates');
    }
    return input;
  }
  if (!(input instanceof Uint8Array)) {
    return null;
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch {
    throw new InputEncodingError('Input bytes are not valid UTF-8');
  }
}

export function digitsOnly(value: string): string {
  return value.replace(/\D/g, '');
}

/**
 * Lower-case and strip diacritics so "Endereço" matches "endereco".
 */
export function foldText(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
}

/**
 * Whether a span touches a mask character, directly or through one separator.
 *
 * `***.456.789-**` is already protected, so the digits left visible in it
 * must not be reported.
 */
export function touchesMask(text: string, start: number, end: number): boolean {
  for (let i = start; i < end; i++) {
    if (MASK_SET.has(text[i])) {
      return true;
    }
  }

  const neighbours: Array<[number, number]> = [
    [start - 1, -1],
    [end, 1],
  ];
  for (const [index, step] of neighbours) {
    const ch = text[index];
    if (ch === undefined) {
      continue;
    }
    if (MASK_SET.has(ch)) {
      return true;
    }
    if (SEPARATORS.has(ch) && MASK_SET.has(text[index + step] ?? '')) {
      return true;
    }
  }
  return false;
}

/**
 * Strip control characters and collapse whitespace for single-line display.
 */
export function toDisplayLine(value: string): string {
  return value
    .replace(/[\u0000-\u001f\u007f]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}
