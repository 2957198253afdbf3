/**
 * Validators for structured Brazilian identifiers.
 *
 * Each validator takes the raw matched string and returns a verdict plus a
 * best-effort normalized value. Validators never throw: malformed input is
 * reported as `invalid` with a `failure` code.
 */

import { z } from 'zod';
import cepRangesData from '../data/cep-ranges.json';
import dddCodesData from '../data/ddd-codes.json';
import { PIIType, ValidationFailure, ValidationStatus } from '../types';
import { digitsOnly } from '../utils/text';

/**
 * Verdict of a validator.
 */
export interface ValidationOutcome {
  normalizedValue: string;
  status: ValidationStatus;
  failure?: ValidationFailure;
}

const CepRange = z.object({
  uf: z.string().length(2),
  start: z.string().regex(/^\d{8}$/),
  end: z.string().regex(/^\d{8}$/),
});

const CEP_RANGES: ReadonlyArray<{ uf: string; start: number; end: number }> = Object.freeze(
  z
    .array(CepRange)
    .parse(cepRangesData)
    .map((range) => Object.freeze({ uf: range.uf, start: Number(range.start), end: Number(range.end) }))
);

/** Area codes (DDD) currently in service. */
const VALID_DDDS: ReadonlySet<number> = new Set(
  z.array(z.number().int().min(11).max(99)).parse(dddCodesData)
);

const CPF_FIRST_WEIGHTS = [10, 9, 8, 7, 6, 5, 4, 3, 2];
const CPF_SECOND_WEIGHTS = [11, 10, 9, 8, 7, 6, 5, 4, 3, 2];
const CNPJ_FIRST_WEIGHTS = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];
const CNPJ_SECOND_WEIGHTS = [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2];

/** Types whose validity earns the scorer's validation bonus. */
export const CHECKSUM_BONUS_TYPES: ReadonlySet<PIIType> = new Set([
  PIIType.CPF,
  PIIType.CNPJ,
  PIIType.CEP,
  PIIType.PHONE,
]);

/** Types whose invalid verdict comes from a check-digit mismatch. */
export const CHECK_DIGIT_TYPES: ReadonlySet<PIIType> = new Set([PIIType.CPF, PIIType.CNPJ]);

function valid(normalizedValue: string): ValidationOutcome {
  return { normalizedValue, status: 'valid' };
}

function invalid(normalizedValue: string, failure: ValidationFailure): ValidationOutcome {
  return { normalizedValue, status: 'invalid', failure };
}

function isRepeated(digits: string): boolean {
  return /^(\d)\1*$/.test(digits);
}

/**
 * Mod-11 check digit over `digits` with the given weights.
 */
export function mod11CheckDigit(digits: readonly number[], weights: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < weights.length; i++) {
    sum += digits[i] * weights[i];
  }
  const remainder = sum % 11;
  return remainder < 2 ? 0 : 11 - remainder;
}

function checkDigitsMatch(
  digits: string,
  firstWeights: readonly number[],
  secondWeights: readonly number[]
): boolean {
  const numbers = digits.split('').map(Number);
  const first = mod11CheckDigit(numbers, firstWeights);
  const second = mod11CheckDigit(numbers, secondWeights);
  return numbers[firstWeights.length] === first && numbers[secondWeights.length] === second;
}

export function validateCpf(raw: string): ValidationOutcome {
  const digits = digitsOnly(raw);
  if (digits.length !== 11) {
    return invalid(digits, 'length');
  }

  const formatted = `${digits.slice(0, 3)}.${digits.slice(3, 6)}.${digits.slice(6, 9)}-${digits.slice(9)}`;
  if (isRepeated(digits)) {
    return invalid(formatted, 'repeated');
  }
  return checkDigitsMatch(digits, CPF_FIRST_WEIGHTS, CPF_SECOND_WEIGHTS)
    ? valid(formatted)
    : invalid(formatted, 'checksum');
}

export function validateCnpj(raw: string): ValidationOutcome {
  const digits = digitsOnly(raw);
  if (digits.length !== 14) {
    return invalid(digits, 'length');
  }

  const formatted =
    `${digits.slice(0, 2)}.${digits.slice(2, 5)}.${digits.slice(5, 8)}` +
    `/${digits.slice(8, 12)}-${digits.slice(12)}`;
  if (isRepeated(digits)) {
    return invalid(formatted, 'repeated');
  }
  return checkDigitsMatch(digits, CNPJ_FIRST_WEIGHTS, CNPJ_SECOND_WEIGHTS)
    ? valid(formatted)
    : invalid(formatted, 'checksum');
}

/**
 * Phone numbers: area code plus an 8-digit landline (leading 2-5) or a
 * 9-digit mobile (leading 9). A `55` country code is dropped first.
 */
export function validatePhone(raw: string): ValidationOutcome {
  let digits = digitsOnly(raw);
  if (digits.length > 11 && digits.startsWith('55')) {
    digits = digits.slice(2);
  }

  if (digits.length !== 10 && digits.length !== 11) {
    return invalid(digits, 'length');
  }
  if (isRepeated(digits)) {
    return invalid(digits, 'repeated');
  }

  const areaCode = Number(digits.slice(0, 2));
  const subscriber = digits.slice(2);
  const formatted = `(${digits.slice(0, 2)}) ${subscriber.slice(0, -4)}-${subscriber.slice(-4)}`;

  if (areaCode < 11 || areaCode > 99 || !VALID_DDDS.has(areaCode)) {
    return invalid(formatted, 'area_code');
  }
  if (subscriber.length === 9 && subscriber[0] !== '9') {
    return invalid(formatted, 'format');
  }
  if (subscriber.length === 8 && !'2345'.includes(subscriber[0])) {
    return invalid(formatted, 'format');
  }
  return valid(formatted);
}

/**
 * State (UF) whose postal range contains the CEP, if any.
 */
export function lookupCepState(raw: string): string | undefined {
  const digits = digitsOnly(raw);
  if (digits.length !== 8) {
    return undefined;
  }
  const value = Number(digits);
  return CEP_RANGES.find((range) => value >= range.start && value <= range.end)?.uf;
}

export function validateCep(raw: string): ValidationOutcome {
  const digits = digitsOnly(raw);
  if (digits.length !== 8) {
    return invalid(digits, 'length');
  }

  const formatted = `${digits.slice(0, 5)}-${digits.slice(5)}`;
  if (isRepeated(digits)) {
    return invalid(formatted, 'repeated');
  }
  return lookupCepState(digits) ? valid(formatted) : invalid(formatted, 'range');
}

const EMAIL_OBFUSCATION = /\s{0,2}(?:\[@\]|\(at\)|\[at\])\s{0,2}/i;
const EMAIL_LOCAL = /^[a-z0-9._%+-]+$/;
const EMAIL_LABEL = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

/**
 * Structural e-mail check. No network lookups.
 */
export function validateEmail(raw: string): ValidationOutcome {
  const normalized = raw.trim().replace(EMAIL_OBFUSCATION, '@').toLowerCase();
  const at = normalized.indexOf('@');
  if (at <= 0 || at !== normalized.lastIndexOf('@')) {
    return invalid(normalized, 'format');
  }

  const local = normalized.slice(0, at);
  const domain = normalized.slice(at + 1);
  if (local.length > 64 || domain.length === 0 || domain.length > 255) {
    return invalid(normalized, 'length');
  }
  if (!EMAIL_LOCAL.test(local) || local.startsWith('.') || local.endsWith('.') || local.includes('..')) {
    return invalid(normalized, 'format');
  }

  const labels = domain.split('.');
  const tld = labels[labels.length - 1];
  if (labels.length < 2 || labels.some((label) => label.length > 63 || !EMAIL_LABEL.test(label))) {
    return invalid(normalized, 'format');
  }
  if (!/^[a-z]{2,}$/.test(tld)) {
    return invalid(normalized, 'format');
  }
  return valid(normalized);
}

/**
 * Validate a raw value for the given type.
 *
 * Types without a validator come back `not_applicable` with a light
 * normalization (digits for CNH, digits and check letter for RG, collapsed
 * whitespace otherwise).
 */
export function validate(type: PIIType, raw: string): ValidationOutcome {
  switch (type) {
    case PIIType.CPF:
      return validateCpf(raw);
    case PIIType.CNPJ:
      return validateCnpj(raw);
    case PIIType.PHONE:
      return validatePhone(raw);
    case PIIType.CEP:
      return validateCep(raw);
    case PIIType.EMAIL:
      return validateEmail(raw);
    case PIIType.RG:
      return { normalizedValue: raw.replace(/[^\dxX]/g, '').toUpperCase(), status: 'not_applicable' };
    case PIIType.CNH:
      return { normalizedValue: digitsOnly(raw), status: 'not_applicable' };
    default:
      return { normalizedValue: raw.replace(/\s+/g, ' ').trim(), status: 'not_applicable' };
  }
}
