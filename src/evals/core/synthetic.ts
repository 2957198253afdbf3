/**
 * Synthetic dataset generator.
 *
 * Produces labelled freedom-of-information requests, with and without
 * personal data, in the JSONL format the dataset loader reads. Generation is
 * seeded, so the same seed always gives the same dataset.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import cepRangesData from '../../data/cep-ranges.json';
import commonNamesData from '../../data/common-names.json';
import dddCodesData from '../../data/ddd-codes.json';
import syntheticData from '../../data/synthetic.json';
import { mod11CheckDigit } from '../../detection/validators';
import { PIIType } from '../../types';
import { foldText } from '../../utils/text';
import type { ExpectedEntity } from './types';

export const DEFAULT_SEED = 42;
export const DEFAULT_PII_RATIO = 0.7;

const SyntheticWordLists = z.object({
  lastNames: z.array(z.string().min(1)).min(2),
  emailDomains: z.array(z.string().min(3)).min(1),
  templatesWithPii: z.array(z.string().min(1)).min(1),
  templatesWithoutPii: z.array(z.string().min(1)).min(1),
});

const WORDS = SyntheticWordLists.parse(syntheticData);
const FIRST_NAMES = z.array(z.string().min(1)).min(1).parse(commonNamesData);
const DDDS = z.array(z.number().int()).min(1).parse(dddCodesData);
const CEP_RANGES = z
  .array(z.object({ start: z.string().regex(/^\d{8}$/), end: z.string().regex(/^\d{8}$/) }))
  .min(1)
  .parse(cepRangesData)
  .map((range) => ({ start: Number(range.start), end: Number(range.end) }));

const CPF_WEIGHTS: readonly [number[], number[]] = [
  [10, 9, 8, 7, 6, 5, 4, 3, 2],
  [11, 10, 9, 8, 7, 6, 5, 4, 3, 2],
];
const CNPJ_WEIGHTS: readonly [number[], number[]] = [
  [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2],
  [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2],
];

/**
 * Uniform floats in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Small deterministic PRNG (mulberry32).
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [min, max]. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: RandomSource, items: readonly T[]): T {
  return items[randomInt(random, 0, items.length - 1)];
}

function randomDigits(random: RandomSource, count: number): number[] {
  return Array.from({ length: count }, () => randomInt(random, 0, 9));
}

function isRepeated(digits: readonly number[]): boolean {
  return digits.every((digit) => digit === digits[0]);
}

/**
 * Append both check digits, then break the last one when an invalid
 * number is wanted.
 */
function withCheckDigits(
  random: RandomSource,
  base: number[],
  weights: readonly [number[], number[]],
  valid: boolean
): number[] {
  const digits = [...base];
  digits.push(mod11CheckDigit(digits, weights[0]));
  digits.push(mod11CheckDigit(digits, weights[1]));
  if (!valid) {
    const last = digits.length - 1;
    digits[last] = (digits[last] + randomInt(random, 1, 9)) % 10;
  }
  return digits;
}

/**
 * A formatted CPF, `000.000.000-00`. Invalid ones fail only their last
 * check digit.
 */
export function generateCpf(random: RandomSource, valid = true): string {
  let base = randomDigits(random, 9);
  while (isRepeated(base)) {
    base = randomDigits(random, 9);
  }
  const d = withCheckDigits(random, base, CPF_WEIGHTS, valid).join('');
  return `${d.slice(0, 3)}.${d.slice(3, 6)}.${d.slice(6, 9)}-${d.slice(9)}`;
}

/**
 * A formatted head-office CNPJ, `00.000.000/0001-00`.
 */
export function generateCnpj(random: RandomSource, valid = true): string {
  let root = randomDigits(random, 8);
  while (isRepeated(root)) {
    root = randomDigits(random, 8);
  }
  const d = withCheckDigits(random, [...root, 0, 0, 0, 1], CNPJ_WEIGHTS, valid).join('');
  return `${d.slice(0, 2)}.${d.slice(2, 5)}.${d.slice(5, 8)}/${d.slice(8, 12)}-${d.slice(12)}`;
}

/**
 * `(DD) 9NNNN-NNNN` for mobiles, `(DD) NNNN-NNNN` with a leading 2-5 for
 * landlines.
 */
export function generatePhone(random: RandomSource, mobile = random() < 0.7): string {
  const ddd = pick(random, DDDS);
  const prefix = mobile ? `9${randomInt(random, 1000, 9999)}` : `${randomInt(random, 2, 5)}${randomInt(random, 100, 999)}`;
  return `(${ddd}) ${prefix}-${randomInt(random, 1000, 9999)}`;
}

/**
 * A CEP inside one of the state postal ranges.
 */
export function generateCep(random: RandomSource): string {
  const range = pick(random, CEP_RANGES);
  let digits = String(randomInt(random, range.start, range.end)).padStart(8, '0');
  while (/^(\d)\1*$/.test(digits)) {
    digits = String(randomInt(random, range.start, range.end)).padStart(8, '0');
  }
  return `${digits.slice(0, 5)}-${digits.slice(5)}`;
}

/**
 * A first name from the common-name list and one or two surnames.
 */
export function generateName(random: RandomSource): string {
  const first = pick(random, FIRST_NAMES);
  const surname = pick(random, WORDS.lastNames);
  if (random() < 0.5) {
    return `${first} ${surname}`;
  }
  const others = WORDS.lastNames.filter((name) => name !== surname);
  return `${first} ${pick(random, others)} ${surname}`;
}

export function generateEmail(random: RandomSource, name?: string): string {
  const local = name
    ? foldText(name).replace(/\s+/g, '.').replace(/[^a-z.]/g, '')
    : Array.from({ length: randomInt(random, 5, 10) }, () => String.fromCharCode(randomInt(random, 97, 122))).join('');
  const suffix = random() < 0.3 ? String(randomInt(random, 1, 999)) : '';
  return `${local}${suffix}@${pick(random, WORDS.emailDomains)}`;
}

/** `dd/mm/yyyy` between 1950 and 2005. */
export function generateBirthDate(random: RandomSource): string {
  const day = String(randomInt(random, 1, 28)).padStart(2, '0');
  const month = String(randomInt(random, 1, 12)).padStart(2, '0');
  return `${day}/${month}/${randomInt(random, 1950, 2005)}`;
}

/**
 * One dataset line, in the loader's field names.
 */
export interface SyntheticRecord {
  id: string;
  text: string;
  expected_pii: boolean;
  expected_entities: ExpectedEntity[];
}

const PLACEHOLDER = /\{(\w+)\}/g;

const PLACEHOLDER_TYPES: Record<string, PIIType> = {
  name: PIIType.NAME,
  cpf: PIIType.CPF,
  cnpj: PIIType.CNPJ,
  phone: PIIType.PHONE,
  email: PIIType.EMAIL,
  cep: PIIType.CEP,
  birth_date: PIIType.BIRTH_DATE,
};

/**
 * Seeded generator of labelled records.
 */
export class SyntheticDatasetGenerator {
  private readonly random: RandomSource;
  private counter = 0;

  constructor(seed: number = DEFAULT_SEED) {
    this.random = seededRandom(seed);
  }

  /**
   * A request filled with freshly generated personal data. Expected
   * entities follow the order the placeholders appear in.
   */
  recordWithPii(): SyntheticRecord {
    this.counter += 1;
    const name = generateName(this.random);
    const values: Record<string, string> = {
      name,
      cpf: generateCpf(this.random),
      cnpj: generateCnpj(this.random),
      phone: generatePhone(this.random),
      email: generateEmail(this.random, name),
      cep: generateCep(this.random),
      birth_date: generateBirthDate(this.random),
    };

    const template = pick(this.random, WORDS.templatesWithPii);
    const entities: ExpectedEntity[] = [];
    const text = template.replace(PLACEHOLDER, (placeholder: string, key: string) => {
      const type = PLACEHOLDER_TYPES[key];
      const value = values[key];
      if (type === undefined || value === undefined) {
        throw new Error(`Unknown placeholder in synthetic template: ${placeholder}`);
      }
      entities.push({ type, value });
      return value;
    });

    return {
      id: `pii_${String(this.counter).padStart(6, '0')}`,
      text,
      expected_pii: true,
      expected_entities: entities,
    };
  }

  recordWithoutPii(): SyntheticRecord {
    this.counter += 1;
    return {
      id: `clean_${String(this.counter).padStart(6, '0')}`,
      text: pick(this.random, WORDS.templatesWithoutPii),
      expected_pii: false,
      expected_entities: [],
    };
  }

  /**
   * `size` records, `floor(size * piiRatio)` of them with PII, shuffled.
   *
   * @throws {Error} For a size that is not a positive integer or a ratio outside [0, 1].
   */
  generate(size: number, piiRatio: number = DEFAULT_PII_RATIO): SyntheticRecord[] {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`Dataset size must be a positive integer, got: ${size}`);
    }
    if (!(piiRatio >= 0 && piiRatio <= 1)) {
      throw new Error(`PII ratio must be between 0 and 1, got: ${piiRatio}`);
    }

    const withPii = Math.floor(size * piiRatio);
    const records: SyntheticRecord[] = [];
    for (let i = 0; i < withPii; i++) {
      records.push(this.recordWithPii());
    }
    for (let i = withPii; i < size; i++) {
      records.push(this.recordWithoutPii());
    }

    for (let i = records.length - 1; i > 0; i--) {
      const j = randomInt(this.random, 0, i);
      [records[i], records[j]] = [records[j], records[i]];
    }
    return records;
  }
}

export interface GenerateOptions {
  outputPath: string;
  size: number;
  piiRatio?: number;
  seed?: number;
}

export interface GenerateSummary {
  totalRecords: number;
  recordsWithPii: number;
  recordsWithoutPii: number;
  totalEntities: number;
}

/**
 * Generate a dataset and write it as JSONL.
 */
export async function runGenerateCLI(options: GenerateOptions): Promise<GenerateSummary> {
  const seed = options.seed ?? DEFAULT_SEED;
  const records = new SyntheticDatasetGenerator(seed).generate(options.size, options.piiRatio ?? DEFAULT_PII_RATIO);

  await fs.mkdir(path.dirname(options.outputPath), { recursive: true });
  await fs.writeFile(options.outputPath, records.map((record) => JSON.stringify(record)).join('\n') + '\n', 'utf-8');

  const recordsWithPii = records.filter((record) => record.expected_pii).length;
  const summary: GenerateSummary = {
    totalRecords: records.length,
    recordsWithPii,
    recordsWithoutPii: records.length - recordsWithPii,
    totalEntities: records.reduce((total, record) => total + record.expected_entities.length, 0),
  };
  console.info(
    `event="generate_complete" seed=${seed} records=${summary.totalRecords} with_pii=${summary.recordsWithPii} ` +
      `entities=${summary.totalEntities} output="${options.outputPath}"`
  );
  return summary;
}
