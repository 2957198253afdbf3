/**
 * Pattern library for structured Brazilian identifiers.
 *
 * Matchers are compiled once into a frozen `PatternLibrary` shared by every
 * detection call. Each call clones the regexes it runs so `lastIndex` state
 * never leaks between calls.
 *
 * All quantifiers are bounded. Digit matchers refuse a word or mask character
 * on either side, and candidates touching a mask character are dropped, so
 * partially masked values like `***.456.789-**` produce nothing.
 */

import { PatternPIIType, PIIType, typeRank } from '../types';
import { touchesMask } from '../utils/text';

/**
 * How far past the core matchers a policy reaches.
 *
 * - `off`: formatted values only.
 * - `partial`: adds unformatted digit runs and looser separators.
 * - `on`: adds local phone numbers and obfuscated e-mails.
 */
export type RegexAggressiveness = 'off' | 'partial' | 'on';

export type PatternTier = 'core' | 'extended' | 'loose';

const TIERS: Record<RegexAggressiveness, ReadonlySet<PatternTier>> = {
  off: new Set<PatternTier>(['core']),
  partial: new Set<PatternTier>(['core', 'extended']),
  on: new Set<PatternTier>(['core', 'extended', 'loose']),
};

interface PatternDefinition {
  id: string;
  type: PatternPIIType;
  regex: RegExp;
  /** Capture group holding the value when the match includes a keyword. */
  group?: number;
  tier: PatternTier;
  confidence: number;
}

/**
 * A structural match before validation.
 */
export interface RawCandidate {
  type: PatternPIIType;
  rawValue: string;
  start: number;
  end: number;
  baseConfidence: number;
  tier: PatternTier;
  patternId: string;
}

const L = String.raw`(?<![\w*#•])`;
const R = String.raw`(?![\w*#•])`;
const EMAIL_DOMAIN = String.raw`[A-Za-z0-9-]{1,63}(?:\.[A-Za-z0-9-]{1,63}){0,6}\.[A-Za-z]{2,24}(?![A-Za-z0-9-])`;
const KEYWORD_GAP = String.raw`\s{0,3}(?:n[º°o]\.?\s{0,2})?[:\-]?\s{0,3}`;

function pattern(source: string, flags = 'g'): RegExp {
  return new RegExp(source, flags);
}

const DEFAULT_PATTERNS: PatternDefinition[] = [
  {
    id: 'cpf.formatted',
    type: PIIType.CPF,
    regex: pattern(String.raw`${L}\d{3}\.\d{3}\.\d{3}-\d{2}${R}`),
    tier: 'core',
    confidence: 0.9,
  },
  {
    id: 'cpf.unformatted',
    type: PIIType.CPF,
    regex: pattern(String.raw`${L}\d{3}[.\s]?\d{3}[.\s]?\d{3}[-.\s/]?\d{2}${R}`),
    tier: 'extended',
    confidence: 0.85,
  },
  {
    id: 'cnpj.formatted',
    type: PIIType.CNPJ,
    regex: pattern(String.raw`${L}\d{2}\.\d{3}\.\d{3}/\d{4}-\d{2}${R}`),
    tier: 'core',
    confidence: 0.9,
  },
  {
    id: 'cnpj.unformatted',
    type: PIIType.CNPJ,
    regex: pattern(String.raw`${L}\d{2}\.?\d{3}\.?\d{3}/?\d{4}-?\d{2}${R}`),
    tier: 'extended',
    confidence: 0.85,
  },
  {
    id: 'phone.parenthesized',
    type: PIIType.PHONE,
    regex: pattern(String.raw`${L}(?:\+55\s?)?\(\d{2}\)\s?(?:9\d{4}|[2-5]\d{3})[-\s]?\d{4}${R}`),
    tier: 'core',
    confidence: 0.9,
  },
  {
    id: 'phone.spaced',
    type: PIIType.PHONE,
    regex: pattern(String.raw`${L}(?:\+55\s?)?\d{2}\s(?:9\d{4}|[2-5]\d{3})-\d{4}${R}`),
    tier: 'core',
    confidence: 0.9,
  },
  {
    id: 'phone.unformatted',
    type: PIIType.PHONE,
    regex: pattern(String.raw`${L}(?:\+?55)?\d{2}(?:9\d{4}|[2-5]\d{3})\d{4}${R}`),
    tier: 'extended',
    confidence: 0.8,
  },
  {
    id: 'phone.local',
    type: PIIType.PHONE,
    regex: pattern(String.raw`${L}(?:9\d{4}|[2-5]\d{3})-\d{4}${R}`),
    tier: 'loose',
    confidence: 0.65,
  },
  {
    id: 'email.address',
    type: PIIType.EMAIL,
    regex: pattern(String.raw`(?<![\w.%+-])[A-Za-z0-9._%+-]{1,64}@${EMAIL_DOMAIN}`),
    tier: 'core',
    confidence: 0.9,
  },
  {
    id: 'email.obfuscated',
    type: PIIType.EMAIL,
    regex: pattern(
      String.raw`(?<![\w.%+-])[A-Za-z0-9._%+-]{1,64}\s{0,2}(?:\[@\]|\(at\)|\[at\])\s{0,2}${EMAIL_DOMAIN}`,
      'gi'
    ),
    tier: 'loose',
    confidence: 0.75,
  },
  {
    id: 'cep.formatted',
    type: PIIType.CEP,
    regex: pattern(String.raw`${L}\d{5}-\d{3}${R}`),
    tier: 'core',
    confidence: 0.85,
  },
  {
    id: 'cep.dotted',
    type: PIIType.CEP,
    regex: pattern(String.raw`${L}\d{2}\.\d{3}-\d{3}${R}`),
    tier: 'extended',
    confidence: 0.8,
  },
  {
    id: 'rg.formatted',
    type: PIIType.RG,
    regex: pattern(String.raw`${L}\d{1,2}\.\d{3}\.\d{3}-[\dXx]${R}`),
    tier: 'core',
    confidence: 0.8,
  },
  {
    id: 'rg.keyword',
    type: PIIType.RG,
    regex: pattern(
      String.raw`\b(?:RG|R\.G\.|identidade|registro geral)${KEYWORD_GAP}(\d{1,2}\.?\d{3}\.?\d{3}-?[\dX]|\d{5,9})${R}`,
      'gi'
    ),
    group: 1,
    tier: 'core',
    confidence: 0.85,
  },
  {
    id: 'cnh.keyword',
    type: PIIType.CNH,
    regex: pattern(
      String.raw`\b(?:CNH|carteira de motorista|carteira nacional de habilita[çc][ãa]o|habilita[çc][ãa]o)${KEYWORD_GAP}(\d{11}|\d{4}\s\d{4}\s\d{3})${R}`,
      'gi'
    ),
    group: 1,
    tier: 'core',
    confidence: 0.85,
  },
];

/**
 * Immutable, precompiled set of structural matchers.
 */
export class PatternLibrary {
  private readonly definitions: readonly PatternDefinition[];

  constructor(definitions: readonly PatternDefinition[]) {
    this.definitions = Object.freeze(definitions.map((definition) => Object.freeze({ ...definition })));
    Object.freeze(this);
  }

  /** Pattern ids in evaluation order. */
  get patternIds(): string[] {
    return this.definitions.map((definition) => definition.id);
  }

  /**
   * Run every matcher enabled by `aggressiveness` over `text`.
   *
   * Candidates may overlap. Output is ordered by start, then type declaration
   * order, then longer span, then pattern order; a second match of the same
   * type over the same span is dropped.
   */
  extract(text: string, aggressiveness: RegexAggressiveness = 'on'): RawCandidate[] {
    const tiers = TIERS[aggressiveness];
    const candidates: Array<RawCandidate & { order: number }> = [];
    const seen = new Set<string>();

    this.definitions.forEach((definition, order) => {
      if (!tiers.has(definition.tier)) {
        return;
      }

      const regex = new RegExp(definition.regex.source, definition.regex.flags);
      let match: RegExpExecArray | null;

      while ((match = regex.exec(text)) !== null) {
        if (regex.lastIndex === match.index) {
          regex.lastIndex += 1;
        }

        const value = match[definition.group ?? 0];
        if (!value) {
          continue;
        }

        const offset = definition.group !== undefined ? match[0].lastIndexOf(value) : 0;
        const start = match.index + offset;
        const end = start + value.length;
        const key = `${definition.type}:${start}:${end}`;
        if (seen.has(key) || touchesMask(text, start, end)) {
          continue;
        }
        seen.add(key);

        candidates.push({
          type: definition.type,
          rawValue: value,
          start,
          end,
          baseConfidence: definition.confidence,
          tier: definition.tier,
          patternId: definition.id,
          order,
        });
      }
    });

    candidates.sort(
      (a, b) =>
        a.start - b.start ||
        typeRank(a.type) - typeRank(b.type) ||
        b.end - a.end ||
        a.order - b.order
    );

    return candidates.map(({ order: _order, ...candidate }) => candidate);
  }
}

/**
 * Process-wide pattern library.
 */
export const PATTERN_LIBRARY = new PatternLibrary(DEFAULT_PATTERNS);

/**
 * Extract structural candidates with the shared library.
 */
export function extract(text: string, aggressiveness: RegexAggressiveness = 'on'): RawCandidate[] {
  return PATTERN_LIBRARY.extract(text, aggressiveness);
}
