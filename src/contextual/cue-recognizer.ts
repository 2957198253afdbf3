/**
 * Rule-based contextual recognizer.
 *
 * Finds names, street addresses and birth dates from the phrases that
 * usually introduce them in Portuguese requests ("meu nome é", "Sr.",
 * "residente na Rua ...", "nascido em ..."). Runs in process and never
 * becomes unavailable, which makes it the default collaborator.
 */

import { z } from 'zod';
import commonNamesData from '../data/common-names.json';
import { ContextualUnavailableError } from '../exceptions';
import { PIIType, typeRank } from '../types';
import type { ContextualCandidate, ContextualRecognizer, RecognizeOptions } from './types';

const NAME_WORD = String.raw`\p{Lu}[\p{Ll}'’]{1,20}`;
const NAME_SEQUENCE = String.raw`${NAME_WORD}(?:[ \t]+(?:d[aeo]s?[ \t]+|e[ \t]+)?${NAME_WORD}){1,4}`;

const SELF_IDENTIFICATION_CONFIDENCE = 0.85;
const TITLE_CONFIDENCE = 0.8;
const UNCUED_NAME_CONFIDENCE = 0.45;
const ADDRESS_CONFIDENCE = 0.8;
const BIRTH_DATE_CONFIDENCE = 0.85;

interface Cue {
  regex: RegExp;
  confidence: number;
}

const NAME_CUES: readonly Cue[] = [
  {
    regex: /\b(?:meu nome é|meu nome e|me chamo|nome completo|nome)\s*:?\s*/giu,
    confidence: SELF_IDENTIFICATION_CONFIDENCE,
  },
  {
    regex: /(?:\b(?:sr|sra|srta|dr|dra)\.|\b(?:senhor|senhora|solicitante|requerente|assinado|atenciosamente)\b)\s*[:,]?\s*/giu,
    confidence: TITLE_CONFIDENCE,
  },
];

const STREET_ADDRESS =
  /\b(?:[Rr]ua|[Aa]venida|[Aa]v\.|[Tt]ravessa|[Tt]v\.|[Aa]lameda|[Aa]l\.|[Pp]ra[çc]a|[Rr]odovia|[Ee]strada)\s+(?=[\p{Lu}\p{N}])[\p{L}\p{N}.'’ ]{2,60}?,?\s*(?:n[º°o]\.?\s*)?\d{1,5}(?!\p{N})/gu;

const SECTOR_ADDRESS = new RegExp(
  String.raw`\b(?:SQN|SQS|SQSW|SHIN|SHIS|QNM|QNN|QND|QNL|QNA|QNB|QNC|QNE|QNF|QNG|QNJ|QNO|QNP|QNQ|QNR|QI|QE|QL|CLN|CLS|CRN|CRS)` +
    String.raw`\s{0,2}\d{1,4}(?:\s{0,2},?\s{0,2}(?:[Bb]loco|[Bb]l\.?|[Cc]onjunto|[Cc]onj\.?|[Cc]j\.?|[Ll]ote|[Ll]t\.?|[Cc]asa|[Aa]partamento|[Aa]pto?\.?)\s{0,2}[A-Z0-9]{1,4}){1,4}`,
  'gu'
);

const BIRTH_DATE =
  /\b(?:nascid[oa] em|nasci em|data de nascimento|dt\.? nasc\.?|nascimento)\s*[:\-]?\s*(\d{1,2}[/.-]\d{1,2}[/.-]\d{4})(?!\d)/giu;

const CommonNames = z.array(z.string().min(1));

/**
 * Whether day/month/year form a real calendar date in a plausible range.
 */
export function isPlausibleDate(day: number, month: number, year: number): boolean {
  if (year < 1900 || year > 2099 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  return new Date(Date.UTC(year, month - 1, day)).getUTCDate() === day;
}

function overlapsAny(candidate: { start: number; end: number }, others: readonly ContextualCandidate[]): boolean {
  return others.some((other) => candidate.start < other.end && other.start < candidate.end);
}

export interface CueRecognizerOptions {
  /** First names that mark an uncued capitalized sequence as a likely name. */
  commonNames?: Iterable<string>;
}

export class CueRecognizer implements ContextualRecognizer {
  readonly name = 'cues';
  private readonly commonNames: ReadonlySet<string>;

  constructor(options: CueRecognizerOptions = {}) {
    this.commonNames = new Set(options.commonNames ?? CommonNames.parse(commonNamesData));
  }

  async recognize(text: string, options: RecognizeOptions = {}): Promise<ContextualCandidate[]> {
    if (options.signal?.aborted) {
      throw new ContextualUnavailableError(this.name, 'aborted');
    }

    const names = this.findCuedNames(text);
    const candidates: ContextualCandidate[] = [
      ...names,
      ...this.findUncuedNames(text, names),
      ...this.findAddresses(text),
      ...this.findBirthDates(text),
    ];

    const minConfidence = options.minConfidence ?? 0;
    return candidates
      .filter((candidate) => candidate.confidence >= minConfidence)
      .sort((a, b) => a.start - b.start || typeRank(a.type) - typeRank(b.type) || b.end - a.end);
  }

  private findCuedNames(text: string): ContextualCandidate[] {
    const found: ContextualCandidate[] = [];
    const sequence = new RegExp(NAME_SEQUENCE, 'uy');

    for (const cue of NAME_CUES) {
      for (const match of text.matchAll(new RegExp(cue.regex.source, cue.regex.flags))) {
        const start = (match.index ?? 0) + match[0].length;
        sequence.lastIndex = start;
        const name = sequence.exec(text);
        if (!name) {
          continue;
        }

        const candidate: ContextualCandidate = {
          type: PIIType.NAME,
          start,
          end: start + name[0].length,
          confidence: cue.confidence,
        };
        if (!overlapsAny(candidate, found)) {
          found.push(candidate);
        }
      }
    }
    return found;
  }

  /**
   * Capitalized sequences starting at a common first name, with at least one
   * more capitalized word after it.
   */
  private findUncuedNames(text: string, cued: readonly ContextualCandidate[]): ContextualCandidate[] {
    const found: ContextualCandidate[] = [];
    const word = new RegExp(NAME_WORD, 'gu');

    for (const match of text.matchAll(new RegExp(NAME_SEQUENCE, 'gu'))) {
      const sequenceStart = match.index ?? 0;
      const words = Array.from(match[0].matchAll(word));
      const firstName = words.findIndex(
        (candidate, index) => index < words.length - 1 && this.commonNames.has(candidate[0])
      );
      if (firstName < 0) {
        continue;
      }

      const candidate: ContextualCandidate = {
        type: PIIType.NAME,
        start: sequenceStart + (words[firstName].index ?? 0),
        end: sequenceStart + match[0].length,
        confidence: UNCUED_NAME_CONFIDENCE,
      };
      if (!overlapsAny(candidate, cued)) {
        found.push(candidate);
      }
    }
    return found;
  }

  private findAddresses(text: string): ContextualCandidate[] {
    const found: ContextualCandidate[] = [];
    for (const regex of [STREET_ADDRESS, SECTOR_ADDRESS]) {
      for (const match of text.matchAll(new RegExp(regex.source, regex.flags))) {
        const start = match.index ?? 0;
        const candidate: ContextualCandidate = {
          type: PIIType.ADDRESS,
          start,
          end: start + match[0].length,
          confidence: ADDRESS_CONFIDENCE,
        };
        if (!overlapsAny(candidate, found)) {
          found.push(candidate);
        }
      }
    }
    return found;
  }

  private findBirthDates(text: string): ContextualCandidate[] {
    const found: ContextualCandidate[] = [];
    for (const match of text.matchAll(new RegExp(BIRTH_DATE.source, BIRTH_DATE.flags))) {
      const date = match[1];
      const [day, month, year] = date.split(/[/.-]/).map(Number);
      if (!isPlausibleDate(day, month, year)) {
        continue;
      }
      const end = (match.index ?? 0) + match[0].length;
      found.push({
        type: PIIType.BIRTH_DATE,
        start: end - date.length,
        end,
        confidence: BIRTH_DATE_CONFIDENCE,
      });
    }
    return found;
  }
}
