import type { CandidateSpan } from "./types.js";
import type { EntityRecognizer } from "./ports.js";
import stopWordsPt from "../data/stop-words/pt.json" with { type: "json" };
import commonNounsPt from "../data/common-nouns/pt.json" with { type: "json" };
import legalForms from "../data/legal-forms.json" with { type: "json" };

interface WordToken {
  text: string;
  start: number;
  end: number;
  kind: "word" | "number" | "punctuation" | "whitespace";
}

const HONORIFICS = new Set([
  "dr", "dra", "sr", "sra", "srta", "prof", "profa", "profª", "eng", "exmo", "exma",
]);

/** Lowercase connectors allowed between two capitalized parts of one name. */
const PARTICLES = new Set(["da", "de", "do", "das", "dos", "e"]);

/** Words that end a name: stop words and capitalized administrative nouns. */
const BREAK_WORDS = new Set(
  [...stopWordsPt, ...commonNounsPt].map((w: string) => w.toLowerCase())
);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const LEGAL_SUFFIX_SOURCE = legalForms.suffixes.map(escapeRegExp).join("|");

/** Company suffix starting at `lastIndex` ("Ltda", "S.A."). */
const LEGAL_SUFFIX = new RegExp(`(?:${LEGAL_SUFFIX_SOURCE})(?![\\p{L}\\p{N}])`, "iuy");

/** Company suffix right after a run, possibly behind a dash or comma. */
const TRAILING_LEGAL_SUFFIX = new RegExp(
  `^\\s*(?:[-–,]\\s*)?(?:${LEGAL_SUFFIX_SOURCE})(?![\\p{L}\\p{N}])`,
  "iu"
);

export interface NameRecognizerOptions {
  /** Fewest capitalized words a name needs. Default: 2. */
  minWords?: number;
  /** Most capitalized words kept in one name. Default: 6. */
  maxWords?: number;
}

function splitWords(text: string): WordToken[] {
  const out: WordToken[] = [];
  const re = /(\s+)|(\p{L}(?:[\p{L}\p{M}'’-]*[\p{L}\p{M}])?)|(\d+(?:[.,]\d+)*)|([^\s])/gu;
  let m: RegExpExecArray | null;

  while ((m = re.exec(text)) !== null) {
    let kind: WordToken["kind"];
    if (m[1]) kind = "whitespace";
    else if (m[2]) kind = "word";
    else if (m[3]) kind = "number";
    else kind = "punctuation";
    out.push({ text: m[0], start: m.index, end: m.index + m[0].length, kind });
  }

  return out;
}

function isCapitalized(text: string): boolean {
  return /^\p{Lu}/u.test(text);
}

function isAllCaps(text: string): boolean {
  return text.length > 1 && text === text.toUpperCase();
}

/**
 * Rule-based PERSON recognizer: sequences of capitalized words such as
 * "Maria Santos" or "João da Silva". Honorifics ("Dr.", "Sra.") are left
 * out of the name; stop words, punctuation and line breaks end it. Runs in
 * capitals only ("BIOCASA COMERCIO") and runs followed by a company suffix
 * ("Silva Santos Ltda") are company names and yield no span.
 */
export class NameRecognizer implements EntityRecognizer {
  private minWords: number;
  private maxWords: number;

  constructor(options: NameRecognizerOptions = {}) {
    this.minWords = Math.max(2, options.minWords ?? 2);
    this.maxWords = Math.max(this.minWords, options.maxWords ?? 6);
  }

  recognize(text: string): CandidateSpan[] {
    const spans: CandidateSpan[] = [];
    let group: WordToken[] = [];
    let pending: WordToken[] = [];
    let capitals = 0;
    let mixedCase = false;
    let afterHonorific = false;
    let skipUntil = 0;

    const emit = () => {
      const end = group.length > 0 ? group[group.length - 1].end : 0;
      if (
        capitals >= this.minWords &&
        mixedCase &&
        !TRAILING_LEGAL_SUFFIX.test(text.slice(end))
      ) {
        const start = group[0].start;
        const span: CandidateSpan = {
          start,
          end,
          text: text.slice(start, end),
          label: "PERSON",
          extractor: "recognizer",
        };
        spans.push(Object.freeze(span));
      }
      group = [];
      pending = [];
      capitals = 0;
      mixedCase = false;
    };

    for (const t of splitWords(text)) {
      if (t.start < skipUntil) continue;

      if (t.kind === "whitespace") {
        if (t.text.includes("\n")) emit();
        continue;
      }

      if (t.kind === "punctuation") {
        if (afterHonorific && t.text === ".") {
          afterHonorific = false;
          continue;
        }
        afterHonorific = false;
        emit();
        continue;
      }
      afterHonorific = false;

      if (t.kind === "number") {
        emit();
        continue;
      }

      LEGAL_SUFFIX.lastIndex = t.start;
      const suffix = LEGAL_SUFFIX.exec(text);
      if (suffix) {
        emit();
        skipUntil = t.start + suffix[0].length;
        continue;
      }

      const lower = t.text.toLowerCase();

      if (HONORIFICS.has(lower) && isCapitalized(t.text)) {
        emit();
        afterHonorific = true;
        continue;
      }

      if (isCapitalized(t.text) && !BREAK_WORDS.has(lower)) {
        if (capitals === this.maxWords) emit();
        if (group.length > 0) group.push(...pending);
        pending = [];
        group.push(t);
        capitals++;
        if (!isAllCaps(t.text)) mixedCase = true;
        continue;
      }

      if (group.length > 0 && pending.length === 0 && PARTICLES.has(t.text)) {
        pending.push(t);
        continue;
      }

      emit();
    }
    emit();

    return spans;
  }
}
