import type { CandidateSpan, IdentifierKind } from "./types.js";

const NUMBER_WORDS: ReadonlyMap<string, string> = new Map([
  ["zero", "0"],
  ["um", "1"],
  ["uma", "1"],
  ["dois", "2"],
  ["duas", "2"],
  ["três", "3"],
  ["tres", "3"],
  ["quatro", "4"],
  ["cinco", "5"],
  ["seis", "6"],
  ["sete", "7"],
  ["oito", "8"],
  ["nove", "9"],
  ["dez", "10"],
]);

const MIN_WORDS = 3;
const MIN_DIGITS = 6;

const SEPARATOR = /^[\s,.-]+$/;

function kindForLength(digits: number): IdentifierKind {
  switch (digits) {
    case 11:
      return "cpf";
    case 9:
      return "rg";
    case 12:
      return "titulo_eleitor";
    default:
      return "numero_extenso";
  }
}

interface NumberWord {
  start: number;
  end: number;
  digits: string;
}

/**
 * Find identifiers dictated in words ("um dois três quatro cinco seis").
 * A run needs at least three consecutive number words and six digits.
 */
export function extractSpelledDigits(text: string): CandidateSpan[] {
  const spans: CandidateSpan[] = [];
  const re = /\p{L}+/gu;
  let run: NumberWord[] = [];
  let m: RegExpExecArray | null;

  const flush = () => {
    if (run.length >= MIN_WORDS) {
      const digits = run.map((w) => w.digits).join("");
      if (digits.length >= MIN_DIGITS) {
        const start = run[0].start;
        const end = run[run.length - 1].end;
        const span: CandidateSpan = {
          start,
          end,
          text: text.slice(start, end),
          label: "DOCUMENT",
          extractor: "spelled",
          identifierKind: kindForLength(digits.length),
        };
        spans.push(Object.freeze(span));
      }
    }
    run = [];
  };

  while ((m = re.exec(text)) !== null) {
    const digits = NUMBER_WORDS.get(m[0].toLowerCase());
    if (digits === undefined) {
      flush();
      continue;
    }

    const start = m.index;
    const prev = run[run.length - 1];
    if (prev && !SEPARATOR.test(text.slice(prev.end, start))) flush();
    run.push({ start, end: start + m[0].length, digits });
  }
  flush();

  return spans;
}
