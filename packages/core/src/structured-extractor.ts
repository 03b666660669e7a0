import type { CandidateSpan, IdentifierKind, SpanLabel } from "./types.js";
import { extractSpelledDigits } from "./spelled-digits.js";

interface PatternDef {
  label: Exclude<SpanLabel, "PERSON">;
  kind?: IdentifierKind;
  regex: RegExp;
}

/** Tried in order; a match overlapping an earlier accepted span is dropped. */
const PATTERNS: PatternDef[] = [
  {
    label: "DOCUMENT",
    kind: "cpf",
    regex: /\b\d{3}\.?\d{3}\.?\d{3}-?\d{2}\b/g,
  },
  {
    label: "DOCUMENT",
    kind: "titulo_eleitor",
    regex: /\b\d{4}[\s.]?\d{4}[\s.]?\d{4}\b/g,
  },
  {
    label: "DOCUMENT",
    kind: "rg",
    regex: /\b\d{2}\.?\d{3}\.?\d{3}-?[\dXx]\b|\b\d{9}\b/g,
  },
  {
    label: "DOCUMENT",
    kind: "passaporte",
    regex: /\b[A-Z]{2}\d{6}\b/g,
  },
  {
    label: "EMAIL",
    regex: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
  },
  {
    label: "PHONE",
    // Area codes never contain a zero
    regex: /(?:\([1-9]{2}\)\s?|\b[1-9]{2}\s?)\d{4,5}[-\s]?\d{4}\b/g,
  },
];

/**
 * Scan text for self-evidently personal identifiers: document numbers,
 * email addresses and phone numbers. Spans come back ordered by offset.
 */
export function extractStructured(text: string): CandidateSpan[] {
  const spans: CandidateSpan[] = [];

  for (const pat of PATTERNS) {
    const re = new RegExp(pat.regex.source, pat.regex.flags);
    let m: RegExpExecArray | null;
    while ((m = re.exec(text)) !== null) {
      const start = m.index;
      const end = start + m[0].length;
      const overlaps = spans.some((s) => start < s.end && end > s.start);
      if (overlaps) continue;
      const span: CandidateSpan = {
        start,
        end,
        text: m[0],
        label: pat.label,
        extractor: "pattern",
        ...(pat.kind ? { identifierKind: pat.kind } : {}),
      };
      spans.push(Object.freeze(span));
    }
  }

  return spans.sort((a, b) => a.start - b.start);
}

/** Pattern spans and spelled-out digit spans, merged by offset. */
export function extractAllStructured(text: string): CandidateSpan[] {
  return [...extractStructured(text), ...extractSpelledDigits(text)].sort(
    (a, b) => a.start - b.start || a.end - b.end
  );
}
