import type { CandidateSpan, ExclusionReason } from "./types.js";
import type { Lexicon } from "./lexicon.js";
import { contextWindow } from "./context-window.js";

export type ExclusionResult =
  | { excluded: true; reason: ExclusionReason; evidence: string }
  | { excluded: false };

/** A word that starts with a capital letter, as in a proper name. */
const NAME_WORD = "\\p{Lu}[\\p{L}\\p{M}]*";

/** Alternation matching each keyword with a lowercase or capital initial. */
function keywords(...words: string[]): string {
  return words.map((w) => `[${w[0].toUpperCase()}${w[0]}]${w.slice(1)}`).join("|");
}

/** Naming constructions: a law, award or report named after someone. */
const STRUCTURAL_PATTERNS: { reason: ExclusionReason; regex: RegExp }[] = [
  {
    reason: "lei_homenagem",
    regex: new RegExp(
      `(?<![\\p{L}\\p{N}])(?:${keywords("lei", "decreto", "portaria", "estatuto")})\\s+${NAME_WORD}\\s+${NAME_WORD}`,
      "gu"
    ),
  },
  {
    reason: "homenagem",
    regex: new RegExp(
      `(?<![\\p{L}\\p{N}])(?:${keywords("prêmio", "premio", "projeto", "programa", "medalha", "comenda")})\\s+${NAME_WORD}`,
      "gu"
    ),
  },
  {
    reason: "relatorio_nomeado",
    regex: new RegExp(
      `(?<![\\p{L}\\p{N}])(?:${keywords("relatório", "relatorio")})\\s+${NAME_WORD}`,
      "gu"
    ),
  },
];

/**
 * Find a naming construction that runs into the span: the keyword sits
 * before or at the start of the name and the matched words reach into it.
 */
function findNamingConstruction(
  text: string,
  span: CandidateSpan,
  radius: number
): { reason: ExclusionReason; evidence: string } | undefined {
  const from = Math.max(0, span.start - Math.max(0, radius));
  const region = text.slice(from, span.end);
  const offset = span.start - from;

  for (const { reason, regex } of STRUCTURAL_PATTERNS) {
    const re = new RegExp(regex.source, regex.flags);
    let m: RegExpExecArray | null;
    while ((m = re.exec(region)) !== null) {
      if (m.index <= offset && m.index + m[0].length > offset) {
        return { reason, evidence: m[0].toLowerCase() };
      }
    }
  }
  return undefined;
}

/**
 * Decide whether a PERSON span names an institution, place, company, law
 * or honor. Only the narrow window counts: the cue must sit right next to
 * the name.
 */
export function checkExclusion(
  text: string,
  span: CandidateSpan,
  lexicon: Lexicon,
  radius = 30
): ExclusionResult {
  const { text: window } = contextWindow(text, span.start, span.end, radius);

  const term = lexicon.exclusionTerms.findIn(window);
  if (term !== undefined) {
    return { excluded: true, reason: "exclusion_context", evidence: term };
  }

  const naming = findNamingConstruction(text, span, radius);
  if (naming) {
    return { excluded: true, reason: naming.reason, evidence: naming.evidence };
  }

  return { excluded: false };
}
