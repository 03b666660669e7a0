import type { CandidateSpan, Verdict, WindowRadii } from "./types.js";
import type { Lexicon } from "./lexicon.js";
import { InvalidSpanError } from "./errors.js";
import { checkExclusion } from "./exclusion.js";
import { checkRole } from "./role.js";
import { hasAssociatedData } from "./associated-data.js";

export const DEFAULT_RADII: Readonly<WindowRadii> = Object.freeze({
  narrow: 30,
  role: 100,
  associated: 150,
});

/** Throw InvalidSpanError unless the span is a non-empty range inside the text. */
export function assertValidSpan(text: string, span: CandidateSpan): void {
  const { start, end } = span;
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    start >= end ||
    end > text.length
  ) {
    throw new InvalidSpanError(start, end, text.length);
  }
}

/**
 * Decide whether one span identifies a natural person.
 *
 * Structured identifiers are personal data unconditionally. PERSON spans go
 * through, in order: exclusion (a veto), individualizing role, associated
 * document or contact data, and otherwise default to public.
 */
export function decide(
  text: string,
  span: CandidateSpan,
  lexicon: Lexicon,
  radii: WindowRadii = DEFAULT_RADII
): Verdict {
  assertValidSpan(text, span);

  if (span.label !== "PERSON") {
    return { isPersonalData: true, reason: "documento_ou_contato" };
  }

  const exclusion = checkExclusion(text, span, lexicon, radii.narrow);
  if (exclusion.excluded) {
    return {
      isPersonalData: false,
      reason: exclusion.reason,
      evidence: exclusion.evidence,
    };
  }

  const role = checkRole(text, span, lexicon, radii.role);
  if (role.hasRole) {
    return {
      isPersonalData: true,
      reason: "individualizing_role",
      detail: role.kind,
      evidence: role.evidence,
    };
  }

  if (hasAssociatedData(text, span, radii.associated)) {
    return {
      isPersonalData: true,
      reason: "associated_data",
      evidence: "documento_ou_contato",
    };
  }

  return { isPersonalData: false, reason: "no_individualizing_role" };
}
