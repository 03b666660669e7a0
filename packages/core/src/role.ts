import type { CandidateSpan, RoleKind } from "./types.js";
import type { Lexicon, LexiconSet } from "./lexicon.js";
import { contextWindow } from "./context-window.js";

export type RoleResult =
  | { hasRole: true; kind: RoleKind; evidence: string }
  | { hasRole: false };

/**
 * Look for a cue tying the name to an act or status of an individual:
 * verbs first, then role nouns, then identification phrases. Any cue in
 * the wide window counts, not only the closest one.
 */
export function checkRole(
  text: string,
  span: CandidateSpan,
  lexicon: Lexicon,
  radius = 100
): RoleResult {
  const { text: window } = contextWindow(text, span.start, span.end, radius);

  const categories: [RoleKind, LexiconSet][] = [
    ["verb", lexicon.individualizingVerbs],
    ["role_noun", lexicon.individualizingRoles],
    ["identification_context", lexicon.identificationContexts],
  ];

  for (const [kind, set] of categories) {
    const evidence = set.findIn(window);
    if (evidence !== undefined) return { hasRole: true, kind, evidence };
  }

  return { hasRole: false };
}
