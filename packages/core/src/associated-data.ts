import type { CandidateSpan } from "./types.js";
import { contextWindow } from "./context-window.js";

const ASSOCIATED_PATTERNS: RegExp[] = [
  /\bcpf\b/,
  /\brg\b/,
  /\bemail\b/,
  /\btelefone\b/,
  /\d{3}\.?\d{3}\.?\d{3}-?\d{2}/,
  /\d{2}\.?\d{3}\.?\d{3}/,
  /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/,
];

/** True when a document keyword, document number or email sits near the span. */
export function hasAssociatedData(
  text: string,
  span: CandidateSpan,
  radius = 150
): boolean {
  const { text: window } = contextWindow(text, span.start, span.end, radius);
  return ASSOCIATED_PATTERNS.some((re) => re.test(window));
}
