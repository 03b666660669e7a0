import type { ContextWindow } from "./types.js";

/**
 * Lowercased slice of `text` from `before` characters ahead of the span to
 * `after` characters past it. Out-of-range bounds are clamped, never rejected.
 */
export function extractWindow(
  text: string,
  start: number,
  end: number,
  before: number,
  after: number
): string {
  const from = Math.max(0, start - Math.max(0, before));
  const to = Math.min(text.length, Math.max(from, end + Math.max(0, after)));
  return text.slice(from, to).toLowerCase();
}

/** Same as extractWindow, keeping the radii alongside the window text. */
export function contextWindow(
  text: string,
  start: number,
  end: number,
  radiusBefore: number,
  radiusAfter: number = radiusBefore
): ContextWindow {
  return {
    radiusBefore,
    radiusAfter,
    text: extractWindow(text, start, end, radiusBefore, radiusAfter),
  };
}
