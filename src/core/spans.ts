/**
 * Span helpers shared by the detectors.
 */

import type { Span } from "./types.js";

export function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

export function overlapsAny(span: Span, spans: readonly Span[]): boolean {
  return spans.some((s) => overlaps(span, s));
}

/** Span of a regex match, or of one capture group when `group` is given. */
export function matchSpan(m: RegExpMatchArray, group = 0): Span | null {
  if (m.index === undefined) return null;
  const whole = m[0];
  const part = m[group];
  if (part === undefined) return null;
  const offset = group === 0 ? 0 : whole.indexOf(part);
  if (offset < 0) return null;
  const start = m.index + offset;
  return { start, end: start + part.length };
}
