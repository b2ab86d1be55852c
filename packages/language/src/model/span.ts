/* =======================================================================================
 * Span primitives (document offsets)
 * ---------------------------------------------------------------------------------------
 * - Every node, expression and diagnostic carries a [start, end) span into the
 *   original (escaped) document text
 * - Helpers for length/containment/clamping
 * ======================================================================================= */

export interface TextSpan {
  /**
   * 0-based UTF-16 code unit offsets into the document text, [start, end).
   */
  start: number;
  end: number;
}

export function spanLength(span: TextSpan | null | undefined): number {
  return span ? Math.max(0, span.end - span.start) : 0;
}

/** Build a normalized TextSpan from numeric bounds. */
export function spanFromBounds(start: number, end: number): TextSpan {
  return normalizeSpan({ start, end });
}

/** Build a span from an offset/length pair. */
export function spanFromLength(start: number, length: number): TextSpan {
  return spanFromBounds(start, start + length);
}

export function normalizeSpan(span: TextSpan): TextSpan {
  if (span.start <= span.end) return span;
  return { start: span.end, end: span.start };
}

export function offsetSpan(span: TextSpan, delta: number): TextSpan {
  return { start: span.start + delta, end: span.end + delta };
}

export function spanContains(haystack: TextSpan | null | undefined, needle: TextSpan | null | undefined): boolean {
  if (!haystack || !needle) return false;
  return haystack.start <= needle.start && haystack.end >= needle.end;
}

/** True when an offset falls within [start, end] of the given span; the end is inclusive so a caret after a name still hits it. */
export function spanTouchesOffset(span: TextSpan | null | undefined, offset: number): boolean {
  if (!span) return false;
  return offset >= span.start && offset <= span.end;
}

export function spanEquals(a: TextSpan | null | undefined, b: TextSpan | null | undefined): boolean {
  if (!a || !b) return false;
  return a.start === b.start && a.end === b.end;
}

/** Clamp a span into [0, length] so nothing reported can point past the document. */
export function clampSpan(span: TextSpan, length: number): TextSpan {
  const normalized = normalizeSpan(span);
  const start = Math.min(Math.max(0, normalized.start), length);
  const end = Math.min(Math.max(start, normalized.end), length);
  return { start, end };
}

export function sliceSpan(text: string, span: TextSpan): string {
  return text.slice(span.start, span.end);
}
