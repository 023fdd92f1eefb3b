/** 1-indexed, inclusive line range with `start <= end`. */
export interface LocationRange {
  readonly start: number;
  readonly end: number;
}

export interface SelectionAnchors {
  /** Line where the selection started (the visual anchor). */
  anchor: number;
  /** Line the cursor is on. */
  cursor: number;
}

export interface SelectionSource {
  selectionAnchors(): SelectionAnchors | null;
}

export function normalizeRange(a: number, b: number): LocationRange {
  return a <= b ? { start: a, end: b } : { start: b, end: a };
}

/**
 * Parse `12-30`, `30,12` or a lone `7` into a normalized range.
 * Returns null for anything else, including line 0.
 */
export function parseRange(text: string): LocationRange | null {
  const match = text.trim().match(/^(\d+)(?:\s*[-,]\s*(\d+))?$/);
  if (!match) return null;
  const start = Number(match[1]);
  const end = match[2] === undefined ? start : Number(match[2]);
  if (start < 1 || end < 1) return null;
  return normalizeRange(start, end);
}

export function getSelectionRange(source: SelectionSource): LocationRange | null {
  const anchors = source.selectionAnchors();
  if (!anchors) return null;
  return normalizeRange(anchors.anchor, anchors.cursor);
}
