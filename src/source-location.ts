// ============================================================
// SOURCE LOCATION
// ============================================================

/** A point in the source text. Line and column are 1-based, offset is 0-based. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
