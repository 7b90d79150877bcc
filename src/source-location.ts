// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * Position in template source.
 * `line` and `column` are 1-based; `column` counts UTF-16 code units.
 * `offset` is the 0-based UTF-8 byte offset.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
