// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  /** 1-based line number */
  readonly line: number;
  /** 1-based column number */
  readonly column: number;
  /** 0-based character offset into the source */
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Render a location as `line:column` */
export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
