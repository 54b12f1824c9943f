export type LiteralKind = 'string' | 'character';

/**
 * Half-open range `[start, end)` of one literal, quotes included.
 */
export interface LiteralSpan {
  start: number;
  end: number;
  kind: LiteralKind;
}

export interface LiteralScan {
  /** Properly closed literals outside comments, in source order */
  spans: LiteralSpan[];
  /** Literals cut off by a newline or by end of input; these earn no credit */
  malformed: number;
}
