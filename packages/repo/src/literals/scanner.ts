import type { LiteralScan, LiteralSpan } from './types';

type ScanState = 'code' | 'line-comment' | 'block-comment' | 'string' | 'char';

/**
 * Single left-to-right pass that records every string and character literal
 * outside comments.
 *
 * Comment openers are only recognised in code, so `"//"` or `'/*'` inside a
 * literal stay literal text. Escapes are consumed as a backslash plus the
 * following character. A literal that reaches a newline or the end of input
 * before its closing quote counts as malformed and earns no span. Block
 * comments do not nest; the first `*\/` closes.
 */
export function scanLiterals(source: string): LiteralScan {
  const spans: LiteralSpan[] = [];
  const len = source.length;
  let malformed = 0;
  let state: ScanState = 'code';
  let literalStart = 0;
  let i = 0;

  while (i < len) {
    const ch = source[i];
    const next = i + 1 < len ? source[i + 1] : undefined;

    switch (state) {
      case 'code':
        if (ch === '/' && next === '/') {
          state = 'line-comment';
          i += 2;
        } else if (ch === '/' && next === '*') {
          state = 'block-comment';
          i += 2;
        } else {
          if (ch === '"') {
            state = 'string';
            literalStart = i;
          } else if (ch === "'") {
            state = 'char';
            literalStart = i;
          }
          i++;
        }
        break;

      case 'line-comment':
        if (ch === '\n') state = 'code';
        i++;
        break;

      case 'block-comment':
        if (ch === '*' && next === '/') {
          state = 'code';
          i += 2;
        } else {
          i++;
        }
        break;

      case 'string':
      case 'char': {
        const quote = state === 'string' ? '"' : "'";
        if (ch === '\\') {
          // A lone trailing backslash has nothing to escape.
          i += next === undefined ? 1 : 2;
        } else if (ch === quote) {
          spans.push({
            start: literalStart,
            end: i + 1,
            kind: state === 'string' ? 'string' : 'character',
          });
          state = 'code';
          i++;
        } else if (ch === '\n') {
          malformed++;
          state = 'code';
          i++;
        } else {
          i++;
        }
        break;
      }
    }
  }

  if (state === 'string' || state === 'char') {
    malformed++;
  }

  return { spans, malformed };
}

/**
 * Eligibility gate: true when at least one literal exists outside comments.
 */
export function hasLiteralOutsideComment(source: string): boolean {
  return scanLiterals(source).spans.length > 0;
}
