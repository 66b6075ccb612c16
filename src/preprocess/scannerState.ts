/**
 * Lexical context of the wrapper scanner.
 *
 * @module preprocess/scannerState
 */
export enum ScanContext {
  Normal = 'normal',
  InString = 'in_string',
  InChar = 'in_char',
  InLineComment = 'in_line_comment',
  InBlockComment = 'in_block_comment',
}

export interface ScannerState {
  context: ScanContext;
  /** The previous character was a backslash inside a literal. */
  pendingEscape: boolean;
  /** Open-brace depth relative to where the scan started. */
  depth: number;
  position: number;
}

export function createScannerState(position: number, depth = 0): ScannerState {
  return { context: ScanContext.Normal, pendingEscape: false, depth, position };
}

const IDENT_START = /[A-Za-z_]/;

/**
 * A quote followed by an identifier-start character is a lifetime or label
 * (`'a`, `'static`, `'outer:`), unless the character after that closes it
 * again (`'a'`), which makes it a character literal.
 */
export function isLifetimeQuote(source: string, quoteIndex: number): boolean {
  const next = source.charAt(quoteIndex + 1);
  if (!IDENT_START.test(next)) return false;
  return source.charAt(quoteIndex + 2) !== "'";
}

/**
 * Advance the scanner over one position and return how many characters were
 * consumed. Brace depth only changes in `Normal` context. Rules are checked in
 * priority order: pending escape, literals, block comment, line comment, then
 * normal code.
 */
export function step(source: string, state: ScannerState): number {
  const ch = source.charAt(state.position);
  const next = source.charAt(state.position + 1);

  if (state.pendingEscape) {
    state.pendingEscape = false;
    return 1;
  }

  switch (state.context) {
    case ScanContext.InString:
    case ScanContext.InChar: {
      const terminator = state.context === ScanContext.InString ? '"' : "'";
      if (ch === '\\') state.pendingEscape = true;
      else if (ch === terminator) state.context = ScanContext.Normal;
      return 1;
    }

    case ScanContext.InBlockComment:
      if (ch === '*' && next === '/') {
        state.context = ScanContext.Normal;
        return 2;
      }
      return 1;

    case ScanContext.InLineComment:
      if (ch === '\n') state.context = ScanContext.Normal;
      return 1;

    case ScanContext.Normal:
      if (ch === '/' && next === '/') {
        state.context = ScanContext.InLineComment;
        return 2;
      }
      if (ch === '/' && next === '*') {
        state.context = ScanContext.InBlockComment;
        return 2;
      }
      if (ch === '"') {
        state.context = ScanContext.InString;
        return 1;
      }
      if (ch === "'") {
        if (!isLifetimeQuote(source, state.position)) state.context = ScanContext.InChar;
        return 1;
      }
      if (ch === '{') state.depth++;
      else if (ch === '}') state.depth--;
      return 1;
  }
}
