export type TokenKind = 'ident' | 'lifetime' | 'literal' | 'punct' | 'eof';

/**
 * A lexed token together with the trivia around it.
 *
 * Trivia is split so that same-line comments stay with the token they follow:
 * `trailing` holds spaces and comments up to (not including) the next newline,
 * and ends on a comment, never on whitespace. Everything else before the token
 * is `leading`.
 */
export type Token = {
  kind: TokenKind;
  text: string;
  leading: string;
  trailing: string;
  /** 0-based offset of `text` in the source. */
  offset: number;
  /** 1-based. */
  line: number;
  /** 1-based. */
  column: number;
};

export type IdentToken = Token & { kind: 'ident' };
export type PunctToken = Token & { kind: 'punct' };

export function isIdent(tok: Token | undefined, text?: string): tok is IdentToken {
  if (!tok || tok.kind !== 'ident') return false;
  return text === undefined || tok.text === text;
}

export function isPunct(tok: Token | undefined, text?: string): tok is PunctToken {
  if (!tok || tok.kind !== 'punct') return false;
  return text === undefined || tok.text === text;
}

export function withLeading(tok: Token, leading: string): Token {
  return tok.leading === leading ? tok : { ...tok, leading };
}

/** A punctuation token that did not come from the source, e.g. a separator comma. */
export function syntheticPunct(text: string, leading = ''): Token {
  return { kind: 'punct', text, leading, trailing: '', offset: -1, line: 0, column: 0 };
}

/**
 * Render tokens on one line: whitespace between tokens collapses to a single
 * space and comments are dropped.
 */
export function tokensToInlineText(tokens: readonly Token[]): string {
  let out = '';
  tokens.forEach((tok, i) => {
    if (i > 0 && (tok.leading !== '' || tokens[i - 1].trailing !== '')) out += ' ';
    out += tok.text;
  });
  return out;
}
