import { ParseError } from '../../errors/stripErrors';
import type { TokenStream } from '../lexer';
import { isIdent, isPunct, type Token } from '../token';

export type ScanOptions = {
  /** Treat `<`/`>` as brackets, for generics and types. */
  angles?: boolean;
};

export type Segment = {
  from: number;
  to: number;
  /** Index of the comma that ended the segment, or -1. */
  comma: number;
};

/**
 * Cursor over a token stream plus the scanning helpers shared by the item,
 * statement and expression parsers. Delimited groups are skipped through the
 * partner table computed by the lexer.
 */
export class Parser {
  pos = 0;
  readonly tokens: Token[];
  private readonly partner: Int32Array;

  constructor(
    stream: TokenStream,
    readonly fileName: string,
  ) {
    this.tokens = stream.tokens;
    this.partner = stream.partner;
  }

  get eofIndex(): number {
    return this.tokens.length - 1;
  }

  at(index: number): Token {
    return this.tokens[Math.min(Math.max(index, 0), this.eofIndex)];
  }

  peek(offset = 0): Token {
    return this.at(this.pos + offset);
  }

  next(): Token {
    const tok = this.peek();
    if (this.pos < this.eofIndex) this.pos++;
    return tok;
  }

  slice(from: number, to: number): Token[] {
    return this.tokens.slice(from, to);
  }

  isOpener(index: number): boolean {
    const tok = this.at(index);
    return tok.kind === 'punct' && (tok.text === '(' || tok.text === '[' || tok.text === '{') && this.partner[index] > index;
  }

  isCloser(index: number): boolean {
    const tok = this.at(index);
    return tok.kind === 'punct' && (tok.text === ')' || tok.text === ']' || tok.text === '}');
  }

  /** Index of the delimiter paired with the one at `index`. */
  partnerOf(index: number): number {
    const other = this.partner[index];
    if (other < 0) this.fail('expected a delimiter', this.at(index));
    return other;
  }

  /** Index just past the token tree starting at `index`. */
  skipTree(index: number): number {
    return this.isOpener(index) ? this.partnerOf(index) + 1 : index + 1;
  }

  fail(message: string, tok: Token = this.peek()): never {
    const found = tok.kind === 'eof' ? 'end of input' : `'${tok.text}'`;
    throw new ParseError(`${message}, found ${found}`, { file: this.fileName, line: tok.line, column: tok.column });
  }

  expectPunct(text: string): Token {
    if (!isPunct(this.peek(), text)) this.fail(`expected '${text}'`);
    return this.next();
  }

  expectIdent(text?: string): Token {
    if (!isIdent(this.peek(), text)) this.fail(text ? `expected '${text}'` : 'expected an identifier');
    return this.next();
  }

  /**
   * First index in [from, to) whose token satisfies `match` outside any nested
   * group, or -1.
   */
  findTopLevel(from: number, to: number, match: (tok: Token, index: number) => boolean, opts: ScanOptions = {}): number {
    let angle = 0;
    let i = from;
    while (i < to) {
      const tok = this.tokens[i];
      if (angle === 0 && match(tok, i)) return i;
      if (this.isOpener(i)) {
        i = this.partnerOf(i) + 1;
        continue;
      }
      if (opts.angles && tok.kind === 'punct') angle = Math.max(0, angle + angleDelta(tok.text));
      i++;
    }
    return -1;
  }

  /** Split [from, to) at top-level commas. A trailing empty segment is omitted. */
  splitTopLevel(from: number, to: number, opts: ScanOptions = {}): Segment[] {
    const segments: Segment[] = [];
    let segStart = from;
    let cursor = from;
    while (cursor < to) {
      const comma = this.findTopLevel(cursor, to, (tok) => isPunct(tok, ','), opts);
      if (comma < 0) break;
      segments.push({ from: segStart, to: comma, comma });
      segStart = comma + 1;
      cursor = comma + 1;
    }
    if (segStart < to) segments.push({ from: segStart, to, comma: -1 });
    return segments;
  }

  /** Index just past a `<…>` generic list starting at `index`. */
  skipAngles(index: number): number {
    let depth = 0;
    let i = index;
    while (i < this.eofIndex) {
      const tok = this.tokens[i];
      if (this.isOpener(i)) {
        i = this.partnerOf(i) + 1;
        continue;
      }
      if (this.isCloser(i)) this.fail("unterminated '<'", tok);
      if (tok.kind === 'punct') depth += angleDelta(tok.text);
      i++;
      if (depth <= 0) return i;
    }
    return this.fail("unterminated '<'", this.at(index));
  }
}

function angleDelta(text: string): number {
  switch (text) {
    case '<':
      return 1;
    case '<<':
      return 2;
    case '>':
      return -1;
    case '>>':
      return -2;
    default:
      return 0;
  }
}

/** The token before `index` is a path separator or field access, so `index` is not a keyword. */
export function isMemberPosition(p: Parser, index: number): boolean {
  const prev = p.at(index - 1);
  return index > 0 && prev.kind === 'punct' && (prev.text === '.' || prev.text === '::');
}

/**
 * `Ghost<T>` and `Tracked<T>` type roots, behind any references. Returns the
 * qualifier the wrapper implies, or `null` for ordinary types.
 */
export function ghostWrapperQualifier(typeTokens: readonly Token[]): 'ghost' | 'tracked' | null {
  let i = 0;
  while (i < typeTokens.length) {
    const tok = typeTokens[i];
    if (isPunct(tok, '&') || isPunct(tok, '&&') || isIdent(tok, 'mut') || tok.kind === 'lifetime') i++;
    else break;
  }
  let last: Token | null = null;
  while (i < typeTokens.length) {
    const tok = typeTokens[i];
    if (isIdent(tok)) last = tok;
    else if (!isPunct(tok, '::')) break;
    i++;
  }
  if (!last || (i < typeTokens.length && !isPunct(typeTokens[i], '<'))) return null;
  if (last.text === 'Ghost') return 'ghost';
  if (last.text === 'Tracked') return 'tracked';
  return null;
}
