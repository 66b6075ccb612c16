import { ParseError } from '../errors/stripErrors';
import type { Token, TokenKind } from './token';

/** Longest first; Verus adds `==>`, `<==`, `<==>`, `&&&`, `|||`, `=~=`, `=~~=`. */
const MULTI_CHAR_PUNCT = [
  '<==>',
  '=~~=',
  '<==',
  '==>',
  '&&&',
  '|||',
  '=~=',
  '<<=',
  '>>=',
  '...',
  '..=',
  '::',
  '->',
  '=>',
  '==',
  '!=',
  '<=',
  '>=',
  '&&',
  '||',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '^=',
  '&=',
  '|=',
  '<<',
  '>>',
  '..',
];

const SINGLE_CHAR_PUNCT = new Set('+-*/%^!&|=<>@.,;:#$?~()[]{}'.split(''));

const IDENT_RE = /(?:r#)?[\p{ID_Start}_][\p{ID_Continue}]*/uy;
const NUMBER_RE =
  /(?:0x[0-9a-fA-F_]+|0o[0-7_]+|0b[01_]+|[0-9][0-9_]*(?:\.(?![.\p{ID_Start}_])[0-9_]*)?(?:[eE][+-]?[0-9_]+)?)(?:[\p{ID_Start}_][\p{ID_Continue}]*)?/uy;
const IDENT_START_RE = /[\p{ID_Start}_]/u;

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };
const CLOSERS = new Set([')', ']', '}']);

export type TokenStream = {
  /** Always ends with an `eof` token that carries the file's final trivia. */
  tokens: Token[];
  /** For each opening delimiter index, the index of its closing partner (and vice versa); -1 elsewhere. */
  partner: Int32Array;
};

/**
 * Rust lexer with Verus operators. Comments and whitespace are kept as trivia
 * on the tokens so that a printer can reproduce retained code verbatim.
 */
export class Lexer {
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(
    private readonly source: string,
    private readonly fileName = '<string>',
  ) {}

  tokenize(): TokenStream {
    const tokens: Token[] = [];
    let leading = this.readTrivia(false);

    while (this.pos < this.source.length) {
      const startOffset = this.pos;
      const startLine = this.line;
      const startColumn = this.column;
      const kind = this.readToken();
      const text = this.source.slice(startOffset, this.pos);
      const trailing = this.readTrivia(true);
      tokens.push({ kind, text, leading, trailing, offset: startOffset, line: startLine, column: startColumn });
      leading = this.readTrivia(false);
    }

    tokens.push({ kind: 'eof', text: '', leading, trailing: '', offset: this.pos, line: this.line, column: this.column });
    return { tokens, partner: this.pairDelimiters(tokens) };
  }

  private fail(message: string, line = this.line, column = this.column): never {
    throw new ParseError(message, { file: this.fileName, line, column });
  }

  private advance(count: number): void {
    for (let i = 0; i < count && this.pos < this.source.length; i++) {
      if (this.source[this.pos] === '\n') {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }

  private peek(offset = 0): string {
    return this.source.charAt(this.pos + offset);
  }

  /**
   * Leading trivia: any whitespace and comments. Trailing trivia: spaces and
   * comments on the current line, ending on the last comment.
   */
  private readTrivia(sameLineOnly: boolean): string {
    const start = this.pos;
    let committed = this.pos;
    while (this.pos < this.source.length) {
      const ch = this.peek();
      if (ch === '\n' && sameLineOnly) break;
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f' || ch === '\v' || ch === '\uFEFF') {
        this.advance(1);
        continue;
      }
      if (ch === '/' && this.peek(1) === '/') {
        while (this.pos < this.source.length && this.peek() !== '\n') this.advance(1);
        committed = this.pos;
        continue;
      }
      if (ch === '/' && this.peek(1) === '*') {
        const startLine = this.line;
        const commentStart = this.pos;
        this.skipBlockComment();
        if (sameLineOnly && this.line !== startLine) {
          // A multi-line comment belongs to whatever follows it.
          this.rewind(commentStart);
          break;
        }
        committed = this.pos;
        continue;
      }
      break;
    }
    if (!sameLineOnly) return this.source.slice(start, this.pos);
    this.rewind(committed);
    return this.source.slice(start, committed);
  }

  private rewind(offset: number): void {
    if (offset === this.pos) return;
    const consumed = this.source.slice(offset, this.pos);
    const newlines = consumed.split('\n').length - 1;
    this.pos = offset;
    if (newlines === 0) {
      this.column -= consumed.length;
      return;
    }
    this.line -= newlines;
    const lineStart = this.source.lastIndexOf('\n', offset - 1) + 1;
    this.column = offset - lineStart + 1;
  }

  /** Block comments nest in Rust. */
  private skipBlockComment(): void {
    const line = this.line;
    const column = this.column;
    let depth = 0;
    while (this.pos < this.source.length) {
      if (this.peek() === '/' && this.peek(1) === '*') {
        depth++;
        this.advance(2);
      } else if (this.peek() === '*' && this.peek(1) === '/') {
        depth--;
        this.advance(2);
        if (depth === 0) return;
      } else {
        this.advance(1);
      }
    }
    this.fail('unterminated block comment', line, column);
  }

  private readToken(): TokenKind {
    const ch = this.peek();

    if ((ch === 'r' || ch === 'b' || ch === 'c') && this.tryRawOrPrefixedLiteral()) return 'literal';
    if (ch === '"') {
      this.readQuoted('"');
      return 'literal';
    }
    if (ch === "'") return this.readQuoteOrLifetime();

    IDENT_RE.lastIndex = this.pos;
    const ident = IDENT_RE.exec(this.source);
    if (ident) {
      this.advance(ident[0].length);
      return 'ident';
    }

    if (ch >= '0' && ch <= '9') {
      NUMBER_RE.lastIndex = this.pos;
      const num = NUMBER_RE.exec(this.source);
      this.advance(num ? num[0].length : 1);
      return 'literal';
    }

    for (const p of MULTI_CHAR_PUNCT) {
      if (this.source.startsWith(p, this.pos)) {
        this.advance(p.length);
        return 'punct';
      }
    }
    if (SINGLE_CHAR_PUNCT.has(ch)) {
      this.advance(1);
      return 'punct';
    }
    return this.fail(`unexpected character ${JSON.stringify(ch)}`);
  }

  /** `r"…"`, `r#"…"#`, `b"…"`, `b'…'`, `br"…"`, `c"…"`, `cr#"…"#`. */
  private tryRawOrPrefixedLiteral(): boolean {
    const m = /^(b|c)?(r)?(#*)(["'])/.exec(this.source.slice(this.pos, this.pos + 260));
    if (!m || (!m[1] && !m[2])) return false;
    const [whole, prefix, raw, hashes, quote] = m;
    if (quote === "'") {
      if (prefix !== 'b' || raw) return false;
      this.advance(1);
      this.readQuoted("'");
      return true;
    }
    if (!raw) {
      if (hashes) return false;
      this.advance(prefix.length);
      this.readQuoted('"');
      return true;
    }
    const line = this.line;
    const column = this.column;
    const terminator = '"' + hashes;
    const end = this.source.indexOf(terminator, this.pos + whole.length);
    if (end < 0) this.fail('unterminated raw string literal', line, column);
    this.advance(end + terminator.length - this.pos);
    return true;
  }

  private readQuoted(quote: '"' | "'"): void {
    const line = this.line;
    const column = this.column;
    this.advance(1);
    while (this.pos < this.source.length) {
      const ch = this.peek();
      if (ch === '\\') {
        this.advance(2);
        continue;
      }
      this.advance(1);
      if (ch === quote) return;
    }
    this.fail(quote === '"' ? 'unterminated string literal' : 'unterminated character literal', line, column);
  }

  /** `'a'` and `'\n'` are characters; `'a` and `'static` are lifetimes or labels. */
  private readQuoteOrLifetime(): TokenKind {
    const next = this.peek(1);
    if (next === '\\') {
      this.readQuoted("'");
      return 'literal';
    }
    const cp = this.source.codePointAt(this.pos + 1);
    const width = cp !== undefined && cp > 0xffff ? 2 : 1;
    if (this.peek(1 + width) === "'") {
      this.advance(2 + width);
      return 'literal';
    }
    if (next !== '' && IDENT_START_RE.test(next)) {
      this.advance(1);
      IDENT_RE.lastIndex = this.pos;
      const ident = IDENT_RE.exec(this.source);
      this.advance(ident ? ident[0].length : 1);
      return 'lifetime';
    }
    return this.fail('unterminated character literal');
  }

  private pairDelimiters(tokens: Token[]): Int32Array {
    const partner = new Int32Array(tokens.length).fill(-1);
    const stack: number[] = [];
    tokens.forEach((tok, i) => {
      if (tok.kind !== 'punct') return;
      if (OPENERS[tok.text]) {
        stack.push(i);
        return;
      }
      if (!CLOSERS.has(tok.text)) return;
      const open = stack.pop();
      if (open === undefined) this.fail(`unmatched closing delimiter '${tok.text}'`, tok.line, tok.column);
      const opener = tokens[open];
      if (OPENERS[opener.text] !== tok.text) {
        this.fail(
          `mismatched closing delimiter '${tok.text}' for '${opener.text}' opened at ${opener.line}:${opener.column}`,
          tok.line,
          tok.column,
        );
      }
      partner[open] = i;
      partner[i] = open;
    });
    const unclosed = stack.pop();
    if (unclosed !== undefined) {
      const tok = tokens[unclosed];
      this.fail(`unclosed delimiter '${tok.text}'`, tok.line, tok.column);
    }
    return partner;
  }
}

export function tokenize(source: string, fileName?: string): TokenStream {
  return new Lexer(source, fileName).tokenize();
}
