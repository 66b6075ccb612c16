import { ParseError } from '../../errors/stripErrors';
import { tokenize } from '../lexer';

function texts(source: string): string[] {
  return tokenize(source).tokens.map((t) => t.text);
}

describe('tokenize', () => {
  test('splits a function into tokens and ends with eof', () => {
    const { tokens } = tokenize('fn main() {}');
    expect(tokens.map((t) => t.text)).toEqual(['fn', 'main', '(', ')', '{', '}', '']);
    expect(tokens[tokens.length - 1].kind).toBe('eof');
  });

  test('pairs delimiters both ways', () => {
    const { partner } = tokenize('f(a[0]) {}');
    expect(Array.from(partner)).toEqual([-1, 6, -1, 5, -1, 3, 1, 8, 7, -1]);
  });

  test('keeps same-line comments as trailing trivia', () => {
    const [a, b] = tokenize('a // note\nb').tokens;
    expect(a.trailing).toBe(' // note');
    expect(b.leading).toBe('\n');
  });

  test('leaves trailing whitespace to the next token', () => {
    const [a, b] = tokenize('a  \n  b').tokens;
    expect(a.trailing).toBe('');
    expect(b.leading).toBe('  \n  ');
  });

  test('a multi-line block comment belongs to the following token', () => {
    const [a, b] = tokenize('a /* one\ntwo */ b').tokens;
    expect(a.trailing).toBe('');
    expect(b.leading).toBe(' /* one\ntwo */ ');
  });

  test('recognises Verus operators', () => {
    expect(texts('a ==> b <==> c <== d &&& e ||| f =~= g')).toEqual([
      'a', '==>', 'b', '<==>', 'c', '<==', 'd', '&&&', 'e', '|||', 'f', '=~=', 'g', '',
    ]);
  });

  test('distinguishes character literals from lifetimes', () => {
    const tokens = tokenize("'a' 'b x '\\n'").tokens;
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ['literal', "'a'"],
      ['lifetime', "'b"],
      ['ident', 'x'],
      ['literal', "'\\n'"],
      ['eof', ''],
    ]);
  });

  test('reads raw and byte strings as single literals', () => {
    expect(texts('r#"a "quoted" b"# b"xy" br"z"')).toEqual(['r#"a "quoted" b"#', 'b"xy"', 'br"z"', '']);
  });

  test('does not swallow a range after an integer', () => {
    expect(texts('0..10 1.5 x.0')).toEqual(['0', '..', '10', '1.5', 'x', '.', '0', '']);
  });

  test('tracks lines and columns', () => {
    const [, main] = tokenize('fn\n  main').tokens;
    expect([main.line, main.column]).toEqual([2, 3]);
  });

  test('reports an unclosed delimiter with its position', () => {
    expect(() => tokenize('fn f() {', 'lib.rs')).toThrow(new ParseError("unclosed delimiter '{'", { file: 'lib.rs', line: 1, column: 8 }));
  });

  test('reports a mismatched delimiter', () => {
    expect(() => tokenize('(]')).toThrow("<string>:1:2: mismatched closing delimiter ']' for '(' opened at 1:1");
  });

  test('rejects an unterminated string', () => {
    expect(() => tokenize('"abc')).toThrow('<string>:1:1: unterminated string literal');
  });
});
