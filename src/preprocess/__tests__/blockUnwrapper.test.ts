import { StructuralError } from '../../errors/stripErrors';
import { findMatchingBrace, findSpecBlocks, unwrapSpecBlocks } from '../blockUnwrapper';
import { isLifetimeQuote } from '../scannerState';

describe('findMatchingBrace', () => {
  test('ignores a brace inside a string literal', () => {
    expect(findMatchingBrace('{ "a { b" }', 0)).toBe(10);
  });

  test('ignores braces inside character literals', () => {
    const src = "{ let o = '{'; let c = '}'; }";
    expect(findMatchingBrace(src, 0)).toBe(src.length - 1);
  });

  test('ignores braces inside line and block comments', () => {
    const src = '{ // }\n /* { */ }';
    expect(findMatchingBrace(src, 0)).toBe(src.length - 1);
  });

  test('does not treat labels and lifetimes as character literals', () => {
    const src = "{ 'outer: loop { break 'outer; } let s: &'a str = x; }";
    expect(findMatchingBrace(src, 0)).toBe(src.length - 1);
  });

  test('honours escapes inside strings', () => {
    const src = '{ "\\"}" }';
    expect(findMatchingBrace(src, 0)).toBe(src.length - 1);
  });

  test('throws StructuralError when the brace is never closed', () => {
    expect(() => findMatchingBrace('{ fn f() { }', 0)).toThrow(StructuralError);
  });
});

describe('isLifetimeQuote', () => {
  test('quote followed by a letter is a lifetime or label', () => {
    expect(isLifetimeQuote("'a ", 0)).toBe(true);
    expect(isLifetimeQuote("'static", 0)).toBe(true);
  });

  test('quote, character, quote is a character literal', () => {
    expect(isLifetimeQuote("'a'", 0)).toBe(false);
    expect(isLifetimeQuote("'{'", 0)).toBe(false);
  });
});

describe('findSpecBlocks', () => {
  test('finds nested wrappers', () => {
    expect(findSpecBlocks('verus! { verus! { } }')).toEqual([
      { markerStart: 0, open: 7, close: 20 },
      { markerStart: 9, open: 16, close: 18 },
    ]);
  });

  test('skips markers inside strings and comments and as part of other names', () => {
    expect(findSpecBlocks('let s = "verus! {"; // verus! {\nmy_verus! { }')).toEqual([]);
  });

  test('skips a marker without a brace', () => {
    expect(findSpecBlocks('verus!(x);')).toEqual([]);
  });
});

describe('unwrapSpecBlocks', () => {
  test('blanks the wrapper and keeps every offset', () => {
    const src = 'verus! {\nfn f() {}\n}\n';
    const out = unwrapSpecBlocks(src);
    expect(out).toBe('        \nfn f() {}\n \n');
    expect(out.length).toBe(src.length);
  });

  test('returns text without wrappers unchanged', () => {
    expect(unwrapSpecBlocks('fn main() {}\n')).toBe('fn main() {}\n');
  });

  test('rejects an unbalanced wrapper', () => {
    expect(() => unwrapSpecBlocks('verus! {\nfn f() {\n}\n')).toThrow(
      'Unmatched braces in verus! block opened at offset 7',
    );
  });
});
