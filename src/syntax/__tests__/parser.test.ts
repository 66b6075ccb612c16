import type { FunctionItem, Item, Statement, StructItem } from '../../model/ast';
import { parseProgram } from '../parser';
import { tokensToInlineText } from '../token';

function firstItem(source: string): Item {
  const [item] = parseProgram(source).items;
  if (!item) throw new Error('no item parsed');
  return item;
}

function fn(source: string): FunctionItem {
  const item = firstItem(source);
  if (item.kind !== 'function') throw new Error(`expected a function, got ${item.kind}`);
  return item;
}

function struct(source: string): StructItem {
  const item = firstItem(source);
  if (item.kind !== 'struct') throw new Error(`expected a struct, got ${item.kind}`);
  return item;
}

function bodyOf(source: string): Statement[] {
  const body = fn(source).body;
  if (!body) throw new Error('function has no body');
  return body.stmts;
}

describe('parseProgram: function modes', () => {
  test.each([
    ['fn f() {}', null],
    ['exec fn f() {}', 'exec'],
    ['spec fn f() -> int { 1 }', 'spec'],
    ['pub open spec fn f() -> int { 1 }', 'spec'],
    ['spec(checked) fn f() -> bool { true }', 'spec-checked'],
    ['proof fn lemma() {}', 'proof'],
    ['axiom fn ax();', 'proof-axiom'],
  ])('%s', (source, mode) => {
    expect(fn(source).head.mode).toBe(mode);
  });

  test('records visibility and keeps Rust qualifiers out of the mode', () => {
    const f = fn('pub const unsafe fn f() {}');
    expect(f.head.visibility).toBe('public');
    expect(f.head.tokens.map((t) => [t.token.text, t.role])).toEqual([
      ['pub', 'visibility'],
      ['const', 'qualifier'],
      ['unsafe', 'qualifier'],
    ]);
  });
});

describe('parseProgram: signatures', () => {
  test('classifies parameters by qualifier and wrapper type', () => {
    const f = fn('fn f(x: u32, tracked t: Perm, Ghost(g): Ghost<int>, h: Tracked<Token>, r: &Vec<u8>) {}');
    expect(f.params.params.map((p) => p.node.qualifier)).toEqual(['exec', 'tracked', 'ghost', 'tracked', 'exec']);
  });

  test('marks the receiver', () => {
    const f = fn('fn f(&mut self, x: u32) {}');
    expect(f.params.params.map((p) => p.node.receiver)).toEqual([true, false]);
  });

  test('detects a named return', () => {
    const f = fn('fn f() -> (r: u32) { 0 }');
    expect(f.ret?.named?.name.text).toBe('r');
    expect(f.ret?.named?.type.map((t) => t.text)).toEqual(['u32']);
  });

  test('a parenthesised tuple type is not a named return', () => {
    expect(fn('fn f() -> (u32, u64) { (0, 0) }').ret?.named).toBeNull();
  });

  test('splits contract clauses at top-level commas', () => {
    const f = fn('fn f(x: u32) -> u32 requires x > 0, g(x, 1) < 10 ensures x > 0 { x }');
    expect(f.contract.requires?.map(tokensToInlineText)).toEqual(['x > 0', 'g(x, 1) < 10']);
    expect(f.contract.ensures?.map(tokensToInlineText)).toEqual(['x > 0']);
    expect(f.body?.stmts).toHaveLength(1);
  });

  test('keeps the braces of an if expression inside the clause', () => {
    const f = fn('fn f(a: bool) ensures if a { 1 } else { 2 } > 0 { }');
    expect(f.contract.ensures?.map(tokensToInlineText)).toEqual(['if a { 1 } else { 2 } > 0']);
    expect(f.body?.stmts).toEqual([]);
  });

  test('parses every clause kind', () => {
    const f = fn(
      'fn f() requires a, b recommends c via d ensures e default_ensures g returns h opens_invariants [1, 2] no_unwind when k decreases n { }',
    );
    expect(f.contract.recommends?.exprs.map(tokensToInlineText)).toEqual(['c']);
    expect(f.contract.recommends?.via && tokensToInlineText(f.contract.recommends.via)).toBe('d');
    expect(f.contract.defaultEnsures?.map(tokensToInlineText)).toEqual(['g']);
    expect(f.contract.returns?.map(tokensToInlineText)).toEqual(['h']);
    expect(f.contract.invariants).toEqual({ kind: 'list', exprs: [expect.any(Array), expect.any(Array)] });
    expect(f.contract.unwind?.when?.map((t) => t.text)).toEqual(['k']);
    expect(f.contract.decreases?.map(tokensToInlineText)).toEqual(['n']);
  });

  test('a body-less declaration ends at the semicolon after its clauses', () => {
    const f = fn('fn area(&self) -> u64 ensures result > 0;');
    expect(f.body).toBeNull();
    expect(f.semi?.text).toBe(';');
    expect(f.contract.ensures?.map(tokensToInlineText)).toEqual(['result > 0']);
  });
});

describe('parseProgram: data types and declarations', () => {
  test('classifies struct fields', () => {
    const s = struct('struct S { a: u32, ghost b: int, tracked c: Perm, d: Ghost<int>, pub ghost: u8 }');
    expect(s.fields?.fields.map((f) => f.node.qualifier)).toEqual(['exec', 'ghost', 'tracked', 'ghost', 'exec']);
  });

  test('parses tuple and unit structs', () => {
    expect(struct('struct P(u32, Ghost<int>);').fields?.fields.map((f) => f.node.qualifier)).toEqual(['exec', 'ghost']);
    expect(struct('struct U;').fields).toBeNull();
  });

  test.each([
    ['use vstd::prelude::*;', true],
    ['use ::builtin::*;', true],
    ['broadcast use lemma_a;', true],
    ['broadcast group g { lemma_a, lemma_b }', true],
    ['spec const LIMIT: int = 10;', true],
    ['global size_of usize == 8;', true],
    ['global layout Pair is size == 16, align == 8;', true],
    ['use std::vec::Vec;', false],
    ['const LIMIT: u32 = 10;', false],
  ])('%s is ghost: %s', (source, ghost) => {
    const item = firstItem(source);
    expect(item.kind).toBe('opaque');
    expect(item.kind === 'opaque' && item.ghost).toBe(ghost);
  });

  test('flags verifier attributes', () => {
    const f = fn('#[verifier::external_body]\n#[inline]\nfn f() {}');
    expect(f.head.attrs.map((a) => a.verifierOnly)).toEqual([true, false]);
  });

  test('parses impl blocks as containers', () => {
    const item = firstItem('impl S {\n    spec fn v(&self) -> int { 0 }\n    fn get(&self) -> u32 { 1 }\n}');
    expect(item.kind).toBe('impl');
    expect(item.kind === 'impl' && item.items.map((i) => i.kind)).toEqual(['function', 'function']);
  });
});

describe('parseProgram: statements', () => {
  test('classifies ghost statements', () => {
    const stmts = bodyOf(
      'fn f() {\n    let ghost a = 1;\n    assert(true);\n    proof { }\n    x += 1;\n    a ==> b;\n    x@;\n    &&& a;\n    assert forall|i: int| i > 0 by { }\n    assume(false);\n}',
    );
    expect(stmts.map((s) => (s.kind === 'expression' ? s.expr.form.kind : s.kind))).toEqual([
      'binding',
      'assert',
      'ghost-unary',
      'opaque',
      'ghost-binary',
      'view',
      'big-and',
      'assert-forall',
      'assume',
    ]);
  });

  test('reads binding qualifiers', () => {
    const stmts = bodyOf(
      'fn f() {\n    let ghost a = 1;\n    let tracked t = x;\n    let g: Ghost<int> = y;\n    let h = Tracked(z);\n    let mut n = 0;\n}',
    );
    expect(stmts.map((s) => (s.kind === 'binding' ? s.qualifier : s.kind))).toEqual(['ghost', 'tracked', 'ghost', 'tracked', 'exec']);
  });

  test('separates a loop specification from the loop header and body', () => {
    const [loop] = bodyOf('fn f() {\n    while i < n\n        invariant i <= n,\n    {\n        i += 1;\n    }\n}');
    if (loop.kind !== 'expression') throw new Error('expected an expression statement');
    expect(loop.expr.parts.map((p) => p.kind)).toEqual(['token', 'token', 'token', 'token', 'loop-spec', 'block']);
  });

  test('treats macro invocations in statement position as macro statements', () => {
    const stmts = bodyOf('fn f() {\n    proof! { let a = 1; }\n    println!("{}", 1);\n}');
    expect(stmts.map((s) => (s.kind === 'macro' ? s.name : s.kind))).toEqual(['proof', 'println']);
  });
});

describe('parseProgram: errors', () => {
  test('reports the file and position of an unexpected token', () => {
    expect(() => parseProgram('let x = 1;', 'bad.rs')).toThrow("bad.rs:1:1: expected an item, found 'let'");
  });

  test('reports a missing function body', () => {
    expect(() => parseProgram('fn f()', 'bad.rs')).toThrow('bad.rs:1:7: expected function body, found end of input');
  });
});
