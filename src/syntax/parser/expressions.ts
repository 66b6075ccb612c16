import type { ExprPart } from '../../model/ast';
import { BLOCK_PREFIX_KEYWORDS, CONTRACT_KEYWORDS, LOOP_SPEC_KEYWORDS, RUST_KEYWORDS } from '../keywords';
import { isIdent, isPunct, type Token } from '../token';
import { findBodyStart } from './contract';
import { isMemberPosition, type Parser } from './parser';
import { namedReturn } from './signature';
import { parseBlockAt } from './statements';

/**
 * Whether a `{` following `prev` opens a block. After a path or a generic
 * argument list it is a struct literal instead.
 */
function braceOpensBlock(prev: Token | null): boolean {
  if (!prev) return true;
  if (prev.kind === 'ident') return RUST_KEYWORDS.has(prev.text) || BLOCK_PREFIX_KEYWORDS.has(prev.text) || prev.text === 'by';
  if (prev.kind === 'punct') return prev.text !== '>';
  return true;
}

/** Keywords after which a `|` opens closure parameters. */
const CLOSURE_PREFIXES = new Set(['move', 'async', 'return', 'break', 'in']);

/** Punctuation after which a `|` is a bitwise or. */
const OPERAND_ENDERS = new Set([')', ']', '}', '?', '@', '>']);

function opensClosure(prev: Token | null): boolean {
  if (!prev) return true;
  if (prev.kind === 'ident') return CLOSURE_PREFIXES.has(prev.text);
  if (prev.kind === 'punct') return !OPERAND_ENDERS.has(prev.text);
  return false;
}

function isClosureClause(p: Parser, tok: Token, index: number): boolean {
  return isIdent(tok) && CONTRACT_KEYWORDS.has(tok.text) && !isMemberPosition(p, index);
}

/** Tokens and groups in [from, to), without looking for control flow or closures at this level. */
function pushTrees(p: Parser, from: number, to: number, parts: ExprPart[]): void {
  let i = from;
  while (i < to) {
    if (p.isOpener(i)) {
      const close = p.partnerOf(i);
      parts.push({ kind: 'group', open: p.at(i), parts: parseExprParts(p, i + 1, close), close: p.at(close) });
      i = close + 1;
    } else {
      parts.push({ kind: 'token', token: p.at(i) });
      i++;
    }
  }
}

/**
 * A closure at `i` whose body is a block after a return type or clauses:
 * `|x: u32| -> u32 { … }`, `|x| -> (r: u32) requires x < 10 { … }`. Pushes
 * its parts and returns the index after the body, or -1 for any other closure.
 */
function closureWithBody(p: Parser, i: number, to: number, parts: ExprPart[]): number {
  const bar = isPunct(p.at(i), '||') ? i : p.findTopLevel(i + 1, to, (tok) => isPunct(tok, '|'));
  if (bar < 0) return -1;
  const paramsEnd = bar + 1;

  let retEnd = paramsEnd;
  if (isPunct(p.at(paramsEnd), '->')) {
    retEnd = p.findTopLevel(paramsEnd + 1, to, (tok, k) => isPunct(tok, '{') || isClosureClause(p, tok, k), { angles: true });
    if (retEnd <= paramsEnd + 1) return -1;
  } else if (!isClosureClause(p, p.at(paramsEnd), paramsEnd)) {
    return -1;
  }
  const hasSpec = isClosureClause(p, p.at(retEnd), retEnd);
  const body = hasSpec ? findBodyStart(p, retEnd, to) : retEnd;
  if (!isPunct(p.at(body), '{')) return p.fail('expected closure body', p.at(body));

  pushTrees(p, i, paramsEnd, parts);
  if (retEnd > paramsEnd) {
    const ret = { arrow: p.at(paramsEnd), tokens: p.slice(paramsEnd + 1, retEnd), named: namedReturn(p, paramsEnd + 1, retEnd) };
    parts.push({ kind: 'closure-return', ret });
  }
  if (hasSpec) parts.push({ kind: 'closure-spec', tokens: p.slice(retEnd, body) });
  parts.push({ kind: 'block', block: parseBlockAt(p, body) });
  return p.partnerOf(body) + 1;
}

/**
 * Loop header layout from the `while`/`for`/`loop` keyword at `kwIndex`:
 * where the loop specification starts (or -1) and where the body opens.
 */
export function loopBodyIndex(p: Parser, kwIndex: number, end: number): { specStart: number; body: number } | null {
  if (isIdent(p.at(kwIndex), 'for') && isPunct(p.at(kwIndex + 1), '<')) return null;
  let i = kwIndex + 1;
  while (i < end) {
    const tok = p.at(i);
    if (isIdent(tok) && LOOP_SPEC_KEYWORDS.has(tok.text) && !isMemberPosition(p, i)) {
      const body = findBodyStart(p, i, end);
      if (!isPunct(p.at(body), '{')) return p.fail('expected loop body', p.at(body));
      return { specStart: i, body };
    }
    if (isPunct(tok, '{')) return { specStart: -1, body: i };
    i = p.skipTree(i);
  }
  return null;
}

/**
 * Split the expression tokens in [from, to) into parts. Nested blocks become
 * statement lists so that ghost code inside them can be removed.
 */
export function parseExprParts(p: Parser, from: number, to: number): ExprPart[] {
  const parts: ExprPart[] = [];
  let prev: Token | null = null;
  let i = from;
  while (i < to) {
    const tok = p.at(i);
    if (isIdent(tok) && !isMemberPosition(p, i)) {
      const next = controlFlow(p, i, to, parts);
      if (next >= 0) {
        i = next;
        prev = p.at(i - 1);
        continue;
      }
    }
    if ((isPunct(tok, '|') || isPunct(tok, '||')) && opensClosure(prev)) {
      const next = closureWithBody(p, i, to, parts);
      if (next >= 0) {
        i = next;
        prev = p.at(i - 1);
        continue;
      }
    }
    if (p.isOpener(i)) {
      const close = p.partnerOf(i);
      if (tok.text === '{' && braceOpensBlock(prev)) {
        parts.push({ kind: 'block', block: parseBlockAt(p, i) });
      } else {
        parts.push({ kind: 'group', open: tok, parts: parseExprParts(p, i + 1, close), close: p.at(close) });
      }
      i = close + 1;
      prev = p.at(close);
      continue;
    }
    parts.push({ kind: 'token', token: tok });
    prev = tok;
    i++;
  }
  return parts;
}

/** Parts for `if`, `match`, loops and `proof {}` at `i`; returns the index after them, or -1. */
function controlFlow(p: Parser, i: number, to: number, parts: ExprPart[]): number {
  const kw = p.at(i);
  switch (kw.text) {
    case 'if':
    case 'match': {
      const brace = p.findTopLevel(i + 1, to, (tok) => isPunct(tok, '{'));
      if (brace < 0) return -1;
      const close = p.partnerOf(brace);
      parts.push({ kind: 'token', token: kw }, ...parseExprParts(p, i + 1, brace));
      if (kw.text === 'if') parts.push({ kind: 'block', block: parseBlockAt(p, brace) });
      else parts.push({ kind: 'group', open: p.at(brace), parts: parseExprParts(p, brace + 1, close), close: p.at(close) });
      return close + 1;
    }
    case 'while':
    case 'for':
    case 'loop': {
      const loop = loopBodyIndex(p, i, to);
      if (!loop) return -1;
      const headerEnd = loop.specStart >= 0 ? loop.specStart : loop.body;
      parts.push({ kind: 'token', token: kw }, ...parseExprParts(p, i + 1, headerEnd));
      if (loop.specStart >= 0) parts.push({ kind: 'loop-spec', tokens: p.slice(loop.specStart, loop.body) });
      parts.push({ kind: 'block', block: parseBlockAt(p, loop.body) });
      return p.partnerOf(loop.body) + 1;
    }
    case 'proof':
      if (!isPunct(p.at(i + 1), '{') || i + 1 >= to) return -1;
      parts.push({ kind: 'token', token: kw }, { kind: 'block', block: parseBlockAt(p, i + 1) });
      return p.partnerOf(i + 1) + 1;
    default:
      return -1;
  }
}
