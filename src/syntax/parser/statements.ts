import type { Anchored, Attribute, Block, Qualifier, Statement } from '../../model/ast';
import { GHOST_WRAPPERS } from '../keywords';
import { isIdent, isPunct } from '../token';
import { classifyExpression } from './classify';
import { loopBodyIndex, parseExprParts } from './expressions';
import { isInnerAttributeAt, isItemStartAt, parseItem, parseOuterAttributes } from './items';
import { ghostWrapperQualifier, type Parser } from './parser';

/** Positioned on `{`; leaves the cursor after the matching `}`. */
export function parseBlock(p: Parser): Block {
  const openIndex = p.pos;
  const closeIndex = p.partnerOf(openIndex);
  const open = p.expectPunct('{');
  const stmts: Statement[] = [];
  while (p.pos < closeIndex) stmts.push(parseStatement(p, closeIndex));
  p.pos = closeIndex;
  return { open, stmts, close: p.next() };
}

export function parseBlockAt(p: Parser, index: number): Block {
  const saved = p.pos;
  p.pos = index;
  const block = parseBlock(p);
  p.pos = saved;
  return block;
}

function parseStatement(p: Parser, end: number): Statement {
  const start = p.peek();
  const anchor: Anchored = { leading: start.leading, start };

  if (isPunct(start, ';')) return { kind: 'other', ...anchor, tokens: [p.next()] };
  if (isInnerAttributeAt(p, p.pos)) {
    const close = p.partnerOf(p.pos + 2);
    const tokens = p.slice(p.pos, close + 1);
    p.pos = close + 1;
    return { kind: 'other', ...anchor, tokens };
  }
  if (isItemStartAt(p, p.pos)) return { kind: 'item', ...anchor, item: parseItem(p) };

  const attrs = parseOuterAttributes(p);
  if (isIdent(p.peek(), 'let')) return parseBinding(p, anchor, attrs, end);

  const macro = macroStatementEnd(p, p.pos, end);
  if (macro) {
    const tokens = p.slice(p.pos, macro.end);
    p.pos = macro.end;
    return { kind: 'macro', ...anchor, attrs, name: macro.name, tokens };
  }

  const from = p.pos;
  const exprEnd = expressionEnd(p, from, end);
  const parts = parseExprParts(p, from, exprEnd);
  p.pos = exprEnd;
  const semi = p.pos < end && isPunct(p.peek(), ';') ? p.next() : null;
  return { kind: 'expression', ...anchor, attrs, expr: { form: classifyExpression(parts), parts }, semi };
}

function parseBinding(p: Parser, anchor: Anchored, attrs: Attribute[], end: number): Statement {
  const letIndex = p.pos;
  const semi = p.findTopLevel(letIndex, end, (tok) => isPunct(tok, ';'));
  if (semi < 0) return p.fail("expected ';' after let binding", p.at(end));
  const qualifier = bindingQualifier(p, letIndex, semi);
  const parts = parseExprParts(p, letIndex, semi + 1);
  p.pos = semi + 1;
  return { kind: 'binding', ...anchor, attrs, qualifier, parts };
}

/** `let ghost x`, `let tracked t`, `let g: Ghost<T> = …`, `let g = Ghost(…)`. */
function bindingQualifier(p: Parser, letIndex: number, semi: number): Qualifier {
  const kw = p.at(letIndex + 1);
  const after = p.at(letIndex + 2);
  if ((isIdent(kw, 'ghost') || isIdent(kw, 'tracked')) && letIndex + 2 < semi && !isPunct(after, ':') && !isPunct(after, '=')) {
    return kw.text === 'ghost' ? 'ghost' : 'tracked';
  }
  const eq = p.findTopLevel(letIndex + 1, semi, (tok) => isPunct(tok, '='));
  const patternEnd = eq < 0 ? semi : eq;
  const colon = p.findTopLevel(letIndex + 1, patternEnd, (tok) => isPunct(tok, ':'));
  const annotated = colon < 0 ? null : ghostWrapperQualifier(p.slice(colon + 1, patternEnd));
  if (annotated) return annotated;
  if (eq < 0) return 'exec';
  const init = p.at(eq + 1);
  if (isIdent(init) && GHOST_WRAPPERS.has(init.text) && (isPunct(p.at(eq + 2), '(') || isPunct(p.at(eq + 2), '::'))) {
    return init.text === 'Ghost' ? 'ghost' : 'tracked';
  }
  return 'exec';
}

/**
 * A macro invocation in statement position: `path!{…}` optionally followed
 * by `;`, or `path!(…)`/`path![…]` followed by `;` or ending the block.
 */
function macroStatementEnd(p: Parser, from: number, end: number): { name: string; end: number } | null {
  let i = from;
  if (isPunct(p.at(i), '::')) i++;
  if (!isIdent(p.at(i))) return null;
  let name = p.at(i).text;
  i++;
  while (isPunct(p.at(i), '::') && isIdent(p.at(i + 1))) {
    name = p.at(i + 1).text;
    i += 2;
  }
  if (!isPunct(p.at(i), '!') || !p.isOpener(i + 1)) return null;
  const braced = p.at(i + 1).text === '{';
  const after = p.partnerOf(i + 1) + 1;
  if (after < end && isPunct(p.at(after), ';')) return { name, end: after + 1 };
  if (braced || after >= end) return { name, end: after };
  return null;
}

/** Exclusive end of the expression that starts a statement at `from`, before any `;`. */
function expressionEnd(p: Parser, from: number, end: number): number {
  const blockLike = blockLikeEnd(p, from, end);
  if (blockLike >= 0) return blockLike;

  const first = p.at(from);
  if (isIdent(first, 'assert') && isPunct(p.at(from + 1), '(')) {
    const after = p.partnerOf(from + 1) + 1;
    if (after < end && isIdent(p.at(after), 'by')) return byClauseEnd(p, after + 1, end);
  }
  if (isIdent(first, 'assert') && isIdent(p.at(from + 1), 'forall')) {
    const by = p.findTopLevel(from + 2, end, (tok) => isIdent(tok, 'by') || isPunct(tok, ';'));
    if (by >= 0 && isIdent(p.at(by), 'by')) return byClauseEnd(p, by + 1, end);
  }

  const semi = p.findTopLevel(from, end, (tok) => isPunct(tok, ';'));
  return semi < 0 ? end : semi;
}

/** After `by`: an optional `(solver)`, optional clauses, then a `{…}` proof or nothing. */
function byClauseEnd(p: Parser, from: number, end: number): number {
  const j = isPunct(p.at(from), '(') ? p.partnerOf(from) + 1 : from;
  const stop = p.findTopLevel(j, end, (tok) => isPunct(tok, '{') || isPunct(tok, ';'));
  if (stop < 0) return end;
  return isPunct(p.at(stop), '{') ? p.partnerOf(stop) + 1 : stop;
}

/**
 * Statements that end with a block and need no `;`: `if`/`else` chains,
 * `match`, loops, `unsafe {}`, bare and labeled blocks, `proof {}`.
 * Returns -1 for any other statement.
 */
function blockLikeEnd(p: Parser, i: number, end: number): number {
  const tok = p.at(i);
  if (isPunct(tok, '{')) return p.partnerOf(i) + 1;
  if (tok.kind === 'lifetime' && isPunct(p.at(i + 1), ':')) return blockLikeEnd(p, i + 2, end);
  if (!isIdent(tok)) return -1;
  switch (tok.text) {
    case 'if':
      return ifChainEnd(p, i, end);
    case 'match': {
      const brace = p.findTopLevel(i + 1, end, (t) => isPunct(t, '{'));
      return brace < 0 ? -1 : p.partnerOf(brace) + 1;
    }
    case 'while':
    case 'for':
    case 'loop': {
      const loop = loopBodyIndex(p, i, end);
      return loop ? p.partnerOf(loop.body) + 1 : -1;
    }
    case 'unsafe':
    case 'const':
    case 'proof':
      return isPunct(p.at(i + 1), '{') ? p.partnerOf(i + 1) + 1 : -1;
    case 'async': {
      const j = isIdent(p.at(i + 1), 'move') ? i + 2 : i + 1;
      return isPunct(p.at(j), '{') ? p.partnerOf(j) + 1 : -1;
    }
    default:
      return -1;
  }
}

function ifChainEnd(p: Parser, i: number, end: number): number {
  let kw = i;
  for (;;) {
    const body = p.findTopLevel(kw + 1, end, (tok) => isPunct(tok, '{'));
    if (body < 0) return p.fail("expected '{' after if condition", p.at(kw));
    const after = p.partnerOf(body) + 1;
    if (after >= end || !isIdent(p.at(after), 'else')) return after;
    if (isIdent(p.at(after + 1), 'if')) {
      kw = after + 1;
      continue;
    }
    if (!isPunct(p.at(after + 1), '{')) return p.fail("expected '{' after else", p.at(after + 1));
    return p.partnerOf(after + 1) + 1;
  }
}
