import type { ContractClauses, ExprFragment, InvariantSpec } from '../../model/ast';
import { BLOCK_PREFIX_KEYWORDS, CONTRACT_KEYWORDS } from '../keywords';
import { isIdent, isPunct, type Token } from '../token';
import { isMemberPosition, type Parser } from './parser';

/** Keywords whose own `{` follows later in the same clause expression. */
const BRACE_TAKING = new Set(['if', 'match', 'while', 'for']);

/** Punctuation after which an expression is complete. */
const EXPRESSION_ENDERS = new Set([')', ']', '}', '?', ',', ';', '>', '@']);

function continuesExpression(prev: Token | null): boolean {
  if (!prev) return true;
  if (prev.kind === 'punct') return !EXPRESSION_ENDERS.has(prev.text);
  if (prev.kind !== 'ident') return false;
  if (prev.text === 'no_unwind') return false;
  return CONTRACT_KEYWORDS.has(prev.text) || BLOCK_PREFIX_KEYWORDS.has(prev.text) || prev.text === 'via' || prev.text === 'when';
}

/**
 * Index of the `{` (or `;`) that ends a clause region starting at `from`.
 * A `{` that continues an expression, such as a closure body or the branch of
 * an `if`, belongs to the clause.
 */
export function findBodyStart(p: Parser, from: number, end = p.eofIndex): number {
  let pending = 0;
  let prev: Token | null = null;
  let i = from;
  while (i < end && !p.isCloser(i)) {
    const tok = p.at(i);
    if (isPunct(tok, ';')) return i;
    if (isPunct(tok, '{')) {
      if (pending > 0) pending--;
      else if (!continuesExpression(prev)) return i;
    } else if (isIdent(tok) && BRACE_TAKING.has(tok.text) && !isMemberPosition(p, i)) {
      pending++;
    }
    i = p.skipTree(i);
    prev = p.at(i - 1);
  }
  return p.fail('expected function body', p.at(i));
}

/** Positioned on the first clause keyword; leaves the cursor on the body `{` or `;`. */
export function parseContract(p: Parser): ContractClauses {
  const from = p.pos;
  const to = findBodyStart(p, from);
  p.pos = to;

  const boundaries: number[] = [];
  for (let i = from; i < to; i = p.skipTree(i)) {
    const tok = p.at(i);
    if (isIdent(tok) && CONTRACT_KEYWORDS.has(tok.text) && !isMemberPosition(p, i)) boundaries.push(i);
  }

  const clauses: ContractClauses = { tokens: p.slice(from, to) };
  boundaries.forEach((kwIndex, n) => {
    const bodyFrom = kwIndex + 1;
    const bodyTo = n + 1 < boundaries.length ? boundaries[n + 1] : to;
    switch (p.at(kwIndex).text) {
      case 'requires':
        clauses.requires = [...(clauses.requires ?? []), ...fragments(p, bodyFrom, bodyTo)];
        break;
      case 'ensures':
        clauses.ensures = [...(clauses.ensures ?? []), ...fragments(p, bodyFrom, bodyTo)];
        break;
      case 'default_ensures':
        clauses.defaultEnsures = [...(clauses.defaultEnsures ?? []), ...fragments(p, bodyFrom, bodyTo)];
        break;
      case 'returns':
        clauses.returns = [...(clauses.returns ?? []), ...fragments(p, bodyFrom, bodyTo)];
        break;
      case 'decreases':
        clauses.decreases = [...(clauses.decreases ?? []), ...fragments(p, bodyFrom, bodyTo)];
        break;
      case 'recommends': {
        const via = p.findTopLevel(bodyFrom, bodyTo, (tok) => isIdent(tok, 'via'));
        clauses.recommends = {
          exprs: [...(clauses.recommends?.exprs ?? []), ...fragments(p, bodyFrom, via < 0 ? bodyTo : via)],
          via: via < 0 ? clauses.recommends?.via : withoutTrailingComma(p.slice(via + 1, bodyTo)),
        };
        break;
      }
      case 'opens_invariants':
        clauses.invariants = invariantSpec(p, bodyFrom, bodyTo);
        break;
      case 'no_unwind': {
        const when = p.findTopLevel(bodyFrom, bodyTo, (tok) => isIdent(tok, 'when'));
        clauses.unwind = when < 0 ? {} : { when: withoutTrailingComma(p.slice(when + 1, bodyTo)) };
        break;
      }
    }
  });
  return clauses;
}

function fragments(p: Parser, from: number, to: number): ExprFragment[] {
  return p
    .splitTopLevel(from, to)
    .map((seg) => p.slice(seg.from, seg.to))
    .filter((frag) => frag.length > 0);
}

function withoutTrailingComma(tokens: Token[]): ExprFragment {
  const last = tokens[tokens.length - 1];
  return isPunct(last, ',') ? tokens.slice(0, -1) : tokens;
}

function invariantSpec(p: Parser, from: number, to: number): InvariantSpec {
  const tokens = withoutTrailingComma(p.slice(from, to));
  if (tokens.length === 1 && isIdent(tokens[0], 'any')) return { kind: 'any' };
  if (tokens.length === 1 && isIdent(tokens[0], 'none')) return { kind: 'none' };
  if (isPunct(p.at(from), '[') && p.partnerOf(from) === from + tokens.length - 1) {
    return { kind: 'list', exprs: fragments(p, from + 1, from + tokens.length - 1) };
  }
  return { kind: 'set', expr: tokens };
}
