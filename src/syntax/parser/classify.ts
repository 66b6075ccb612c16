import type { ExprPart, ExpressionKind, GhostBinaryOp, GhostUnaryOp } from '../../model/ast';
import { isIdent, isPunct, type Token } from '../token';

const GHOST_BINARY_OPS = new Map<string, GhostBinaryOp>([
  ['==>', 'implies'],
  ['<==', 'implied-by'],
  ['<==>', 'equiv'],
]);

function quantifierOp(text: string): GhostUnaryOp | null {
  switch (text) {
    case 'forall':
      return 'forall';
    case 'exists':
      return 'exists';
    case 'choose':
      return 'choose';
    default:
      return null;
  }
}

function tokenOf(part: ExprPart | undefined): Token | undefined {
  return part?.kind === 'token' ? part.token : undefined;
}

function isParenGroup(part: ExprPart | undefined): boolean {
  return part?.kind === 'group' && part.open.text === '(';
}

/** `path!(…)` with nothing after it. */
function macroName(parts: ExprPart[]): string | null {
  const last = parts[parts.length - 1];
  const bang = tokenOf(parts[parts.length - 2]);
  if (last?.kind !== 'group' || !isPunct(bang, '!')) return null;
  let name: string | null = null;
  for (let i = 0; i < parts.length - 2; i++) {
    const tok = tokenOf(parts[i]);
    if (isIdent(tok)) name = tok.text;
    else if (!isPunct(tok, '::')) return null;
  }
  return name;
}

/** Decide what an expression statement is, from its leading and top-level tokens. */
export function classifyExpression(parts: ExprPart[]): ExpressionKind {
  const first = tokenOf(parts[0]);
  const second = parts[1];

  if (isIdent(first)) {
    if (first.text === 'proof' && second?.kind === 'block') return { kind: 'ghost-unary', op: 'proof' };
    const quantifier = quantifierOp(first.text);
    const bar = tokenOf(second);
    if (quantifier && (isPunct(bar, '|') || isPunct(bar, '||'))) return { kind: 'ghost-unary', op: quantifier };
    if (first.text === 'assert' && isIdent(tokenOf(second), 'forall')) return { kind: 'assert-forall' };
    if (first.text === 'assert' && isParenGroup(second)) return { kind: 'assert' };
    if (first.text === 'assume' && isParenGroup(second)) return { kind: 'assume' };
  }
  if (isPunct(first, '&&&')) return { kind: 'big-and' };
  if (isPunct(first, '|||')) return { kind: 'big-or' };

  for (const part of parts) {
    const tok = tokenOf(part);
    const op = tok?.kind === 'punct' ? GHOST_BINARY_OPS.get(tok.text) : undefined;
    if (op) return { kind: 'ghost-binary', op };
  }
  if (isPunct(tokenOf(parts[parts.length - 1]), '@')) return { kind: 'view' };

  const name = macroName(parts);
  if (name) return { kind: 'macro-call', name };
  return { kind: 'opaque' };
}
