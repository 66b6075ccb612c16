import type { ExprPart, ExpressionKind, FnMode, Qualifier } from '../model/ast';
import { GHOST_WRAPPERS, PROOF_MACROS, RUST_KEYWORDS, VERIFIER_ATTRIBUTE_ROOTS } from '../syntax/keywords';
import { isIdent, isPunct, type Token } from '../syntax/token';

export function isExecMode(mode: FnMode | null): boolean {
  return mode === null || mode === 'exec';
}

export function isExecQualifier(qualifier: Qualifier): boolean {
  return qualifier === 'exec';
}

export function isProofMacro(name: string): boolean {
  return PROOF_MACROS.has(name);
}

/** Expression statements that only mean something to the verifier. */
export function isGhostExpression(form: ExpressionKind): boolean {
  switch (form.kind) {
    case 'ghost-unary':
    case 'view':
    case 'big-and':
    case 'big-or':
    case 'ghost-binary':
    case 'assert':
    case 'assume':
    case 'assert-forall':
      return true;
    case 'macro-call':
      return isProofMacro(form.name);
    case 'opaque':
      return false;
    default: {
      const unreachable: never = form;
      return unreachable;
    }
  }
}

/** `#![verifier::…]` in statement position. */
export function isVerifierInnerAttribute(tokens: readonly Token[]): boolean {
  const root = tokens[3];
  return isPunct(tokens[0], '#') && isPunct(tokens[1], '!') && isIdent(root) && VERIFIER_ATTRIBUTE_ROOTS.has(root.text);
}

/** The part before a `(` group makes it a call: a function or method name, or a turbofish. */
export function isCallTarget(prev: ExprPart | undefined): boolean {
  if (prev?.kind !== 'token') return false;
  if (isPunct(prev.token, '>')) return true;
  return isIdent(prev.token) && !RUST_KEYWORDS.has(prev.token.text) && !GHOST_WRAPPERS.has(prev.token.text);
}

/** `Ghost(e)`, `Tracked(e)`, `Ghost::assume_new()`, `Tracked::<T>::new(e)`. */
export function isGhostArgument(parts: readonly ExprPart[]): boolean {
  const first = parts[0];
  const last = parts[parts.length - 1];
  if (parts.length < 2 || first.kind !== 'token' || !isIdent(first.token) || !GHOST_WRAPPERS.has(first.token.text)) return false;
  if (last.kind !== 'group' || last.open.text !== '(') return false;
  return parts.slice(1, -1).every((part) => part.kind === 'token' && (isIdent(part.token) || isPunct(part.token)));
}
