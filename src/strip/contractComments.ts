import type { ContractClauses, ExprFragment, InvariantSpec } from '../model/ast';
import { tokensToInlineText } from '../syntax/token';

export const CONTRACT_COMMENT_HEADER = 'Verus specification:';

function joinExprs(exprs: readonly ExprFragment[]): string {
  return exprs.map(tokensToInlineText).join(', ');
}

function invariantText(spec: InvariantSpec): string {
  switch (spec.kind) {
    case 'any':
      return 'any';
    case 'none':
      return 'none';
    case 'list':
      return `[${joinExprs(spec.exprs)}]`;
    case 'set':
      return tokensToInlineText(spec.expr);
    default: {
      const unreachable: never = spec;
      return unreachable;
    }
  }
}

/**
 * One line per clause present, in a fixed order. `decreases` is a
 * termination measure and is never rendered.
 */
export function renderContractLines(contract: ContractClauses): string[] {
  const lines: string[] = [];
  if (contract.requires?.length) lines.push(`requires ${joinExprs(contract.requires)}`);
  if (contract.recommends) {
    const via = contract.recommends.via ? ` via ${tokensToInlineText(contract.recommends.via)}` : '';
    lines.push(`recommends ${joinExprs(contract.recommends.exprs)}${via}`);
  }
  if (contract.ensures?.length) lines.push(`ensures ${joinExprs(contract.ensures)}`);
  if (contract.defaultEnsures?.length) lines.push(`default_ensures ${joinExprs(contract.defaultEnsures)}`);
  if (contract.returns?.length) lines.push(`returns ${joinExprs(contract.returns)}`);
  if (contract.invariants) lines.push(`opens_invariants ${invariantText(contract.invariants)}`);
  if (contract.unwind) {
    lines.push(contract.unwind.when ? `no_unwind when ${tokensToInlineText(contract.unwind.when)}` : 'no_unwind');
  }
  return lines;
}

/**
 * Insert a comment block at the end of a node's leading trivia, indented like
 * the node itself. Public items get `///` doc comments.
 */
export function prependContractComment(leading: string, lines: readonly string[], isPublic: boolean): string {
  if (lines.length === 0) return leading;
  const marker = isPublic ? '///' : '//';
  const lastNewline = leading.lastIndexOf('\n');
  const before = lastNewline < 0 ? (leading === '' ? '' : `${leading}\n`) : leading.slice(0, lastNewline + 1);
  const indent = lastNewline < 0 ? '' : leading.slice(lastNewline + 1);
  const block = [CONTRACT_COMMENT_HEADER, ...lines].map((line) => `${indent}${marker} ${line}\n`).join('');
  return `${before}${block}${indent}`;
}
