import {
  EMPTY_CONTRACT,
  type Anchored,
  type ContractClauses,
  type FunctionItem,
  type ItemHead,
  type NamedReturn,
  type Param,
  type ParamList,
  type Qualifier,
  type ReturnType,
  type Separated,
} from '../../model/ast';
import { CONTRACT_KEYWORDS } from '../keywords';
import { isIdent, isPunct, type Token } from '../token';
import { parseContract } from './contract';
import { skipOuterAttributes } from './items';
import { ghostWrapperQualifier, isMemberPosition, type Parser, type Segment } from './parser';
import { parseBlock } from './statements';

function isSignatureStop(p: Parser, tok: Token, index: number): boolean {
  if (isPunct(tok, '{') || isPunct(tok, ';')) return true;
  if (!isIdent(tok) || isMemberPosition(p, index)) return false;
  return tok.text === 'where' || CONTRACT_KEYWORDS.has(tok.text);
}

/** Positioned on `fn`. */
export function parseFunction(p: Parser, anchor: Anchored, head: ItemHead): FunctionItem {
  const fnToken = p.expectIdent('fn');
  const name = p.expectIdent();
  const genericsStart = p.pos;
  if (isPunct(p.peek(), '<')) p.pos = p.skipAngles(p.pos);
  const generics = p.slice(genericsStart, p.pos);
  const params = parseParamList(p);
  const ret = isPunct(p.peek(), '->') ? parseReturnType(p) : null;

  let whereClause: Token[] = [];
  let contract: ContractClauses = EMPTY_CONTRACT;
  for (;;) {
    const tok = p.peek();
    if (isIdent(tok, 'where') && whereClause.length === 0) {
      const stop = p.findTopLevel(p.pos + 1, p.eofIndex, (t, i) => isSignatureStop(p, t, i), { angles: true });
      if (stop < 0) p.fail('expected function body');
      whereClause = p.slice(p.pos, stop);
      p.pos = stop;
      continue;
    }
    if (isIdent(tok) && CONTRACT_KEYWORDS.has(tok.text) && contract.tokens.length === 0) {
      contract = parseContract(p);
      continue;
    }
    break;
  }

  const base = { kind: 'function' as const, ...anchor, head, fnToken, name, generics, params, ret, whereClause, contract };
  if (isPunct(p.peek(), '{')) return { ...base, body: parseBlock(p), semi: null };
  if (isPunct(p.peek(), ';')) return { ...base, body: null, semi: p.next() };
  return p.fail('expected function body');
}

function parseParamList(p: Parser): ParamList {
  const openIndex = p.pos;
  const open = p.expectPunct('(');
  const closeIndex = p.partnerOf(openIndex);
  const params = p.splitTopLevel(openIndex + 1, closeIndex, { angles: true }).map((seg): Separated<Param> => ({
    node: parseParam(p, seg),
    comma: seg.comma >= 0 ? p.at(seg.comma) : null,
  }));
  p.pos = closeIndex;
  return { open, params, close: p.next() };
}

function parseParam(p: Parser, seg: Segment): Param {
  if (seg.from === seg.to) return p.fail('expected a parameter', p.at(seg.from));
  const tokens = p.slice(seg.from, seg.to);
  const start = tokens[0];
  const i = skipOuterAttributes(p, seg.from);
  return {
    leading: start.leading,
    start,
    tokens,
    qualifier: paramQualifier(p, i, seg.to),
    receiver: isReceiver(p, i, seg.to),
  };
}

/** `tracked x: T`, `Ghost(x): Ghost<T>`, `t: Tracked<T>`. */
function paramQualifier(p: Parser, from: number, to: number): Qualifier {
  const kw = p.at(from);
  if ((isIdent(kw, 'tracked') || isIdent(kw, 'ghost')) && from + 1 < to && !isPunct(p.at(from + 1), ':')) {
    return kw.text === 'tracked' ? 'tracked' : 'ghost';
  }
  const colon = p.findTopLevel(from, to, (tok) => isPunct(tok, ':'), { angles: true });
  if (colon < 0) return 'exec';
  return ghostWrapperQualifier(p.slice(colon + 1, to)) ?? 'exec';
}

function isReceiver(p: Parser, from: number, to: number): boolean {
  let i = from;
  while (i < to && (isPunct(p.at(i), '&') || isIdent(p.at(i), 'mut') || p.at(i).kind === 'lifetime')) i++;
  return i < to && isIdent(p.at(i), 'self');
}

function parseReturnType(p: Parser): ReturnType {
  const arrow = p.expectPunct('->');
  const from = p.pos;
  const stop = p.findTopLevel(from, p.eofIndex, (t, i) => isSignatureStop(p, t, i), { angles: true });
  if (stop < 0 || stop === from) return p.fail('expected a return type');
  p.pos = stop;
  return { arrow, tokens: p.slice(from, stop), named: namedReturn(p, from, stop) };
}

/** `-> (result: T)` and `-> (tracked result: T)`: one parenthesised group holding a binding. */
export function namedReturn(p: Parser, from: number, to: number): NamedReturn | null {
  if (!isPunct(p.at(from), '(') || p.partnerOf(from) !== to - 1) return null;
  let i = from + 1;
  const tracked = isIdent(p.at(i), 'tracked') && isIdent(p.at(i + 1)) ? p.at(i++) : null;
  const name = p.at(i);
  if (!isIdent(name) || !isPunct(p.at(i + 1), ':') || i + 2 >= to - 1) return null;
  return { tracked, name, type: p.slice(i + 2, to - 1) };
}
