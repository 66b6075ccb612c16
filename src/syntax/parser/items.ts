import type {
  Anchored,
  Attribute,
  EnumItem,
  Field,
  FieldList,
  FnMode,
  HeadToken,
  Item,
  ItemHead,
  OpaqueItem,
  Separated,
  StructItem,
  Variant,
  Visibility,
} from '../../model/ast';
import { FN_QUALIFIERS, MODE_KEYWORDS, PROOF_MACROS, VERIFIER_ATTRIBUTE_ROOTS, VERIFIER_USE_ROOTS } from '../keywords';
import { isIdent, isPunct, type Token } from '../token';
import { ghostWrapperQualifier, type Parser, type Segment } from './parser';
import { parseFunction } from './signature';

const VISIBILITY_SCOPES = new Set(['crate', 'self', 'super', 'in']);
const SEMI_TERMINATED = new Set(['use', 'const', 'static', 'type']);

export function parseItems(p: Parser, end: number): Item[] {
  const items: Item[] = [];
  while (p.pos < end) items.push(parseItem(p));
  return items;
}

export function parseItem(p: Parser): Item {
  const start = p.peek();
  const anchor: Anchored = { leading: start.leading, start };

  if (isInnerAttributeAt(p, p.pos)) {
    const attr = parseAttribute(p);
    return { kind: 'opaque', ...anchor, head: emptyHead(), tokens: attr.tokens, ghost: attr.verifierOnly };
  }

  const head = parseItemHead(p);
  const kw = p.peek();
  if (isPunct(kw, ';') && head.attrs.length === 0 && head.tokens.length === 0) {
    return { kind: 'opaque', ...anchor, head, tokens: [p.next()], ghost: false };
  }
  if (!isIdent(kw)) return p.fail('expected an item');

  switch (kw.text) {
    case 'fn':
      return parseFunction(p, anchor, head);
    case 'struct':
      return parseStruct(p, anchor, head);
    case 'enum':
      return parseEnum(p, anchor, head);
    case 'trait':
    case 'impl':
      return parseContainer(p, anchor, head, kw.text);
    case 'mod':
      if (isPunct(p.peek(2), '{')) return parseContainer(p, anchor, head, 'module');
      return opaqueThrough(p, anchor, head, semicolonEnd(p), false);
    case 'union':
      if (isIdent(p.peek(1))) return opaqueThrough(p, anchor, head, braceEnd(p), false);
      break;
    case 'global':
      if (isIdent(p.peek(1), 'size_of') || isIdent(p.peek(1), 'layout')) return opaqueThrough(p, anchor, head, semicolonEnd(p), true);
      break;
    case 'group':
      if (hasHeadToken(head, 'broadcast')) return opaqueThrough(p, anchor, head, braceEnd(p), true);
      break;
    case 'extern':
      if (isIdent(p.peek(1), 'crate')) return opaqueThrough(p, anchor, head, semicolonEnd(p), false);
      return opaqueThrough(p, anchor, head, braceEnd(p), false);
    default:
      if (SEMI_TERMINATED.has(kw.text)) {
        return opaqueThrough(p, anchor, head, semicolonEnd(p), isGhostDeclaration(p, head, kw));
      }
  }

  const macroEnd = macroItemEnd(p);
  if (macroEnd) return opaqueThrough(p, anchor, head, macroEnd.end, PROOF_MACROS.has(macroEnd.name));
  return p.fail('expected an item');
}

function emptyHead(): ItemHead {
  return { attrs: [], tokens: [], visibility: 'private', mode: null };
}

function hasHeadToken(head: ItemHead, text: string): boolean {
  return head.tokens.some((t) => t.token.text === text);
}

/** `broadcast use`, `use vstd::…`, `spec const`, `proof const`. */
function isGhostDeclaration(p: Parser, head: ItemHead, kw: Token): boolean {
  if (head.mode !== null && head.mode !== 'exec') return true;
  if (kw.text !== 'use') return false;
  if (hasHeadToken(head, 'broadcast')) return true;
  let i = p.pos + 1;
  if (isPunct(p.at(i), '::')) i++;
  const root = p.at(i);
  return isIdent(root) && VERIFIER_USE_ROOTS.has(root.text);
}

function opaqueThrough(p: Parser, anchor: Anchored, head: ItemHead, end: number, ghost: boolean): OpaqueItem {
  const tokens = p.slice(p.pos, end);
  p.pos = end;
  return { kind: 'opaque', ...anchor, head, tokens, ghost };
}

function semicolonEnd(p: Parser): number {
  const semi = p.findTopLevel(p.pos, p.eofIndex, (tok) => isPunct(tok, ';'));
  if (semi < 0) return p.fail("expected ';'", p.at(p.eofIndex));
  return semi + 1;
}

function braceEnd(p: Parser): number {
  const brace = p.findTopLevel(p.pos, p.eofIndex, (tok) => isPunct(tok, '{'), { angles: true });
  if (brace < 0) return p.fail("expected '{'", p.at(p.eofIndex));
  return p.partnerOf(brace) + 1;
}

/** `path!(…);`, `path![…];`, `path! { … }`, `macro_rules! name { … }`. */
function macroItemEnd(p: Parser): { name: string; end: number } | null {
  let i = p.pos;
  if (isPunct(p.at(i), '::')) i++;
  let name = '';
  while (isIdent(p.at(i))) {
    name = p.at(i).text;
    if (!isPunct(p.at(i + 1), '::')) break;
    i += 2;
  }
  if (!name || !isPunct(p.at(i + 1), '!')) return null;
  let open = i + 2;
  if (isIdent(p.at(open))) open++;
  if (!p.isOpener(open)) return null;
  const after = p.partnerOf(open) + 1;
  if (isPunct(p.at(after), ';')) return { name, end: after + 1 };
  if (p.at(open).text !== '{') return p.fail("expected ';' after macro invocation", p.at(after));
  return { name, end: after };
}

// ---------------------------------------------------------------------------
// Attributes and heads

export function isInnerAttributeAt(p: Parser, index: number): boolean {
  return isPunct(p.at(index), '#') && isPunct(p.at(index + 1), '!') && isPunct(p.at(index + 2), '[');
}

function isOuterAttributeAt(p: Parser, index: number): boolean {
  return isPunct(p.at(index), '#') && isPunct(p.at(index + 1), '[');
}

export function parseAttribute(p: Parser): Attribute {
  const from = p.pos;
  p.expectPunct('#');
  const inner = isPunct(p.peek(), '!');
  if (inner) p.next();
  if (!isPunct(p.peek(), '[')) p.fail("expected '['");
  const close = p.partnerOf(p.pos);
  const root = p.at(p.pos + 1);
  p.pos = close + 1;
  return { tokens: p.slice(from, close + 1), inner, verifierOnly: isIdent(root) && VERIFIER_ATTRIBUTE_ROOTS.has(root.text) };
}

export function parseOuterAttributes(p: Parser): Attribute[] {
  const attrs: Attribute[] = [];
  while (isOuterAttributeAt(p, p.pos)) attrs.push(parseAttribute(p));
  return attrs;
}

export function skipOuterAttributes(p: Parser, index: number): number {
  let i = index;
  while (isOuterAttributeAt(p, i)) i = p.partnerOf(i + 1) + 1;
  return i;
}

/** Mode keyword at `index`, optionally with a `(checked)`, `(axiom)` or `(crate)` modifier, followed by more of the head. */
function isModeKeywordAt(p: Parser, index: number): boolean {
  const tok = p.at(index);
  if (!isIdent(tok) || !MODE_KEYWORDS.has(tok.text)) return false;
  const next = p.at(index + 1);
  if (isIdent(next)) return true;
  if (!isPunct(next, '(') || !['spec', 'proof', 'open', 'closed'].includes(tok.text)) return false;
  return isIdent(p.at(p.partnerOf(index + 1) + 1));
}

function isQualifierAt(p: Parser, index: number): boolean {
  const tok = p.at(index);
  if (!isIdent(tok) || !FN_QUALIFIERS.has(tok.text)) return false;
  const next = p.at(index + 1);
  switch (tok.text) {
    case 'const':
      return isIdent(next) && ['fn', 'unsafe', 'async', 'extern'].includes(next.text);
    case 'async':
      return isIdent(next) && ['fn', 'unsafe'].includes(next.text);
    case 'unsafe':
      return isIdent(next) && ['fn', 'impl', 'trait', 'extern', 'auto'].includes(next.text);
    case 'extern':
      return isIdent(next, 'fn') || (next.kind === 'literal' && isIdent(p.at(index + 2), 'fn'));
    default:
      return isIdent(next) && ['fn', 'unsafe', 'const', 'async', 'type', 'impl'].includes(next.text);
  }
}

function modeOf(keyword: string, modifier: Token | null): FnMode | null {
  if (keyword === 'spec') return isIdent(modifier ?? undefined, 'checked') ? 'spec-checked' : 'spec';
  if (keyword === 'proof') return isIdent(modifier ?? undefined, 'axiom') ? 'proof-axiom' : 'proof';
  if (keyword === 'axiom') return 'proof-axiom';
  if (keyword === 'exec') return 'exec';
  return null;
}

export function parseItemHead(p: Parser): ItemHead {
  const attrs = parseOuterAttributes(p);
  const tokens: HeadToken[] = [];
  let visibility: Visibility = 'private';
  let mode: FnMode | null = null;

  if (isIdent(p.peek(), 'pub')) {
    visibility = 'public';
    tokens.push({ token: p.next(), role: 'visibility' });
    const scope = p.peek(1);
    if (isPunct(p.peek(), '(') && isIdent(scope) && VISIBILITY_SCOPES.has(scope.text)) {
      const close = p.partnerOf(p.pos);
      for (const token of p.slice(p.pos, close + 1)) tokens.push({ token, role: 'visibility' });
      p.pos = close + 1;
    }
  }

  for (;;) {
    if (isModeKeywordAt(p, p.pos)) {
      const keyword = p.next();
      tokens.push({ token: keyword, role: 'mode' });
      let modifier: Token | null = null;
      if (isPunct(p.peek(), '(')) {
        const close = p.partnerOf(p.pos);
        modifier = p.peek(1);
        for (const token of p.slice(p.pos, close + 1)) tokens.push({ token, role: 'mode' });
        p.pos = close + 1;
      }
      mode = modeOf(keyword.text, modifier) ?? mode;
      continue;
    }
    if (isQualifierAt(p, p.pos)) {
      const qualifier = p.next();
      tokens.push({ token: qualifier, role: 'qualifier' });
      if (qualifier.text === 'extern' && p.peek().kind === 'literal') tokens.push({ token: p.next(), role: 'qualifier' });
      continue;
    }
    break;
  }

  return { attrs, tokens, visibility, mode };
}

/** Whether the tokens at `index` (after attributes) begin an item rather than a statement. */
export function isItemStartAt(p: Parser, index: number): boolean {
  const i = skipOuterAttributes(p, index);
  const tok = p.at(i);
  if (!isIdent(tok)) return false;
  const next = p.at(i + 1);
  switch (tok.text) {
    case 'fn':
    case 'struct':
    case 'enum':
    case 'trait':
    case 'impl':
    case 'mod':
    case 'use':
    case 'static':
    case 'pub':
      return true;
    case 'type':
    case 'union':
      return isIdent(next);
    case 'const':
      return isIdent(next) || isPunct(next, '_');
    case 'extern':
      return isIdent(next, 'crate') || isIdent(next, 'fn') || next.kind === 'literal' || isPunct(next, '{');
    case 'macro_rules':
      return isPunct(next, '!');
    default:
      return isModeKeywordAt(p, i) || isQualifierAt(p, i);
  }
}

// ---------------------------------------------------------------------------
// Structs and enums

function parseStruct(p: Parser, anchor: Anchored, head: ItemHead): StructItem {
  const headerStart = p.pos;
  p.expectIdent('struct');
  p.expectIdent();
  if (isPunct(p.peek(), '<')) p.pos = p.skipAngles(p.pos);
  if (isIdent(p.peek(), 'where')) {
    const stop = p.findTopLevel(p.pos, p.eofIndex, (tok) => isPunct(tok, '{') || isPunct(tok, ';'), { angles: true });
    if (stop < 0) p.fail("expected '{' or ';'");
    p.pos = stop;
  }
  const header = p.slice(headerStart, p.pos);

  const tok = p.peek();
  if (isPunct(tok, '{')) {
    return { kind: 'struct', ...anchor, head, header, fields: parseFieldList(p), trailer: [] };
  }
  if (isPunct(tok, '(')) {
    const fields = parseFieldList(p);
    const end = semicolonEnd(p);
    const trailer = p.slice(p.pos, end);
    p.pos = end;
    return { kind: 'struct', ...anchor, head, header, fields, trailer };
  }
  if (isPunct(tok, ';')) return { kind: 'struct', ...anchor, head, header, fields: null, trailer: [p.next()] };
  return p.fail("expected '{', '(' or ';' after struct name");
}

/** `{ named: T, … }` or `( T, … )`, positioned on the opening delimiter. */
function parseFieldList(p: Parser): FieldList {
  const openIndex = p.pos;
  const closeIndex = p.partnerOf(openIndex);
  const open = p.next();
  const fields = p.splitTopLevel(openIndex + 1, closeIndex, { angles: true }).map((seg): Separated<Field> => ({
    node: parseField(p, seg),
    comma: seg.comma >= 0 ? p.at(seg.comma) : null,
  }));
  p.pos = closeIndex;
  return { open, fields, close: p.next() };
}

function parseField(p: Parser, seg: Segment): Field {
  if (seg.from === seg.to) return p.fail('expected a field', p.at(seg.from));
  const tokens = p.slice(seg.from, seg.to);
  const start = tokens[0];
  let i = skipOuterAttributes(p, seg.from);
  if (isIdent(p.at(i), 'pub')) {
    i++;
    if (isPunct(p.at(i), '(') && p.partnerOf(i) < seg.to) i = p.partnerOf(i) + 1;
  }
  const kw = p.at(i);
  const after = p.at(i + 1);
  if ((isIdent(kw, 'ghost') || isIdent(kw, 'tracked')) && i + 1 < seg.to && !isPunct(after, ':')) {
    return { leading: start.leading, start, tokens, qualifier: kw.text === 'ghost' ? 'ghost' : 'tracked' };
  }
  const colon = p.findTopLevel(i, seg.to, (tok) => isPunct(tok, ':'), { angles: true });
  const type = p.slice(colon < 0 ? i : colon + 1, seg.to);
  return { leading: start.leading, start, tokens, qualifier: ghostWrapperQualifier(type) ?? 'exec' };
}

function parseEnum(p: Parser, anchor: Anchored, head: ItemHead): EnumItem {
  const headerStart = p.pos;
  const brace = p.findTopLevel(p.pos, p.eofIndex, (tok) => isPunct(tok, '{'), { angles: true });
  if (brace < 0) p.fail("expected '{' after enum name");
  const header = p.slice(headerStart, brace);
  const closeIndex = p.partnerOf(brace);
  const variants = p.splitTopLevel(brace + 1, closeIndex).map((seg): Separated<Variant> => ({
    node: parseVariant(p, seg),
    comma: seg.comma >= 0 ? p.at(seg.comma) : null,
  }));
  p.pos = closeIndex + 1;
  return { kind: 'enum', ...anchor, head, header, open: p.at(brace), variants, close: p.at(closeIndex) };
}

function parseVariant(p: Parser, seg: Segment): Variant {
  if (seg.from === seg.to) return p.fail('expected an enum variant', p.at(seg.from));
  const start = p.at(seg.from);
  const delim = p.findTopLevel(seg.from, seg.to, (tok) => isPunct(tok, '{') || isPunct(tok, '('));
  if (delim < 0) {
    return { leading: start.leading, start, tokens: p.slice(seg.from, seg.to), fields: null, trailer: [] };
  }
  p.pos = delim;
  const fields = parseFieldList(p);
  const trailer = p.slice(p.pos, seg.to);
  return { leading: start.leading, start, tokens: p.slice(seg.from, delim), fields, trailer };
}

// ---------------------------------------------------------------------------
// Traits, impls, modules

function parseContainer(p: Parser, anchor: Anchored, head: ItemHead, kind: 'trait' | 'impl' | 'module'): Item {
  const headerStart = p.pos;
  const brace = p.findTopLevel(p.pos, p.eofIndex, (tok) => isPunct(tok, '{') || isPunct(tok, ';'), { angles: true });
  if (brace < 0 || !isPunct(p.at(brace), '{')) return p.fail("expected '{'", p.at(brace < 0 ? p.eofIndex : brace));
  const header = p.slice(headerStart, brace);
  const closeIndex = p.partnerOf(brace);
  p.pos = brace + 1;
  const items = parseItems(p, closeIndex);
  p.pos = closeIndex + 1;
  return { kind, ...anchor, head, header, open: p.at(brace), items, close: p.at(closeIndex) };
}
