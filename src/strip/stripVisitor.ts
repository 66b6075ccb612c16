import {
  EMPTY_CONTRACT,
  type Anchored,
  type Attribute,
  type Block,
  type EnumItem,
  type ExprPart,
  type FieldList,
  type FunctionItem,
  type Item,
  type ItemHead,
  type Program,
  type ReturnType,
  type Separated,
  type Statement,
  type StructItem,
} from '../model/ast';
import { syntheticPunct, withLeading, type Token } from '../syntax/token';
import { prependContractComment, renderContractLines } from './contractComments';
import {
  isCallTarget,
  isExecMode,
  isExecQualifier,
  isGhostArgument,
  isGhostExpression,
  isProofMacro,
  isVerifierInnerAttribute,
} from './ghostRules';

export type StripOptions = {
  /** Keep removed contracts as comments above their function. */
  renderContractsAsComments?: boolean;
};

export type StripWarningKind = 'defensive-removal' | 'all-params-ghost' | 'empty-struct';

export type StripWarning = {
  kind: StripWarningKind;
  message: string;
  line: number;
  column: number;
};

export type StripStats = {
  functionsRemoved: number;
  contractsRemoved: number;
  paramsRemoved: number;
  fieldsRemoved: number;
  bindingsRemoved: number;
  statementsRemoved: number;
  macrosRemoved: number;
  itemsRemoved: number;
  attributesRemoved: number;
  loopSpecsRemoved: number;
  callArgsRemoved: number;
};

export type StripResult = {
  program: Program;
  warnings: StripWarning[];
  stats: StripStats;
};

type StripContext = {
  readonly options: StripOptions;
  readonly warnings: StripWarning[];
  readonly stats: StripStats;
};

export function emptyStats(): StripStats {
  return {
    functionsRemoved: 0,
    contractsRemoved: 0,
    paramsRemoved: 0,
    fieldsRemoved: 0,
    bindingsRemoved: 0,
    statementsRemoved: 0,
    macrosRemoved: 0,
    itemsRemoved: 0,
    attributesRemoved: 0,
    loopSpecsRemoved: 0,
    callArgsRemoved: 0,
  };
}

function warn(ctx: StripContext, kind: StripWarningKind, message: string, at: Token): void {
  ctx.warnings.push({ kind, message, line: at.line, column: at.column });
}

/**
 * Remove everything that only the verifier reads. The input is not modified;
 * retained nodes keep their order and their original tokens.
 */
export function stripProgram(program: Program, options: StripOptions = {}): StripResult {
  const ctx: StripContext = { options, warnings: [], stats: emptyStats() };
  const items = stripItems(program.items, ctx).filter((item) => {
    if (item.kind !== 'function' || isExecMode(item.head.mode)) return true;
    ctx.stats.functionsRemoved++;
    warn(ctx, 'defensive-removal', `non-executable function \`${item.name.text}\` survived stripping and was removed`, item.name);
    return false;
  });
  return { program: { ...program, items }, warnings: ctx.warnings, stats: ctx.stats };
}

/**
 * Leading trivia for a node that became first in its list: the line breaks
 * of the original first node, then the node's own indentation and comments.
 */
function adoptLineBreaks(own: string, template: string): string {
  const ownSpace = own.slice(0, own.length - own.trimStart().length);
  const templateSpace = template.slice(0, template.length - template.trimStart().length);
  const rest = own.slice(ownSpace.length);
  const breakAt = templateSpace.lastIndexOf('\n');
  if (breakAt < 0) return templateSpace + rest;
  const indent = ownSpace.slice(ownSpace.lastIndexOf('\n') + 1);
  return templateSpace.slice(0, breakAt + 1) + indent + rest;
}

function releadItem(item: Item, leading: string): Item {
  return item.leading === leading ? item : { ...item, leading };
}

function releadStatement(stmt: Statement, leading: string): Statement {
  if (stmt.leading === leading) return stmt;
  if (stmt.kind === 'item') return { ...stmt, leading, item: releadItem(stmt.item, leading) };
  return { ...stmt, leading };
}

function stripItems(items: readonly Item[], ctx: StripContext): Item[] {
  const kept = items.flatMap((item) => {
    const stripped = stripItem(item, ctx);
    return stripped ? [stripped] : [];
  });
  const first = kept[0];
  if (!first || first.start === items[0].start) return kept;
  return [releadItem(first, adoptLineBreaks(first.leading, items[0].leading)), ...kept.slice(1)];
}

function stripItem(item: Item, ctx: StripContext): Item | null {
  switch (item.kind) {
    case 'function':
      return stripFunction(item, ctx);
    case 'struct':
      return stripStruct(item, ctx);
    case 'enum':
      return stripEnum(item, ctx);
    case 'trait':
    case 'impl':
    case 'module':
      return { ...item, head: stripHead(item.head, ctx), items: stripItems(item.items, ctx) };
    case 'opaque':
      if (item.ghost) {
        ctx.stats.itemsRemoved++;
        return null;
      }
      return { ...item, head: stripHead(item.head, ctx) };
    default: {
      const unhandled: never = item;
      return unhandled;
    }
  }
}

function stripAttrs(attrs: readonly Attribute[], ctx: StripContext): Attribute[] {
  const kept = attrs.filter((attr) => !attr.verifierOnly);
  ctx.stats.attributesRemoved += attrs.length - kept.length;
  return kept;
}

/** Drop verifier attributes and mode keywords; visibility and Rust qualifiers stay. */
function stripHead(head: ItemHead, ctx: StripContext): ItemHead {
  return {
    attrs: stripAttrs(head.attrs, ctx),
    tokens: head.tokens.filter((t) => t.role !== 'mode'),
    visibility: head.visibility,
    mode: head.mode === null ? null : 'exec',
  };
}

/**
 * Keep the elements `keep` accepts. The first survivor takes the line
 * breaks of the list's original first element; commas are re-attached so that the list stays
 * well formed and a trailing comma survives only if the source had one.
 */
function filterSeparated<T extends Anchored>(list: readonly Separated<T>[], keep: (node: T) => boolean): Separated<T>[] {
  const kept = list.filter((entry) => keep(entry.node));
  if (kept.length === list.length) return [...list];
  const trailingComma = list.length > 0 && list[list.length - 1].comma !== null;
  return kept.map((entry, i): Separated<T> => {
    const node =
      i === 0 && entry !== list[0] ? { ...entry.node, leading: adoptLineBreaks(entry.node.leading, list[0].node.leading) } : entry.node;
    const isLast = i === kept.length - 1;
    const comma = isLast && !trailingComma ? null : (entry.comma ?? syntheticPunct(','));
    return { node, comma };
  });
}

/** Whitespace to put in front of a token that followed removed signature clauses. */
function separatorAfter(prev: Token, fallback: string): string {
  return prev.trailing.includes('//') ? '\n' : fallback;
}

function stripFunction(fn: FunctionItem, ctx: StripContext): FunctionItem | null {
  if (!isExecMode(fn.head.mode)) {
    ctx.stats.functionsRemoved++;
    return null;
  }
  const head = stripHead(fn.head, ctx);

  let leading = fn.leading;
  const hadContract = fn.contract.tokens.length > 0;
  if (hadContract) {
    ctx.stats.contractsRemoved++;
    if (ctx.options.renderContractsAsComments) {
      leading = prependContractComment(leading, renderContractLines(fn.contract), head.visibility === 'public');
    }
  }

  const params = filterSeparated(fn.params.params, (param) => isExecQualifier(param.qualifier));
  const removedParams = fn.params.params.length - params.length;
  ctx.stats.paramsRemoved += removedParams;
  let close = fn.params.close;
  if (removedParams > 0 && params.length === 0) {
    close = withLeading(close, '');
    warn(ctx, 'all-params-ghost', `every parameter of \`${fn.name.text}\` was ghost or tracked`, fn.name);
  }

  const ret = fn.ret ? unnameReturn(fn.ret) : null;
  let body = fn.body ? stripBlock(fn.body, ctx) : null;
  let semi = fn.semi;
  if (hadContract) {
    const prev = fn.whereClause[fn.whereClause.length - 1] ?? ret?.tokens[ret.tokens.length - 1] ?? close;
    if (body) body = { ...body, open: withLeading(body.open, separatorAfter(prev, ' ')) };
    if (semi) semi = withLeading(semi, separatorAfter(prev, ''));
  }

  return {
    ...fn,
    leading,
    head,
    params: { ...fn.params, params, close },
    ret,
    contract: EMPTY_CONTRACT,
    body,
    semi,
  };
}

/** `-> (result: T)` becomes `-> T`. */
function unnameReturn(ret: ReturnType): ReturnType {
  if (!ret.named) return ret;
  const [first, ...rest] = ret.named.type;
  return { ...ret, tokens: [withLeading(first, ret.tokens[0].leading), ...rest], named: null };
}

function stripFieldList(list: FieldList, owner: Token, ctx: StripContext): FieldList {
  const fields = filterSeparated(list.fields, (field) => isExecQualifier(field.qualifier));
  const removed = list.fields.length - fields.length;
  if (removed === 0) return list;
  ctx.stats.fieldsRemoved += removed;
  if (fields.length > 0) return { ...list, fields };
  warn(ctx, 'empty-struct', `every field of \`${owner.text}\` was ghost or tracked`, owner);
  return { ...list, fields, close: withLeading(list.close, '') };
}

function nameIn(tokens: readonly Token[], keyword: string): Token {
  const at = tokens.findIndex((tok) => tok.text === keyword);
  return tokens[at + 1] ?? tokens[0];
}

function stripStruct(item: StructItem, ctx: StripContext): StructItem {
  const head = stripHead(item.head, ctx);
  if (!item.fields) return { ...item, head };
  return { ...item, head, fields: stripFieldList(item.fields, nameIn(item.header, 'struct'), ctx) };
}

function stripEnum(item: EnumItem, ctx: StripContext): EnumItem {
  const variants = item.variants.map(({ node, comma }) => {
    const fields = node.fields ? stripFieldList(node.fields, node.tokens[node.tokens.length - 1], ctx) : null;
    return { node: { ...node, fields }, comma };
  });
  return { ...item, head: stripHead(item.head, ctx), variants };
}

// ---------------------------------------------------------------------------
// Blocks and statements

function stripBlock(block: Block, ctx: StripContext): Block {
  const stmts = block.stmts.flatMap((stmt) => {
    const stripped = stripStatement(stmt, ctx);
    return stripped ? [stripped] : [];
  });
  const first = stmts[0];
  if (first && first.start !== block.stmts[0].start) {
    stmts[0] = releadStatement(first, adoptLineBreaks(first.leading, block.stmts[0].leading));
  }
  return { ...block, stmts };
}

function stripStatement(stmt: Statement, ctx: StripContext): Statement | null {
  switch (stmt.kind) {
    case 'binding':
      if (!isExecQualifier(stmt.qualifier)) {
        ctx.stats.bindingsRemoved++;
        return null;
      }
      return { ...stmt, attrs: stripAttrs(stmt.attrs, ctx), parts: stripParts(stmt.parts, ctx) };
    case 'expression':
      if (isGhostExpression(stmt.expr.form)) {
        ctx.stats.statementsRemoved++;
        return null;
      }
      return { ...stmt, attrs: stripAttrs(stmt.attrs, ctx), expr: { ...stmt.expr, parts: stripParts(stmt.expr.parts, ctx) } };
    case 'macro':
      if (isProofMacro(stmt.name)) {
        ctx.stats.macrosRemoved++;
        return null;
      }
      return { ...stmt, attrs: stripAttrs(stmt.attrs, ctx) };
    case 'item': {
      const item = stripItem(stmt.item, ctx);
      return item ? { ...stmt, item } : null;
    }
    case 'other':
      if (isVerifierInnerAttribute(stmt.tokens)) {
        ctx.stats.attributesRemoved++;
        return null;
      }
      return stmt;
    default: {
      const unhandled: never = stmt;
      return unhandled;
    }
  }
}

function lastTokenOf(part: ExprPart): Token {
  switch (part.kind) {
    case 'token':
      return part.token;
    case 'group':
      return part.close;
    case 'block':
      return part.block.close;
    case 'loop-spec':
    case 'closure-spec':
      return part.tokens[part.tokens.length - 1];
    case 'closure-return':
      return part.ret.tokens[part.ret.tokens.length - 1];
  }
}

function releadParts(parts: readonly ExprPart[], leading: string): ExprPart[] {
  const [first, ...rest] = parts;
  if (!first) return [];
  switch (first.kind) {
    case 'token':
      return [{ ...first, token: withLeading(first.token, leading) }, ...rest];
    case 'group':
      return [{ ...first, open: withLeading(first.open, leading) }, ...rest];
    case 'block':
      return [{ ...first, block: { ...first.block, open: withLeading(first.block.open, leading) } }, ...rest];
    case 'loop-spec':
    case 'closure-spec':
      return [{ ...first, tokens: [withLeading(first.tokens[0], leading), ...first.tokens.slice(1)] }, ...rest];
    case 'closure-return':
      return [{ ...first, ret: { ...first.ret, arrow: withLeading(first.ret.arrow, leading) } }, ...rest];
  }
}

function firstLeading(parts: readonly ExprPart[]): string {
  const first = parts[0];
  if (!first) return '';
  switch (first.kind) {
    case 'token':
      return first.token.leading;
    case 'group':
      return first.open.leading;
    case 'block':
      return first.block.open.leading;
    case 'loop-spec':
    case 'closure-spec':
      return first.tokens[0].leading;
    case 'closure-return':
      return first.ret.arrow.leading;
  }
}

function stripParts(parts: readonly ExprPart[], ctx: StripContext): ExprPart[] {
  const out: ExprPart[] = [];
  let bodySeparator: string | null = null;
  parts.forEach((part, i) => {
    switch (part.kind) {
      case 'token':
        out.push(part);
        break;
      case 'block': {
        const block = stripBlock(part.block, ctx);
        const open = bodySeparator === null ? block.open : withLeading(block.open, bodySeparator);
        bodySeparator = null;
        out.push({ kind: 'block', block: { ...block, open } });
        break;
      }
      case 'group': {
        const inner = stripParts(part.parts, ctx);
        const callArgs = part.open.text === '(' && isCallTarget(parts[i - 1]);
        out.push({ ...part, parts: callArgs ? dropGhostArguments(inner, ctx) : inner });
        break;
      }
      case 'loop-spec':
      case 'closure-spec': {
        if (part.kind === 'loop-spec') ctx.stats.loopSpecsRemoved++;
        else ctx.stats.contractsRemoved++;
        const prev = out[out.length - 1];
        bodySeparator = prev ? separatorAfter(lastTokenOf(prev), ' ') : ' ';
        break;
      }
      case 'closure-return':
        out.push({ ...part, ret: unnameReturn(part.ret) });
        break;
    }
  });
  return out;
}

type Argument = { parts: ExprPart[]; comma: ExprPart | null };

/** Remove `Ghost(…)` and `Tracked(…)` arguments from a call's argument list. */
function dropGhostArguments(parts: readonly ExprPart[], ctx: StripContext): ExprPart[] {
  const args: Argument[] = [];
  let current: ExprPart[] = [];
  for (const part of parts) {
    if (part.kind === 'token' && part.token.kind === 'punct' && part.token.text === ',') {
      args.push({ parts: current, comma: part });
      current = [];
    } else {
      current.push(part);
    }
  }
  if (current.length > 0) args.push({ parts: current, comma: null });

  const kept = args.filter((arg) => !isGhostArgument(arg.parts));
  if (kept.length === args.length) return [...parts];
  ctx.stats.callArgsRemoved += args.length - kept.length;

  const trailingComma = args[args.length - 1].comma !== null;
  return kept.flatMap((arg, i): ExprPart[] => {
    const own = i === 0 && arg !== args[0] ? releadParts(arg.parts, firstLeading(args[0].parts)) : arg.parts;
    const isLast = i === kept.length - 1;
    if (isLast && !trailingComma) return own;
    return [...own, arg.comma ?? { kind: 'token', token: syntheticPunct(',') }];
  });
}
