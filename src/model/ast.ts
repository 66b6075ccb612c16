/**
 * Tree model for Verus-annotated Rust.
 *
 * Nodes keep the tokens they were parsed from, so the printer can reproduce
 * retained code verbatim. Structure is only modelled where stripping needs it;
 * everything else is an opaque token run or an expression part list.
 */
import type { Token } from '../syntax/token';

export type Qualifier = 'exec' | 'ghost' | 'tracked';

export type FnMode = 'exec' | 'spec' | 'spec-checked' | 'proof' | 'proof-axiom';

export type Visibility = 'public' | 'private';

/**
 * Nodes that can be removed or reordered on their own. `leading` is the trivia
 * in front of the node; `start` is the node's first token, whose own leading
 * trivia the printer replaces with `leading`.
 */
export type Anchored = {
  leading: string;
  start: Token;
};

/** A list element and the comma that followed it in the source, if any. */
export type Separated<T> = {
  node: T;
  comma: Token | null;
};

export type Attribute = {
  tokens: Token[];
  inner: boolean;
  /** `#[verifier::…]`, `#[verus::…]`, `#[trigger]`. */
  verifierOnly: boolean;
};

export type HeadTokenRole = 'visibility' | 'qualifier' | 'mode';

export type HeadToken = {
  token: Token;
  role: HeadTokenRole;
};

/** Attributes, visibility, qualifiers and mode keywords in front of an item keyword. */
export type ItemHead = {
  attrs: Attribute[];
  tokens: HeadToken[];
  visibility: Visibility;
  /** `null` when the item carries no mode keyword at all. */
  mode: FnMode | null;
};

// ---------------------------------------------------------------------------
// Contracts

/** One comma-separated sub-expression of a clause, as written. */
export type ExprFragment = Token[];

export type InvariantSpec =
  | { kind: 'any' }
  | { kind: 'none' }
  | { kind: 'list'; exprs: ExprFragment[] }
  | { kind: 'set'; expr: ExprFragment };

export type ContractClauses = {
  requires?: ExprFragment[];
  recommends?: { exprs: ExprFragment[]; via?: ExprFragment };
  ensures?: ExprFragment[];
  defaultEnsures?: ExprFragment[];
  returns?: ExprFragment[];
  invariants?: InvariantSpec;
  unwind?: { when?: ExprFragment };
  decreases?: ExprFragment[];
  /** The clause region exactly as it appeared, for printing unstripped signatures. */
  tokens: Token[];
};

export const EMPTY_CONTRACT: ContractClauses = { tokens: [] };

// ---------------------------------------------------------------------------
// Functions

export type Param = Anchored & {
  tokens: Token[];
  qualifier: Qualifier;
  receiver: boolean;
};

export type ParamList = {
  open: Token;
  params: Separated<Param>[];
  close: Token;
};

export type NamedReturn = {
  /** `tracked` in `-> (tracked r: T)`, if present. */
  tracked: Token | null;
  name: Token;
  /** Type tokens without the surrounding parentheses. */
  type: Token[];
};

export type ReturnType = {
  arrow: Token;
  /** Everything after the arrow. */
  tokens: Token[];
  /** Set for Verus named returns `-> (result: T)`. */
  named: NamedReturn | null;
};

export type FunctionItem = Anchored & {
  kind: 'function';
  head: ItemHead;
  fnToken: Token;
  name: Token;
  generics: Token[];
  params: ParamList;
  ret: ReturnType | null;
  whereClause: Token[];
  contract: ContractClauses;
  body: Block | null;
  /** `;` of a body-less declaration. */
  semi: Token | null;
};

// ---------------------------------------------------------------------------
// Data types

export type Field = Anchored & {
  tokens: Token[];
  qualifier: Qualifier;
};

export type FieldList = {
  open: Token;
  fields: Separated<Field>[];
  close: Token;
};

export type StructItem = Anchored & {
  kind: 'struct';
  head: ItemHead;
  /** `struct Name<…> where …` */
  header: Token[];
  fields: FieldList | null;
  /** Where clause after a tuple field list, and the closing `;`. */
  trailer: Token[];
};

export type Variant = Anchored & {
  tokens: Token[];
  fields: FieldList | null;
  /** `= discriminant`, if any. */
  trailer: Token[];
};

export type EnumItem = Anchored & {
  kind: 'enum';
  head: ItemHead;
  header: Token[];
  open: Token;
  variants: Separated<Variant>[];
  close: Token;
};

// ---------------------------------------------------------------------------
// Containers

export type TraitItem = Anchored & {
  kind: 'trait';
  head: ItemHead;
  header: Token[];
  open: Token;
  items: Item[];
  close: Token;
};

export type ImplItem = Anchored & {
  kind: 'impl';
  head: ItemHead;
  header: Token[];
  open: Token;
  items: Item[];
  close: Token;
};

export type ModuleItem = Anchored & {
  kind: 'module';
  head: ItemHead;
  header: Token[];
  open: Token;
  items: Item[];
  close: Token;
};

/** Anything not subject to stripping rules. `ghost` marks Verus-only declarations. */
export type OpaqueItem = Anchored & {
  kind: 'opaque';
  head: ItemHead;
  tokens: Token[];
  ghost: boolean;
};

export type Item = FunctionItem | StructItem | EnumItem | TraitItem | ImplItem | ModuleItem | OpaqueItem;

// ---------------------------------------------------------------------------
// Blocks, statements, expressions

export type Block = {
  open: Token;
  stmts: Statement[];
  close: Token;
};

export type ExprPart =
  | { kind: 'token'; token: Token }
  /** `(…)`, `[…]`, or a `{…}` that is not a block (struct literal, match arms). */
  | { kind: 'group'; open: Token; parts: ExprPart[]; close: Token }
  | { kind: 'block'; block: Block }
  /** Loop invariants / decreases between a loop header and its body. */
  | { kind: 'loop-spec'; tokens: Token[] }
  /** `-> T` of a closure; Verus allows the named form `-> (r: T)`. */
  | { kind: 'closure-return'; ret: ReturnType }
  /** `requires`/`ensures` between a closure's parameters (or return type) and its body. */
  | { kind: 'closure-spec'; tokens: Token[] };

export type GhostUnaryOp = 'proof' | 'forall' | 'exists' | 'choose';
export type GhostBinaryOp = 'implies' | 'implied-by' | 'equiv';

export type ExpressionKind =
  | { kind: 'ghost-unary'; op: GhostUnaryOp }
  | { kind: 'view' }
  | { kind: 'big-and' }
  | { kind: 'big-or' }
  | { kind: 'ghost-binary'; op: GhostBinaryOp }
  | { kind: 'assert' }
  | { kind: 'assume' }
  | { kind: 'assert-forall' }
  | { kind: 'macro-call'; name: string }
  | { kind: 'opaque' };

export type Expression = {
  form: ExpressionKind;
  parts: ExprPart[];
};

export type BindingStatement = Anchored & {
  kind: 'binding';
  attrs: Attribute[];
  qualifier: Qualifier;
  /** `let`, qualifier keyword, pattern, type, initializer, `;`. */
  parts: ExprPart[];
};

export type ExpressionStatement = Anchored & {
  kind: 'expression';
  attrs: Attribute[];
  expr: Expression;
  semi: Token | null;
};

export type MacroStatement = Anchored & {
  kind: 'macro';
  attrs: Attribute[];
  /** Last path segment, e.g. `proof` for `proof! { … }`. */
  name: string;
  /** Path, `!`, delimited body and optional `;`, verbatim. */
  tokens: Token[];
};

export type ItemStatement = Anchored & {
  kind: 'item';
  item: Item;
};

export type OtherStatement = Anchored & {
  kind: 'other';
  tokens: Token[];
};

export type Statement = BindingStatement | ExpressionStatement | MacroStatement | ItemStatement | OtherStatement;

export type Program = {
  items: Item[];
  /** End-of-file token; its leading trivia is the file's trailing comments and whitespace. */
  eof: Token;
};
