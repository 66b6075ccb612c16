/** Rust keywords that can never start a call target or a struct literal path. */
export const RUST_KEYWORDS = new Set([
  'as',
  'async',
  'await',
  'break',
  'const',
  'continue',
  'crate',
  'dyn',
  'else',
  'enum',
  'extern',
  'false',
  'fn',
  'for',
  'if',
  'impl',
  'in',
  'let',
  'loop',
  'match',
  'mod',
  'move',
  'mut',
  'pub',
  'ref',
  'return',
  'static',
  'struct',
  'trait',
  'true',
  'type',
  'unsafe',
  'use',
  'where',
  'while',
  'yield',
]);

/** Keywords after which a `{` opens a block rather than a struct literal. */
export const BLOCK_PREFIX_KEYWORDS = new Set(['else', 'loop', 'unsafe', 'move', 'async', 'const', 'return', 'break', 'in', 'try']);

/** Function signature clauses. `decreases` is parsed but never rendered. */
export const CONTRACT_KEYWORDS = new Set([
  'requires',
  'recommends',
  'ensures',
  'default_ensures',
  'returns',
  'opens_invariants',
  'no_unwind',
  'decreases',
]);

/** Clauses that may sit between a loop header and its body. */
export const LOOP_SPEC_KEYWORDS = new Set(['invariant', 'invariant_except_break', 'invariant_ensures', 'ensures', 'decreases']);

/** Mode and publish keywords that may precede `fn` (or `const`) in an item head. */
export const MODE_KEYWORDS = new Set(['spec', 'proof', 'exec', 'axiom', 'open', 'closed', 'broadcast', 'uninterp']);

/** Plain Rust qualifiers that may precede `fn`. */
export const FN_QUALIFIERS = new Set(['const', 'async', 'unsafe', 'extern', 'default']);

/** Proof-only macros removed wholesale when used as statements. */
export const PROOF_MACROS = new Set(['proof', 'calc', 'assert_forall_by', 'assert_by', 'open_invariant', 'open_local_invariant']);

/** Quantifier keywords: `forall|x| ...`, `exists|x| ...`, `choose|x| ...`. */
export const QUANTIFIERS = new Set(['forall', 'exists', 'choose']);

/** Attribute namespaces that only the verifier reads. */
export const VERIFIER_ATTRIBUTE_ROOTS = new Set(['verifier', 'verus', 'trigger']);

/** `use` roots that only exist for verification. */
export const VERIFIER_USE_ROOTS = new Set(['vstd', 'builtin', 'builtin_macros']);

/** Type constructors that wrap ghost and tracked data in executable signatures. */
export const GHOST_WRAPPERS = new Set(['Ghost', 'Tracked']);
