import type {
  Anchored,
  Attribute,
  Block,
  ExprPart,
  FieldList,
  FunctionItem,
  Item,
  ItemHead,
  Program,
  Separated,
  Statement,
} from '../model/ast';
import type { Token } from './token';

const TRAILING_SPACES = /[ \t]+(?=\r?\n)/g;

function cleanTrivia(trivia: string): string {
  return trivia.replace(TRAILING_SPACES, '');
}

/**
 * Re-emits a (possibly stripped) tree from its tokens.
 *
 * An anchored node prints its own `leading` trivia in place of its first
 * token's. When that token was removed, the first surviving token keeps only
 * the comments from its own leading trivia.
 */
export class Printer {
  private readonly out: string[] = [];
  private anchorStart: Token | null = null;

  print(program: Program): string {
    for (const item of program.items) this.item(item);
    this.flushAnchor();
    this.out.push(cleanTrivia(program.eof.leading));
    return normalizeOutput(this.out.join(''));
  }

  private anchor(node: Anchored): void {
    this.out.push(cleanTrivia(node.leading));
    this.anchorStart = node.start;
  }

  /** An anchored node printed no tokens at all. */
  private flushAnchor(): void {
    this.anchorStart = null;
  }

  private token(tok: Token): void {
    let leading = tok.leading;
    if (this.anchorStart) {
      leading = tok === this.anchorStart ? '' : tok.leading.replace(/^\s+/, '');
      this.anchorStart = null;
    }
    this.out.push(cleanTrivia(leading), tok.text, tok.trailing);
  }

  private tokens(tokens: readonly Token[]): void {
    for (const tok of tokens) this.token(tok);
  }

  private attrs(attrs: readonly Attribute[]): void {
    for (const attr of attrs) this.tokens(attr.tokens);
  }

  private head(head: ItemHead): void {
    this.attrs(head.attrs);
    for (const t of head.tokens) this.token(t.token);
  }

  private separated<T extends Anchored>(list: readonly Separated<T>[], print: (node: T) => void): void {
    for (const { node, comma } of list) {
      this.anchor(node);
      print(node);
      this.flushAnchor();
      if (comma) this.token(comma);
    }
  }

  private item(item: Item): void {
    this.anchor(item);
    this.head(item.head);
    switch (item.kind) {
      case 'function':
        this.function(item);
        break;
      case 'struct':
        this.tokens(item.header);
        if (item.fields) this.fieldList(item.fields);
        this.tokens(item.trailer);
        break;
      case 'enum':
        this.tokens(item.header);
        this.token(item.open);
        this.separated(item.variants, (variant) => {
          this.tokens(variant.tokens);
          if (variant.fields) this.fieldList(variant.fields);
          this.tokens(variant.trailer);
        });
        this.token(item.close);
        break;
      case 'trait':
      case 'impl':
      case 'module':
        this.tokens(item.header);
        this.token(item.open);
        for (const child of item.items) this.item(child);
        this.token(item.close);
        break;
      case 'opaque':
        this.tokens(item.tokens);
        break;
    }
    this.flushAnchor();
  }

  private function(fn: FunctionItem): void {
    this.token(fn.fnToken);
    this.token(fn.name);
    this.tokens(fn.generics);
    this.token(fn.params.open);
    this.separated(fn.params.params, (param) => this.tokens(param.tokens));
    this.token(fn.params.close);
    if (fn.ret) {
      this.token(fn.ret.arrow);
      this.tokens(fn.ret.tokens);
    }
    this.tokens(fn.whereClause);
    this.tokens(fn.contract.tokens);
    if (fn.body) this.block(fn.body);
    if (fn.semi) this.token(fn.semi);
  }

  private fieldList(list: FieldList): void {
    this.token(list.open);
    this.separated(list.fields, (field) => this.tokens(field.tokens));
    this.token(list.close);
  }

  private block(block: Block): void {
    this.token(block.open);
    for (const stmt of block.stmts) this.statement(stmt);
    this.token(block.close);
  }

  private statement(stmt: Statement): void {
    if (stmt.kind === 'item') {
      this.item(stmt.item);
      return;
    }
    this.anchor(stmt);
    switch (stmt.kind) {
      case 'binding':
        this.attrs(stmt.attrs);
        this.parts(stmt.parts);
        break;
      case 'expression':
        this.attrs(stmt.attrs);
        this.parts(stmt.expr.parts);
        if (stmt.semi) this.token(stmt.semi);
        break;
      case 'macro':
        this.attrs(stmt.attrs);
        this.tokens(stmt.tokens);
        break;
      case 'other':
        this.tokens(stmt.tokens);
        break;
    }
    this.flushAnchor();
  }

  private parts(parts: readonly ExprPart[]): void {
    for (const part of parts) {
      switch (part.kind) {
        case 'token':
          this.token(part.token);
          break;
        case 'group':
          this.token(part.open);
          this.parts(part.parts);
          this.token(part.close);
          break;
        case 'block':
          this.block(part.block);
          break;
        case 'loop-spec':
        case 'closure-spec':
          this.tokens(part.tokens);
          break;
        case 'closure-return':
          this.token(part.ret.arrow);
          this.tokens(part.ret.tokens);
          break;
      }
    }
  }
}

/**
 * Drop blank lines at the start and end with exactly one newline. A file with
 * no code left prints as the empty string.
 */
export function normalizeOutput(text: string): string {
  const body = text.replace(/^(?:[ \t]*\r?\n)+/, '').trimEnd();
  return body === '' ? '' : `${body}\n`;
}

export function printProgram(program: Program): string {
  return new Printer().print(program);
}
