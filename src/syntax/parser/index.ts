import type { Program } from '../../model/ast';
import { tokenize } from '../lexer';
import { parseItems } from './items';
import { Parser } from './parser';

/** Parse a whole file. `verus!` wrappers must already be removed. */
export function parseProgram(source: string, fileName = '<string>'): Program {
  const parser = new Parser(tokenize(source, fileName), fileName);
  const items = parseItems(parser, parser.eofIndex);
  return { items, eof: parser.at(parser.eofIndex) };
}

export { classifyExpression } from './classify';
