import type { Program } from '../model/ast';
import { unwrapSpecBlocks } from '../preprocess/blockUnwrapper';
import { parseProgram } from '../syntax/parser';
import { printProgram } from '../syntax/printer';
import { stripProgram, type StripStats, type StripWarning } from './stripVisitor';

export type StripSourceOptions = {
  /** Used in parse error locations. */
  fileName?: string;
  specAsComments?: boolean;
};

export type StripSourceResult = {
  text: string;
  program: Program;
  warnings: StripWarning[];
  stats: StripStats;
  /** No code was left after stripping. */
  empty: boolean;
};

/** Unwrap, parse, strip and print one source text. Throws `StructuralError` or `ParseError`. */
export function stripSource(source: string, options: StripSourceOptions = {}): StripSourceResult {
  const unwrapped = unwrapSpecBlocks(source);
  const parsed = parseProgram(unwrapped, options.fileName);
  const { program, warnings, stats } = stripProgram(parsed, { renderContractsAsComments: options.specAsComments });
  const text = printProgram(program);
  return { text, program, warnings, stats, empty: program.items.length === 0 };
}
