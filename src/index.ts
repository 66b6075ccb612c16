// Public library surface.

export const VERSION = '0.1.0';

export * from './errors/stripErrors';
export * from './model/ast';
export { tokenize } from './syntax/lexer';
export { parseProgram, classifyExpression } from './syntax/parser';
export { printProgram, normalizeOutput } from './syntax/printer';
export { findSpecBlocks, unwrapSpecBlocks } from './preprocess/blockUnwrapper';
export * from './strip/stripVisitor';
export * from './strip/stripSource';
export { renderContractLines, CONTRACT_COMMENT_HEADER } from './strip/contractComments';
export * from './config/stripConfig';
export { loadConfigFile, parseConfigText } from './config/loadConfigFile';
export * from './process/outcome';
export * from './process/processPath';
export { findSourceFiles } from './process/sourceWalker';
export * from './report/stripReport';
export * from './report/writeReport';
export { reportToMarkdown } from './report/markdownReport';
export type { Logger } from './util/logger';
export { createConsoleLogger, MemoryLogger } from './util/logger';
