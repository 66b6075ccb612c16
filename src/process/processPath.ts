import fs from 'node:fs/promises';
import path from 'node:path';
import { validateStripConfig, type StripConfig } from '../config/stripConfig';
import {
  BatchError,
  ConfigError,
  ReadError,
  WriteError,
  formatErrorLine,
  isStripError,
} from '../errors/stripErrors';
import { stripSource } from '../strip/stripSource';
import { createConsoleLogger, type Logger } from '../util/logger';
import { toPosixPath } from '../util/path';
import { summarize, type FileOutcome, type RunSummary } from './outcome';
import { findSourceFiles } from './sourceWalker';

export type ProcessDeps = {
  logger: Logger;
  /** Default sink for stripped text and check-mode confirmations. */
  stdout: (text: string) => void;
};

function resolveDeps(deps: Partial<ProcessDeps>): ProcessDeps {
  return {
    logger: deps.logger ?? createConsoleLogger(),
    stdout: deps.stdout ?? ((text) => process.stdout.write(text)),
  };
}

/** `fs` errors come from Node's own realm, so they are matched by shape rather than `instanceof Error`. */
function errnoCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

async function statInput(input: string): Promise<'file' | 'directory'> {
  try {
    const stats = await fs.stat(input);
    return stats.isDirectory() ? 'directory' : 'file';
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') throw new ConfigError(`path does not exist: ${input}`);
    throw new ReadError(input, e);
  }
}

async function readSource(file: string): Promise<string> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (e) {
    throw new ReadError(file, e);
  }
}

async function writeOutput(file: string, text: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, text, 'utf8');
  } catch (e) {
    throw new WriteError(file, e);
  }
}

/** Route stripped text to the configured sink. `check` wins over every other sink. */
async function emit(file: string, text: string, config: StripConfig, deps: ProcessDeps): Promise<void> {
  if (config.check) {
    deps.stdout(`✓ ${file} would be stripped successfully\n`);
    return;
  }
  if (config.inPlace) {
    await writeOutput(file, text);
    deps.logger.debug(`Stripped ${file} in place`);
    return;
  }
  if (config.output !== undefined) {
    await writeOutput(config.output, text);
    deps.logger.debug(`Stripped ${file} -> ${config.output}`);
    return;
  }
  try {
    deps.stdout(text);
  } catch (e) {
    throw new WriteError(undefined, e);
  }
}

/** Strip one file. Pipeline failures come back as a `failed` outcome; anything else propagates. */
export async function processFile(file: string, config: StripConfig, deps: Partial<ProcessDeps> = {}): Promise<FileOutcome> {
  const resolved = resolveDeps(deps);
  try {
    const source = await readSource(file);
    const result = stripSource(source, { fileName: toPosixPath(file), specAsComments: config.specAsComments });
    if (result.empty && !config.keepEmpty) {
      resolved.logger.warn(`Warning: ${file} contained only specification code; the stripped output is empty`);
    }
    for (const w of result.warnings) resolved.logger.debug(`${file}:${w.line}:${w.column}: ${w.message}`);
    await emit(file, result.text, config, resolved);
    return { status: 'ok', file, warnings: result.warnings, stats: result.stats, empty: result.empty };
  } catch (e) {
    if (isStripError(e)) return { status: 'failed', file, error: e };
    throw e;
  }
}

async function processDirectory(dir: string, config: StripConfig, deps: ProcessDeps): Promise<RunSummary> {
  if (!config.recursive) {
    throw new ConfigError(`${dir} is a directory`, 'Use --recursive to process every .rs file under it');
  }
  if (config.output !== undefined) {
    throw new ConfigError('--output cannot be used with a directory input', 'Use --in-place or --check when processing a directory');
  }

  const files = await findSourceFiles({ sourceRoot: dir });
  const outcomes: FileOutcome[] = [];
  for (const rel of files) {
    const outcome = await processFile(path.join(dir, rel), config, deps);
    if (outcome.status === 'failed') deps.logger.error(`Error processing ${outcome.file}: ${formatErrorLine(outcome.error)}`);
    outcomes.push(outcome);
  }

  const summary = summarize(dir, 'directory', outcomes);
  deps.logger.info(`Processed ${summary.processed} files (${summary.failed} errors)`);
  if (summary.failed > 0) throw new BatchError(summary);
  return summary;
}

/**
 * Strip a file, or every `.rs` file under a directory when `recursive` is
 * set. Configuration problems are raised before any file is touched. In
 * directory mode a failing file does not stop the walk; the failures are
 * raised together as a `BatchError` at the end.
 */
export async function processPath(input: string, config: StripConfig, deps: Partial<ProcessDeps> = {}): Promise<RunSummary> {
  const resolved = resolveDeps(deps);
  validateStripConfig(config);

  if ((await statInput(input)) === 'directory') return processDirectory(input, config, resolved);

  const outcome = await processFile(input, config, resolved);
  if (outcome.status === 'failed') throw outcome.error;
  return summarize(input, 'file', [outcome]);
}
