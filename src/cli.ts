#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfigFile } from './config/loadConfigFile';
import { createStripConfig, type StripConfig } from './config/stripConfig';
import { BatchError, formatErrorReport, isStripError } from './errors/stripErrors';
import { VERSION } from './index';
import { processPath } from './process/processPath';
import type { RunSummary } from './process/outcome';
import { toCliOptions, type StripCliOptions } from './cli/args';
import { createEmptyReport, finalizeReport, recordFailure, recordRun, type StripReport } from './report/stripReport';
import { writeReportFile } from './report/writeReport';
import { createConsoleLogger, type Logger } from './util/logger';

export type RunStripDeps = {
  logger?: Logger;
  stdout?: (text: string) => void;
};

async function resolveConfig(opts: StripCliOptions): Promise<StripConfig> {
  const fromFile = opts.config ? await loadConfigFile(opts.config) : {};
  return createStripConfig(fromFile, opts.flags);
}

/** Run one strip invocation and return the process exit code. */
export async function runStrip(opts: StripCliOptions, deps: RunStripDeps = {}): Promise<number> {
  const logger = deps.logger ?? createConsoleLogger({ verbose: opts.verbose });
  const report: StripReport | undefined = opts.report
    ? createEmptyReport({ toolName: 'verus-strip', toolVersion: VERSION, input: opts.input })
    : undefined;

  let exitCode = 0;
  let summary: RunSummary | undefined;
  try {
    const config = await resolveConfig(opts);
    summary = await processPath(opts.input, config, { logger, stdout: deps.stdout });
  } catch (e) {
    if (!isStripError(e)) throw e;
    exitCode = 1;
    if (e instanceof BatchError) summary = e.summary;
    else if (report) {
      if (e.code !== 'E_CONFIG') report.filesProcessed++;
      recordFailure(report, opts.input, e);
    }
    for (const line of formatErrorReport(e)) logger.error(line);
  }

  if (report && opts.report) {
    if (summary) recordRun(report, summary);
    await writeReportFile(opts.report, finalizeReport(report), opts.reportFormat);
    logger.debug(`Wrote report: ${opts.report}`);
  }
  return exitCode;
}

async function main(argv: string[]): Promise<number> {
  const program = new Command();

  program
    .name('verus-strip')
    .description('Remove Verus verification annotations from Rust source, leaving plain executable Rust')
    .version(VERSION)
    .argument('<input>', 'Rust source file, or a directory with --recursive')
    .option('-o, --output <file>', 'Write stripped output to a file instead of stdout')
    .option('-i, --in-place', 'Overwrite the input file(s)')
    .option('-r, --recursive', 'Process every .rs file under a directory')
    .option('--check', 'Verify that stripping succeeds without writing output')
    .option('--keep-empty', 'Do not warn when a file becomes empty')
    .option('--spec-as-comments', 'Keep function contracts as comments above each function')
    .option('--config <file>', 'JSON config file; command-line flags override it')
    .option('--report <file>', 'Write a run report to this file')
    .option('--report-format <format>', 'json|md (default md)')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (input: string, raw: Record<string, unknown>) => {
      process.exitCode = await runStrip(toCliOptions(input, raw));
    });

  try {
    await program.parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (e) {
    const lines = isStripError(e) ? formatErrorReport(e) : [`Error: ${e instanceof Error ? e.message : String(e)}`];
    // eslint-disable-next-line no-console
    for (const line of lines) console.error(line);
    return 1;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  void main(process.argv).then((code) => {
    process.exitCode = code;
  });
}
