import { ParseError, type StripError } from '../errors/stripErrors';
import type { RunSummary } from '../process/outcome';
import type { StripStats, StripWarningKind } from '../strip/stripVisitor';
import { stableStringify } from '../util/deterministicJson';
import { toPosixPath } from '../util/path';
import { addFinding, incCount } from './reportBuilder';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** File path as given on the command line, posix separators. */
  file: string;
  /** 1-based line number. */
  line?: number;
  /** 1-based column number. */
  column?: number;
};

export type ReportFindingKind =
  | 'structureError'
  | 'parseError'
  | 'readError'
  | 'writeError'
  | 'configError'
  | 'batchError'
  | 'emptyOutput'
  | 'defensiveRemoval'
  | 'allParamsGhost'
  | 'emptyStruct';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
};

export type StripReport = {
  schema: 'strip-report-v1';
  tool: { name: string; version: string };
  input: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesProcessed: number;
  filesFailed: number;
  counts: {
    /** Removed node counts, keyed by `StripStats` field. */
    removedByKind: Record<string, number>;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  input: string;
  startedAtIso?: string;
}): StripReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'strip-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    input: toPosixPath(args.input),
    startedAtIso: now,
    finishedAtIso: now,
    filesProcessed: 0,
    filesFailed: 0,
    counts: { removedByKind: {} },
    findings: [],
  };
}

export function finalizeReport(report: StripReport, finishedAtIso?: string): StripReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: StripReport): string {
  return stableStringify(report);
}

const ERROR_KINDS: Record<StripError['code'], ReportFindingKind> = {
  E_STRUCTURE: 'structureError',
  E_PARSE: 'parseError',
  E_READ: 'readError',
  E_WRITE: 'writeError',
  E_CONFIG: 'configError',
  E_BATCH: 'batchError',
};

const WARNING_KINDS: Record<StripWarningKind, ReportFindingKind> = {
  'defensive-removal': 'defensiveRemoval',
  'all-params-ghost': 'allParamsGhost',
  'empty-struct': 'emptyStruct',
};

function addStats(report: StripReport, stats: StripStats): void {
  for (const [key, value] of Object.entries(stats)) {
    if (value > 0) incCount(report.counts.removedByKind, key, value);
  }
}

/** Record a failure that has a file but no run summary, e.g. a single-file run. */
export function recordFailure(report: StripReport, file: string, error: StripError): void {
  report.filesFailed++;
  const location: ReportLocation =
    error instanceof ParseError && error.location
      ? { file: toPosixPath(file), line: error.location.line, column: error.location.column }
      : { file: toPosixPath(file) };
  addFinding(report, { kind: ERROR_KINDS[error.code], severity: 'error', message: error.message, location });
}

export function recordRun(report: StripReport, summary: RunSummary): void {
  for (const outcome of summary.outcomes) {
    report.filesProcessed++;
    if (outcome.status === 'failed') {
      recordFailure(report, outcome.file, outcome.error);
      continue;
    }
    const file = toPosixPath(outcome.file);
    addStats(report, outcome.stats);
    for (const w of outcome.warnings) {
      addFinding(report, {
        kind: WARNING_KINDS[w.kind],
        severity: 'warning',
        message: w.message,
        location: { file, line: w.line, column: w.column },
      });
    }
    if (outcome.empty) {
      addFinding(report, { kind: 'emptyOutput', severity: 'info', message: 'no code left after stripping', location: { file } });
    }
  }
}
