import type { StripError } from '../errors/stripErrors';
import type { StripStats, StripWarning } from '../strip/stripVisitor';

export type FileOutcome =
  | {
      status: 'ok';
      file: string;
      warnings: StripWarning[];
      stats: StripStats;
      /** Nothing but specification code was in the file. */
      empty: boolean;
    }
  | {
      status: 'failed';
      file: string;
      error: StripError;
    };

export type RunSummary = {
  input: string;
  mode: 'file' | 'directory';
  processed: number;
  failed: number;
  warnings: number;
  outcomes: FileOutcome[];
};

export function summarize(input: string, mode: RunSummary['mode'], outcomes: FileOutcome[]): RunSummary {
  return {
    input,
    mode,
    processed: outcomes.length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    warnings: outcomes.reduce((n, o) => n + (o.status === 'ok' ? o.warnings.length : 0), 0),
    outcomes,
  };
}
