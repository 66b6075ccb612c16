import Ajv from 'ajv/dist/2020';

import { ParseError } from '../../errors/stripErrors';
import type { RunSummary } from '../../process/outcome';
import { emptyStats } from '../../strip/stripVisitor';
import reportSchema from '../schema/strip-report-v1.json';
import { createEmptyReport, finalizeReport, recordFailure, recordRun, serializeReport } from '../stripReport';

function sampleSummary(): RunSummary {
  return {
    input: 'crate',
    mode: 'directory',
    processed: 3,
    failed: 1,
    warnings: 1,
    outcomes: [
      {
        status: 'ok',
        file: 'crate/a.rs',
        warnings: [{ kind: 'all-params-ghost', message: 'every parameter of `f` was ghost or tracked', line: 3, column: 4 }],
        stats: { ...emptyStats(), functionsRemoved: 2, paramsRemoved: 1 },
        empty: false,
      },
      { status: 'ok', file: 'crate/spec.rs', warnings: [], stats: { ...emptyStats(), functionsRemoved: 1 }, empty: true },
      {
        status: 'failed',
        file: 'crate/bad.rs',
        error: new ParseError("unclosed delimiter '{'", { file: 'crate/bad.rs', line: 1, column: 7 }),
      },
    ],
  };
}

describe('strip report', () => {
  test('folds a run summary into counts and findings', () => {
    const report = createEmptyReport({ toolName: 'verus-strip', toolVersion: '0.0.0', input: 'crate' });
    recordRun(report, sampleSummary());

    expect(report.filesProcessed).toBe(3);
    expect(report.filesFailed).toBe(1);
    expect(report.counts.removedByKind).toEqual({ functionsRemoved: 3, paramsRemoved: 1 });
    expect(report.findings).toEqual([
      {
        kind: 'allParamsGhost',
        severity: 'warning',
        message: 'every parameter of `f` was ghost or tracked',
        location: { file: 'crate/a.rs', line: 3, column: 4 },
      },
      { kind: 'emptyOutput', severity: 'info', message: 'no code left after stripping', location: { file: 'crate/spec.rs' } },
      {
        kind: 'parseError',
        severity: 'error',
        message: "crate/bad.rs:1:7: unclosed delimiter '{'",
        location: { file: 'crate/bad.rs', line: 1, column: 7 },
      },
    ]);
  });

  test('records a failure without a summary', () => {
    const report = createEmptyReport({ toolName: 'verus-strip', toolVersion: '0.0.0', input: 'x.rs' });
    recordFailure(report, 'x.rs', new ParseError('boom'));
    expect(report.filesFailed).toBe(1);
    expect(report.findings).toEqual([{ kind: 'parseError', severity: 'error', message: 'boom', location: { file: 'x.rs' } }]);
  });

  test('serializes deterministically and validates against strip-report-v1.json', () => {
    const report = createEmptyReport({
      toolName: 'verus-strip',
      toolVersion: '0.0.0',
      input: 'crate',
      startedAtIso: '2024-01-01T00:00:00.000Z',
    });
    recordRun(report, sampleSummary());
    finalizeReport(report, '2024-01-01T00:00:01.000Z');

    const json = serializeReport(report);
    expect(serializeReport(report)).toBe(json);
    expect(json.indexOf('"counts"')).toBeLessThan(json.indexOf('"findings"'));

    const ajv = new Ajv({ allErrors: true, strict: false });
    const validate = ajv.compile(reportSchema);
    const ok = validate(JSON.parse(json));
    if (!ok) {
      // eslint-disable-next-line no-console
      console.error(validate.errors);
    }
    expect(ok).toBe(true);
  });
});
