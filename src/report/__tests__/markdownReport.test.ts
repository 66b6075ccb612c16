import { reportToMarkdown } from '../markdownReport';
import { createEmptyReport } from '../stripReport';

describe('markdownReport', () => {
  test('renders stable sections even when empty', () => {
    const r = createEmptyReport({ toolName: 'verus-strip', toolVersion: '0.0.0', input: 'src' });
    const md = reportToMarkdown(r);

    expect(md).toContain('# Strip report');
    expect(md).toContain('- Input: `src`');
    expect(md).toContain('## Removed by kind');
    expect(md).toContain('| (none) | 0 |');
    expect(md).toContain('## Findings summary');
    expect(md).toContain('| (none) | (none) |  |  |');
  });

  test('escapes pipes and sorts findings deterministically', () => {
    const r = createEmptyReport({ toolName: 'verus-strip', toolVersion: '0.0.0', input: 'src' });
    r.counts.removedByKind.paramsRemoved = 2;
    r.findings.push(
      { kind: 'parseError', severity: 'error', message: "expected '|' here", location: { file: 'b.rs', line: 2, column: 1 } },
      { kind: 'emptyOutput', severity: 'info', message: 'no code left after stripping', location: { file: 'a.rs' } },
      { kind: 'parseError', severity: 'error', message: 'other', location: { file: 'a.rs', line: 1 } },
    );
    const md = reportToMarkdown(r);

    expect(md).toContain("expected '\\|' here");
    expect(md).toContain('| paramsRemoved | 2 |');
    expect(md).toContain('| parseError | 2 |');

    const rows = md.split('\n').filter((l) => l.startsWith('| info |') || l.startsWith('| error |'));
    expect(rows).toEqual([
      '| info | emptyOutput | a.rs | no code left after stripping |',
      '| error | parseError | a.rs:1 | other |',
      "| error | parseError | b.rs:2:1 | expected '\\|' here |",
    ]);
  });
});
