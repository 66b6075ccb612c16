import type { ReportFinding, StripReport } from './stripReport';

function fmtLoc(f: ReportFinding): string {
  if (!f.location) return '';
  const { file, line, column } = f.location;
  if (line && column) return `${file}:${line}:${column}`;
  if (line) return `${file}:${line}`;
  return file;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function pushCountTable(lines: string[], counts: Record<string, number>): void {
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const keys = Object.keys(counts).sort((a, b) => a.localeCompare(b));
  for (const k of keys) lines.push(`| ${k} | ${counts[k]} |`);
  if (keys.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');
}

export function reportToMarkdown(report: StripReport): string {
  const lines: string[] = [];
  const errors = report.findings.filter((f) => f.severity === 'error');

  lines.push(`# Strip report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Input: \`${report.input}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files processed: **${report.filesProcessed}**`);
  lines.push(`- Files failed: **${report.filesFailed}**`);
  lines.push(`- Findings: **${report.findings.length}** (errors: **${errors.length}**)`);
  lines.push('');

  lines.push(`## Removed by kind`);
  lines.push('');
  pushCountTable(lines, report.counts.removedByKind);

  lines.push(`## Findings summary`);
  lines.push('');
  pushCountTable(lines, countByKind(report.findings));

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${fmtLoc(f)} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
