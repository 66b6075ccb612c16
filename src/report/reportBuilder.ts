import type { ReportFinding, StripReport } from './stripReport';

export function addFinding(report: StripReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}
