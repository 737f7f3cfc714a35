import type { MigrationReport, ReportFinding } from './migrationReport';

export function addFinding(report: MigrationReport, finding: ReportFinding): void {
  report.findings.push(finding);
  incCount(report.counts.findingsByKind, finding.kind);
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}

/** Findings produced by the migration rules (parse errors excluded). */
export function ruleFindings(report: MigrationReport): ReportFinding[] {
  return report.findings.filter((f) => f.kind !== 'parseError');
}
