import type { Finding, RuleId, Severity } from '../rules/types';
import { stableStringify } from '../util/deterministicJson';
import { hashId } from '../util/id';

export type ReportSeverity = Severity;

export type ReportLocation = {
  /** Relative file path (posix) within the scanned project root. */
  file: string;
  /** 1-based line number. */
  line?: number;
  /** 1-based column number. */
  column?: number;
};

export type ReportFindingKind = RuleId | 'parseError';

export type ReportFinding = {
  /** Stable across runs as long as the file, type and property names stay the same. */
  id: string;
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
  fixable: boolean;
  tags?: Record<string, string>;
};

export type MigrationReport = {
  schema: 'migration-report-v1';
  tool: { name: string; version: string };
  projectRoot: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesScanned: number;
  filesProcessed: number;
  counts: {
    findingsByKind: Record<string, number>;
    fixesApplied: number;
    fixesDeclined: number;
  };
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  projectRoot: string;
  startedAtIso?: string;
}): MigrationReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'migration-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    projectRoot: args.projectRoot,
    startedAtIso: now,
    finishedAtIso: now,
    filesScanned: 0,
    filesProcessed: 0,
    counts: { findingsByKind: {}, fixesApplied: 0, fixesDeclined: 0 },
    findings: [],
  };
}

export function reportFindingFrom(file: string, f: Finding): ReportFinding {
  return {
    id: hashId('f:', `${f.ruleId}|${file}|${f.containerName}.${f.propertyName}`),
    kind: f.ruleId,
    severity: f.severity,
    message: f.message,
    location: { file, line: f.line, column: f.column },
    fixable: f.fixable,
    tags: { container: f.containerName, property: f.propertyName },
  };
}

export function parseErrorFinding(file: string, message: string, line: number, column: number): ReportFinding {
  return {
    id: hashId('p:', file),
    kind: 'parseError',
    severity: 'warning',
    message: `Skipped: ${message}`,
    location: { file, line, column },
    fixable: false,
  };
}

function locationKey(f: ReportFinding): [string, number, number] {
  return [f.location?.file ?? '', f.location?.line ?? 0, f.location?.column ?? 0];
}

export function compareReportFindings(a: ReportFinding, b: ReportFinding): number {
  const [af, al, ac] = locationKey(a);
  const [bf, bl, bc] = locationKey(b);
  return af.localeCompare(bf) || al - bl || ac - bc || a.kind.localeCompare(b.kind);
}

export function finalizeReport(report: MigrationReport, finishedAtIso?: string): MigrationReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  report.findings.sort(compareReportFindings);
  return report;
}

export function serializeReport(report: MigrationReport): string {
  return stableStringify(report);
}
