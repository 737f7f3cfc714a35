import type { MigrationReport, ReportFinding } from './migrationReport';
import { compareReportFindings } from './migrationReport';

function fmtLoc(f: ReportFinding): string {
  if (!f.location) return '';
  const { file, line, column } = f.location;
  if (line && column) return `${file}:${line}:${column}`;
  if (line) return `${file}:${line}`;
  return file;
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function countByFile(findings: ReportFinding[]): Array<{ file: string; count: number }> {
  const m = new Map<string, number>();
  for (const f of findings) {
    const file = f.location?.file ?? '(unknown)';
    m.set(file, (m.get(file) ?? 0) + 1);
  }
  const arr = Array.from(m.entries()).map(([file, count]) => ({ file, count }));
  arr.sort((a, b) => b.count - a.count || a.file.localeCompare(b.file));
  return arr;
}

export function reportToMarkdown(report: MigrationReport): string {
  const lines: string[] = [];
  const fixable = report.findings.filter((f) => f.fixable);

  lines.push(`# Migration report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Project root: \`${report.projectRoot}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files scanned: **${report.filesScanned}**`);
  lines.push(`- Files processed: **${report.filesProcessed}**`);
  lines.push(`- Findings: **${report.findings.length}** (fixable: **${fixable.length}**)`);
  lines.push(`- Fixes applied: **${report.counts.fixesApplied}**, declined: **${report.counts.fixesDeclined}**`);
  lines.push('');

  lines.push(`## Findings by rule`);
  lines.push('');
  lines.push(`| Rule | Count |`);
  lines.push(`|---|---:|`);
  const kinds = Object.keys(report.counts.findingsByKind).sort((a, b) => a.localeCompare(b));
  for (const k of kinds) lines.push(`| ${k} | ${report.counts.findingsByKind[k]} |`);
  if (kinds.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  const byFile = countByFile(report.findings);
  if (byFile.length > 0) {
    lines.push(`## Files with most findings`);
    lines.push('');
    lines.push(`| Count | File |`);
    lines.push(`|---:|---|`);
    for (const t of byFile.slice(0, 20)) lines.push(`| ${t.count} | ${escapeCell(t.file)} |`);
    lines.push('');
  }

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Rule | Location | Fixable | Message |`);
  lines.push(`|---|---|---|---|---|`);
  const all = [...report.findings].sort(compareReportFindings);
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${fmtLoc(f)} | ${f.fixable ? 'yes' : 'no'} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |  |`);
  lines.push('');
  return lines.join('\n');
}
