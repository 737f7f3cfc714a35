import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { main, runCheck, type CheckOptions } from '../cli';
import type { MigrationReport } from '../report/migrationReport';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function mkTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'mvvm-migrate-cli-'));
}

function readReport(p: string): MigrationReport {
  return JSON.parse(fs.readFileSync(p, 'utf8'));
}

const cs = (...lines: string[]): string => lines.join('\n') + '\n';

const VIEW_MODEL = cs(
  'public class VM',
  '{',
  '    private string _name;',
  '',
  '    public string Name',
  '    {',
  '        get => _name;',
  '        set { _name = value; OnPropertyChanged(); }',
  '    }',
  '}',
);

function checkOptions(source: string, overrides: Partial<CheckOptions> = {}): CheckOptions {
  return { source, exclude: [], format: 'json', failOnFindings: false, verbose: false, ...overrides };
}

let logged: string[];

beforeEach(() => {
  logged = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    logged.push(args.map(String).join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('check', () => {
  test('exits 3 with --fail-on-findings and prints one line per finding', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'ViewModels', 'VM.cs'), VIEW_MODEL);
    const report = path.join(dir, 'out', 'report.json');

    const code = await runCheck(checkOptions(dir, { report, failOnFindings: true }));

    expect(code).toBe(3);
    expect(logged).toContain(
      "ViewModels/VM.cs:5:19: error notified-setter: Property 'Name' raises change notifications manually; convert it to [ObservableProperty]",
    );
    const r = readReport(report);
    expect(r.filesScanned).toBe(1);
    expect(r.counts.findingsByKind).toEqual({ 'notified-setter': 1 });
    expect(fs.readFileSync(path.join(dir, 'ViewModels', 'VM.cs'), 'utf8')).toBe(VIEW_MODEL);
  });

  test('records unparsable files without failing the run', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'Broken.cs'), cs('class A', '{', '    void M( { }', '}'));
    const report = path.join(dir, 'report.json');

    expect(await runCheck(checkOptions(dir, { report, failOnFindings: true }))).toBe(0);
    const r = readReport(report);
    expect(r.filesProcessed).toBe(0);
    expect(r.findings.map((f) => [f.kind, f.location?.file])).toEqual([['parseError', 'Broken.cs']]);
  });

  test('skips generated sources unless asked to include them', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'Gen.cs'), '// <auto-generated />\n' + VIEW_MODEL);

    expect(await runCheck(checkOptions(dir, { failOnFindings: true }))).toBe(0);
    expect(await runCheck(checkOptions(dir, { failOnFindings: true, includeGenerated: true }))).toBe(3);
  });

  test('honours rules disabled in mvvm-migrate.json', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'VM.cs'), VIEW_MODEL);
    writeFile(path.join(dir, 'mvvm-migrate.json'), JSON.stringify({ rules: { 'notified-setter': { enabled: false } } }));

    expect(await runCheck(checkOptions(dir, { failOnFindings: true }))).toBe(0);
  });

  test('exits 2 on an invalid configuration file', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'VM.cs'), VIEW_MODEL);
    writeFile(path.join(dir, 'mvvm-migrate.json'), '{ "exclude": 3 }');

    expect(await runCheck(checkOptions(dir))).toBe(2);
  });
});

describe('fix', () => {
  const FIXED = cs(
    'using CommunityToolkit.Mvvm.ComponentModel;',
    '',
    'public class VM',
    '{',
    '    [ObservableProperty]',
    '    public partial string Name { get; set; }',
    '}',
  );

  test('dry run reports the fix without writing', async () => {
    const dir = mkTmpDir();
    const file = path.join(dir, 'VM.cs');
    writeFile(file, VIEW_MODEL);

    expect(await main(['node', 'mvvm-migrate', 'fix', '--source', dir])).toBe(0);
    expect(fs.readFileSync(file, 'utf8')).toBe(VIEW_MODEL);
    expect(logged).toContain('Would fix 1 finding(s) in 1 file(s); 0 finding(s) remain.');
  });

  test('--write rewrites the file and reports the applied fix', async () => {
    const dir = mkTmpDir();
    const file = path.join(dir, 'VM.cs');
    const report = path.join(dir, 'report.json');
    writeFile(file, VIEW_MODEL);

    const code = await main(['node', 'mvvm-migrate', 'fix', '--source', dir, '--write', '--report', report, '--format', 'json']);

    expect(code).toBe(0);
    expect(fs.readFileSync(file, 'utf8')).toBe(FIXED);
    const r = readReport(report);
    expect(r.counts.fixesApplied).toBe(1);
    expect(r.findings).toEqual([]);
  });
});

describe('main', () => {
  test('exits 1 when --source is missing', async () => {
    expect(await main(['node', 'mvvm-migrate', 'check'])).toBe(1);
  });

  test('exits 2 on an unknown rule id', async () => {
    const dir = mkTmpDir();
    expect(await main(['node', 'mvvm-migrate', 'check', '--source', dir, '--rules', 'bogus'])).toBe(2);
  });

  test('scan writes the findings per file and rule', async () => {
    const dir = mkTmpDir();
    writeFile(path.join(dir, 'A.cs'), 'class A { }\n');
    writeFile(path.join(dir, 'ViewModels', 'VM.cs'), VIEW_MODEL);
    writeFile(path.join(dir, 'Gen.cs'), '// <auto-generated />\n' + VIEW_MODEL);
    const out = path.join(dir, 'inv.json');

    expect(await main(['node', 'mvvm-migrate', 'scan', '--source', dir, '--out', out])).toBe(0);
    const inv = JSON.parse(fs.readFileSync(out, 'utf8'));
    expect(inv.files).toEqual([
      { file: 'A.cs', status: 'analyzed', findingsByRule: {}, fixable: 0 },
      { file: 'Gen.cs', status: 'generated', findingsByRule: {}, fixable: 0 },
      { file: 'ViewModels/VM.cs', status: 'analyzed', findingsByRule: { 'notified-setter': 1 }, fixable: 1 },
    ]);
    expect(inv.totals).toEqual({ files: 3, filesWithFindings: 1, findingsByRule: { 'notified-setter': 1 }, fixable: 1 });
  });
});
