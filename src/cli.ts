#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import fs from 'node:fs/promises';
import path from 'node:path';
import { optionalString, parseBoolish, parseFormat, parseIntish, parseRuleIds, stringList } from './cli/args';
import { CONFIG_FILE_NAME, ConfigError, enabledRules, loadConfig } from './config/loadConfig';
import { analyzeDocument } from './engine/analyzeDocument';
import { fixAllInDocument } from './engine/fixFinding';
import { TOOL_NAME, VERSION } from './index';
import {
  createEmptyReport,
  finalizeReport,
  parseErrorFinding,
  reportFindingFrom,
  type MigrationReport,
  type ReportFinding,
} from './report/migrationReport';
import { addFinding, ruleFindings } from './report/reportBuilder';
import { writeReportFile, type ReportFormat } from './report/writeReport';
import { RULE_IDS } from './rules/registry';
import type { Rule, RuleId } from './rules/types';
import type { SyntaxTree } from './syntax/model';
import { CSharpSyntaxError, loadCSharpParser, type CSharpParser } from './syntax/parser';
import { analyzedEntry, buildMigrationInventory, skippedEntry, writeInventoryFile, type InventoryEntry } from './scan/inventory';
import { isGeneratedSource, scanSourceFiles } from './scan/sourceScanner';

type WorkspaceOptions = {
  source: string;
  exclude: string[];
  /** Overrides the rules enabled in the configuration file. */
  rules?: RuleId[];
  config?: string;
  /** Overrides `includeGenerated` from the configuration file. */
  includeGenerated?: boolean;
  maxFiles?: number;
  verbose: boolean;
};

type CommonOptions = WorkspaceOptions & {
  report?: string;
  format: ReportFormat;
  failOnFindings: boolean;
};

export type CheckOptions = CommonOptions;

export type FixOptions = CommonOptions & {
  /** Write fixed files back; otherwise only report what would change. */
  write: boolean;
};

export type ScanOptions = WorkspaceOptions & {
  out: string;
};

type Workspace = {
  root: string;
  files: string[];
  rules: Rule[];
  includeGenerated: boolean;
  parser: CSharpParser;
};

async function openWorkspace(opts: WorkspaceOptions): Promise<Workspace> {
  const root = path.resolve(opts.source);
  const config = await loadConfig(root, opts.config);
  const includeGenerated = opts.includeGenerated ?? config.includeGenerated;
  const files = await scanSourceFiles({
    sourceRoot: root,
    excludeGlobs: [...config.exclude, ...opts.exclude],
    includeGenerated,
    maxFiles: opts.maxFiles,
  });
  if (opts.verbose && config.path) {
    // eslint-disable-next-line no-console
    console.log(`Using configuration: ${config.path}`);
  }
  return {
    root,
    files,
    rules: enabledRules(config, opts.rules),
    includeGenerated,
    parser: await loadCSharpParser(),
  };
}

/** Reads a file unless it is generated code that the run leaves alone. */
async function readSource(ws: Workspace, file: string): Promise<string | undefined> {
  const text = await fs.readFile(path.join(ws.root, file), 'utf8');
  if (!ws.includeGenerated && isGeneratedSource(text)) return undefined;
  return text;
}

function recordParseError(report: MigrationReport, file: string, e: CSharpSyntaxError): void {
  addFinding(report, parseErrorFinding(file, e.message, e.line, e.column));
}

function formatFinding(f: ReportFinding): string {
  const loc = f.location ? `${f.location.file}:${f.location.line ?? 1}:${f.location.column ?? 1}` : '';
  return `${loc}: ${f.severity} ${f.kind}: ${f.message}`;
}

async function finish(report: MigrationReport, opts: CommonOptions): Promise<void> {
  finalizeReport(report);
  for (const f of report.findings) {
    // eslint-disable-next-line no-console
    console.log(formatFinding(f));
  }
  if (opts.report) {
    await writeReportFile(opts.report, report, opts.format);
    if (opts.verbose) {
      // eslint-disable-next-line no-console
      console.log(`Wrote report: ${opts.report}`);
    }
  }
}

async function withConfig(run: () => Promise<number>): Promise<number> {
  try {
    return await run();
  } catch (e: unknown) {
    if (!(e instanceof ConfigError)) throw e;
    // eslint-disable-next-line no-console
    console.error(e.message);
    return 2;
  }
}

export async function runCheck(opts: CheckOptions): Promise<number> {
  return withConfig(async () => {
    const ws = await openWorkspace(opts);
    const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, projectRoot: ws.root });
    report.filesScanned = ws.files.length;

    for (const file of ws.files) {
      const text = await readSource(ws, file);
      if (text === undefined) continue;
      let tree: SyntaxTree;
      try {
        tree = ws.parser.parse(text);
      } catch (e: unknown) {
        if (!(e instanceof CSharpSyntaxError)) throw e;
        recordParseError(report, file, e);
        continue;
      }
      report.filesProcessed++;
      for (const f of analyzeDocument(tree, { rules: ws.rules })) addFinding(report, reportFindingFrom(file, f));
    }

    await finish(report, opts);
    const found = ruleFindings(report).length;
    if (opts.verbose) {
      // eslint-disable-next-line no-console
      console.log(`Checked ${report.filesProcessed} file(s): ${found} finding(s).`);
    }
    return opts.failOnFindings && found > 0 ? 3 : 0;
  });
}

export async function runFix(opts: FixOptions): Promise<number> {
  return withConfig(async () => {
    const ws = await openWorkspace(opts);
    const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, projectRoot: ws.root });
    report.filesScanned = ws.files.length;
    let changedFiles = 0;

    for (const file of ws.files) {
      const text = await readSource(ws, file);
      if (text === undefined) continue;
      try {
        const result = fixAllInDocument(ws.parser, text, { rules: ws.rules });
        const remaining = analyzeDocument(ws.parser.parse(result.text), { rules: ws.rules });
        report.filesProcessed++;
        report.counts.fixesApplied += result.applied.length;
        report.counts.fixesDeclined += result.declined.length;
        for (const f of remaining) addFinding(report, reportFindingFrom(file, f));

        if (result.applied.length > 0) {
          changedFiles++;
          if (opts.write) await fs.writeFile(path.join(ws.root, file), result.text, 'utf8');
          if (opts.verbose) {
            // eslint-disable-next-line no-console
            console.log(`${file}: ${result.applied.map((f) => `${f.ruleId} ${f.propertyName}`).join(', ')}`);
          }
        }
      } catch (e: unknown) {
        if (!(e instanceof CSharpSyntaxError)) throw e;
        recordParseError(report, file, e);
      }
    }

    await finish(report, opts);
    const remaining = ruleFindings(report).length;
    // eslint-disable-next-line no-console
    console.log(
      `${opts.write ? 'Fixed' : 'Would fix'} ${report.counts.fixesApplied} finding(s) in ${changedFiles} file(s); ` +
        `${remaining} finding(s) remain.`,
    );
    return opts.failOnFindings && remaining > 0 ? 3 : 0;
  });
}

export async function runScan(opts: ScanOptions): Promise<number> {
  return withConfig(async () => {
    const ws = await openWorkspace(opts);
    const entries: InventoryEntry[] = [];

    for (const file of ws.files) {
      const text = await readSource(ws, file);
      if (text === undefined) {
        entries.push(skippedEntry(file, 'generated'));
        continue;
      }
      let tree: SyntaxTree;
      try {
        tree = ws.parser.parse(text);
      } catch (e: unknown) {
        if (!(e instanceof CSharpSyntaxError)) throw e;
        entries.push(skippedEntry(file, 'parseError'));
        continue;
      }
      entries.push(analyzedEntry(file, analyzeDocument(tree, { rules: ws.rules })));
    }

    const inv = buildMigrationInventory(ws.root, entries);
    await writeInventoryFile(opts.out, inv);
    if (opts.verbose) {
      // eslint-disable-next-line no-console
      console.log(
        `Scanned ${inv.totals.files} source file(s): ${inv.totals.filesWithFindings} need migration. Wrote: ${opts.out}`,
      );
    }
    return 0;
  });
}

type RawCommonOptions = {
  source: string;
  exclude?: string[];
  rules?: string[];
  config?: string;
  includeGenerated?: string | boolean;
  report?: string;
  format?: string;
  failOnFindings?: string | boolean;
  verbose?: boolean;
};

type RawFixOptions = RawCommonOptions & { write?: string | boolean };

type RawScanOptions = {
  source: string;
  out: string;
  exclude?: string[];
  rules?: string[];
  config?: string;
  includeGenerated?: string | boolean;
  maxFiles?: string;
  verbose?: boolean;
};

function commonOptions(raw: RawCommonOptions): CommonOptions {
  return {
    source: raw.source,
    exclude: stringList(raw.exclude),
    rules: parseRuleIds(raw.rules),
    config: optionalString(raw.config),
    includeGenerated: raw.includeGenerated === undefined ? undefined : parseBoolish(raw.includeGenerated, false),
    report: optionalString(raw.report),
    format: parseFormat(raw.format),
    failOnFindings: parseBoolish(raw.failOnFindings, false),
    verbose: Boolean(raw.verbose),
  };
}

function addCommonOptions(cmd: Command): Command {
  return cmd
    .requiredOption('--source <path>', 'Root directory to analyze')
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --source)', [])
    .option('--rules <id...>', `Rules to run: ${RULE_IDS.join(', ')} (default: all enabled in the configuration)`)
    .option('--config <file>', `Configuration file (default: <source>/${CONFIG_FILE_NAME} when present)`, '')
    .option('--include-generated [bool]', 'Analyze generated sources (default false)', (v) => v, undefined)
    .option('--report <file>', 'Optional report path', '')
    .option('--format <fmt>', 'Report format: md|json', 'md')
    .option('--fail-on-findings [bool]', 'Exit 3 when findings remain (default false)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false);
}

export async function main(argv: string[]): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Find legacy MVVM change-notification and command code in C# sources and migrate it to CommunityToolkit.Mvvm attributes')
    .version(VERSION)
    .exitOverride();

  addCommonOptions(program.command('check').description('Report findings without changing files.')).action(
    async (raw: RawCommonOptions) => {
      exitCode = await runCheck(commonOptions(raw));
    },
  );

  addCommonOptions(program.command('fix').description('Apply every available fix, one at a time, per file.'))
    .option('--write [bool]', 'Write changed files (default false: dry run)', (v) => v, undefined)
    .action(async (raw: RawFixOptions) => {
      exitCode = await runFix({ ...commonOptions(raw), write: parseBoolish(raw.write, false) });
    });

  program
    .command('scan')
    .description('Count findings per file and rule, and write the migration inventory JSON.')
    .requiredOption('--source <path>', 'Root directory to scan')
    .requiredOption('--out <file>', 'Output JSON file')
    .option('--exclude <glob...>', 'Additional exclude glob(s).', [])
    .option('--rules <id...>', `Rules to count: ${RULE_IDS.join(', ')} (default: all enabled in the configuration)`)
    .option('--config <file>', `Configuration file (default: <source>/${CONFIG_FILE_NAME} when present)`, '')
    .option('--include-generated [bool]', 'Include generated sources (default from the configuration)', (v) => v, undefined)
    .option('--max-files <n>', 'Safety cap (default no cap)', (v) => v, undefined)
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: RawScanOptions) => {
      exitCode = await runScan({
        source: raw.source,
        out: raw.out,
        exclude: stringList(raw.exclude),
        rules: parseRuleIds(raw.rules),
        config: optionalString(raw.config),
        includeGenerated: raw.includeGenerated === undefined ? undefined : parseBoolish(raw.includeGenerated, false),
        maxFiles: parseIntish(raw.maxFiles),
        verbose: Boolean(raw.verbose),
      });
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e: unknown) {
    if (e instanceof InvalidArgumentError) {
      // eslint-disable-next-line no-console
      console.error(e.message);
      return 2;
    }
    if (e instanceof CommanderError) {
      // Commander has already printed its message.
      if (e.code === 'commander.helpDisplayed' || e.code === 'commander.version') return 0;
      if (e.code === 'commander.missingMandatoryOptionValue') return 1;
      return 2;
    }
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  void main(process.argv).then((code) => {
    process.exitCode = code;
  });
}
