import path from 'node:path';
import fs from 'node:fs/promises';
import { isRuleId } from '../rules/registry';
import type { Finding, RuleId } from '../rules/types';
import { stableStringify } from '../util/deterministicJson';

export type InventoryStatus = 'analyzed' | 'generated' | 'parseError';

/** Findings per rule id; rules without findings are left out. */
export type RuleCounts = Partial<Record<RuleId, number>>;

export type InventoryEntry = {
  file: string;
  status: InventoryStatus;
  findingsByRule: RuleCounts;
  /** Findings an automatic fix exists for. */
  fixable: number;
};

/** Migration workload of a source tree, one entry per `.cs` file. */
export type MigrationInventory = {
  schema: 'migration-inventory-v1';
  sourceRoot: string;
  files: InventoryEntry[];
  totals: {
    files: number;
    filesWithFindings: number;
    findingsByRule: RuleCounts;
    fixable: number;
  };
};

export function analyzedEntry(file: string, findings: readonly Finding[]): InventoryEntry {
  const findingsByRule: RuleCounts = {};
  for (const f of findings) findingsByRule[f.ruleId] = (findingsByRule[f.ruleId] ?? 0) + 1;
  return { file, status: 'analyzed', findingsByRule, fixable: findings.filter((f) => f.fixable).length };
}

export function skippedEntry(file: string, status: Exclude<InventoryStatus, 'analyzed'>): InventoryEntry {
  return { file, status, findingsByRule: {}, fixable: 0 };
}

function countOf(counts: RuleCounts): number {
  return Object.values(counts).reduce((sum, n) => sum + (n ?? 0), 0);
}

export function buildMigrationInventory(sourceRoot: string, entries: readonly InventoryEntry[]): MigrationInventory {
  const files = [...entries].sort((a, b) => a.file.localeCompare(b.file));
  const findingsByRule: RuleCounts = {};
  for (const e of files) {
    for (const [id, n] of Object.entries(e.findingsByRule)) {
      if (isRuleId(id)) findingsByRule[id] = (findingsByRule[id] ?? 0) + (n ?? 0);
    }
  }
  return {
    schema: 'migration-inventory-v1',
    sourceRoot: path.resolve(sourceRoot),
    files,
    totals: {
      files: files.length,
      filesWithFindings: files.filter((e) => countOf(e.findingsByRule) > 0).length,
      findingsByRule,
      fixable: files.reduce((sum, e) => sum + e.fixable, 0),
    },
  };
}

export async function writeInventoryFile(outFile: string, inv: MigrationInventory): Promise<void> {
  const abs = path.resolve(outFile);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, stableStringify(inv), 'utf8');
}
