import { InvalidArgumentError } from 'commander';
import { isRuleId, RULE_IDS } from '../rules/registry';
import type { RuleId } from '../rules/types';
import type { ReportFormat } from '../report/writeReport';

export function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

export function parseIntish(v: unknown): number | undefined {
  if (v === undefined || v === null || v === '') return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) return undefined;
  return Math.trunc(n);
}

export function parseFormat(v: unknown, defaultValue: ReportFormat = 'md'): ReportFormat {
  if (v === undefined || v === null || v === '') return defaultValue;
  const s = String(v).trim().toLowerCase();
  if (s === 'md' || s === 'markdown') return 'md';
  if (s === 'json') return 'json';
  throw new InvalidArgumentError(`Unknown report format '${String(v)}' (expected md or json)`);
}

/** Accepts repeated and comma-separated ids: `--rules a,b --rules c`. */
export function parseRuleIds(v: unknown): RuleId[] | undefined {
  if (v === undefined || v === null) return undefined;
  const values: unknown[] = Array.isArray(v) ? v : [v];
  const ids = values
    .flatMap((x) => String(x).split(','))
    .map((x) => x.trim())
    .filter((x) => x !== '');
  if (ids.length === 0) return undefined;

  const out: RuleId[] = [];
  for (const id of ids) {
    if (!isRuleId(id)) {
      throw new InvalidArgumentError(`Unknown rule '${id}' (expected one of: ${RULE_IDS.join(', ')})`);
    }
    if (!out.includes(id)) out.push(id);
  }
  return out;
}

export function optionalString(v: unknown): string | undefined {
  if (v === undefined || v === null) return undefined;
  const s = String(v).trim();
  return s === '' ? undefined : s;
}

export function stringList(v: unknown): string[] {
  if (v === undefined || v === null) return [];
  const values: unknown[] = Array.isArray(v) ? v : [v];
  return values.map((x) => String(x));
}
