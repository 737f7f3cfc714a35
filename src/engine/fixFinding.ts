import type { Edit } from '../rewrite/edits';
import { applyEdits } from '../rewrite/treeEditor';
import { RULES } from '../rules/registry';
import type { Finding, Rule } from '../rules/types';
import type { SyntaxTree } from '../syntax/model';
import type { CSharpParser } from '../syntax/parser';
import { findPropertyAt } from '../syntax/query';
import { analyzeDocument } from './analyzeDocument';

export type NoChangeReason =
  /** The rule never offers a fix. */
  | 'notFixable'
  /** The finding stands but its structure cannot be rebuilt. */
  | 'unfixable'
  /** The finding was computed from another version of the document. */
  | 'stale'
  /** The finding's property is no longer there or no longer matches. */
  | 'notFound';

export type FixResult =
  | { kind: 'changed'; text: string; edits: Edit[] }
  | { kind: 'noChange'; reason: NoChangeReason };

export type FixOptions = {
  rules?: readonly Rule[];
  signal?: AbortSignal;
};

function noChange(reason: NoChangeReason): FixResult {
  return { kind: 'noChange', reason };
}

/**
 * Re-derives the finding's match from `tree` and applies its rewrite.
 * Only findings computed from this exact snapshot are accepted.
 */
export function fixFinding(tree: SyntaxTree, finding: Finding, options: FixOptions = {}): FixResult {
  const checkpoint = (): void => options.signal?.throwIfAborted();
  const rule = (options.rules ?? RULES).find((r) => r.descriptor.id === finding.ruleId);
  if (!rule?.plan) return noChange('notFixable');
  if (finding.checksum !== tree.checksum) return noChange('stale');

  const ctx = findPropertyAt(tree, finding.anchor.start);
  if (!ctx || ctx.property.name !== finding.propertyName || !rule.detect(ctx)) return noChange('notFound');

  checkpoint();
  const edits = rule.plan(ctx, checkpoint);
  if (!edits || edits.length === 0) return noChange('unfixable');

  checkpoint();
  const result = applyEdits(tree, edits);
  if (result.kind === 'stale') return noChange('stale');
  return { kind: 'changed', text: result.text, edits };
}

export type DeclinedFix = { finding: Finding; reason: NoChangeReason };

export type FixAllResult = {
  text: string;
  applied: Finding[];
  declined: DeclinedFix[];
};

export type FixAllOptions = FixOptions & {
  /** Upper bound on fix attempts per document. */
  maxIterations?: number;
};

const DEFAULT_MAX_ITERATIONS = 500;

function findingKey(f: Finding): string {
  return `${f.ruleId}:${f.containerName}.${f.propertyName}`;
}

/**
 * Applies fixes one at a time, re-parsing and re-analysing after each, until
 * no fixable finding is left. Declined findings are not retried.
 */
export function fixAllInDocument(parser: CSharpParser, text: string, options: FixAllOptions = {}): FixAllResult {
  const max = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const applied: Finding[] = [];
  const declined: DeclinedFix[] = [];
  const skip = new Set<string>();
  let current = text;

  for (let i = 0; i < max; i++) {
    const tree = parser.parse(current);
    const next = analyzeDocument(tree, options).find((f) => f.fixable && !skip.has(findingKey(f)));
    if (!next) break;

    const result = fixFinding(tree, next, options);
    if (result.kind === 'changed') {
      current = result.text;
      applied.push(next);
    } else {
      skip.add(findingKey(next));
      declined.push({ finding: next, reason: result.reason });
    }
  }
  return { text: current, applied, declined };
}
