import { compareFindings, createFinding } from '../rules/findings';
import { RULES } from '../rules/registry';
import type { Finding, Rule } from '../rules/types';
import type { SyntaxTree } from '../syntax/model';
import { propertiesOf } from '../syntax/query';

export type AnalyzeOptions = {
  /** Defaults to every registered rule. */
  rules?: readonly Rule[];
  /** Checked before each matcher runs; aborting throws the signal's reason. */
  signal?: AbortSignal;
};

/**
 * Runs every rule over every property of one document.
 * Pure: the same tree always yields the same findings, ordered by position.
 */
export function analyzeDocument(tree: SyntaxTree, options: AnalyzeOptions = {}): Finding[] {
  const rules = options.rules ?? RULES;
  const findings: Finding[] = [];
  for (const ctx of propertiesOf(tree)) {
    for (const rule of rules) {
      options.signal?.throwIfAborted();
      if (rule.detect(ctx)) findings.push(createFinding(rule.descriptor, ctx));
    }
  }
  return findings.sort(compareFindings);
}
