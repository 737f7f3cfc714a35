import { delegateCommandTypeRule } from './delegateCommandType';
import { notifiedSetterRule } from './notifiedSetter';
import { simpleCommandTypeRule } from './simpleCommandType';
import type { Rule, RuleDescriptor, RuleId } from './types';

export const RULES: readonly Rule[] = [notifiedSetterRule, simpleCommandTypeRule, delegateCommandTypeRule];

export const RULE_IDS: readonly RuleId[] = RULES.map((r) => r.descriptor.id);

export function isRuleId(v: string): v is RuleId {
  return RULES.some((r) => r.descriptor.id === v);
}

export function getRule(id: RuleId): Rule {
  const rule = RULES.find((r) => r.descriptor.id === id);
  if (!rule) throw new Error(`Unknown rule: ${id}`);
  return rule;
}

export function ruleDescriptors(): RuleDescriptor[] {
  return RULES.map((r) => r.descriptor);
}
