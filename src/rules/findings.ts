import { positionAt } from '../syntax/positions';
import type { PropertyContext } from '../syntax/query';
import type { Finding, RuleDescriptor } from './types';

export function formatMessage(format: string, ...args: string[]): string {
  return format.replace(/\{(\d+)\}/g, (whole, i: string) => args[Number(i)] ?? whole);
}

/** Locates a finding at the property's name token. */
export function createFinding(descriptor: RuleDescriptor, ctx: PropertyContext): Finding {
  const { property, container, tree } = ctx;
  const anchor = property.nameToken.span;
  const { line, column } = positionAt(tree.text, anchor.start);
  return {
    ruleId: descriptor.id,
    severity: descriptor.severity,
    message: formatMessage(descriptor.messageFormat, property.name),
    anchor,
    line,
    column,
    propertyName: property.name,
    containerName: container.name,
    checksum: tree.checksum,
    fixable: descriptor.fixable,
  };
}

export function compareFindings(a: Finding, b: Finding): number {
  return a.anchor.start - b.anchor.start || a.ruleId.localeCompare(b.ruleId);
}
